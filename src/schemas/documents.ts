import { z } from 'zod';

import { InvalidDocumentError } from '../lib/errors.js';
import { CHUNK_KEY_PREFIX, TASK_TYPES } from '../lib/types.js';
import { isPlainDefaultName } from '../lib/validators.js';

const OPTION_TYPE_NAMES = [
  'integer',
  'number',
  'float',
  'string',
  'boolean',
] as const;
const RESOLVED_RESOURCE_TYPES = ['$tmpdir', '$tmpfile', '$logfile'] as const;

const OptionValueSchema = z.union([z.number(), z.string(), z.boolean()]);
const IntOrSymbolSchema = z.union([z.number(), z.string()]);

export const FileTypeDocumentSchema = z.strictObject({
  file_type_id: z.string().min(1),
  base_name: z.string(),
  ext: z.string(),
  mime_type: z.string().min(1),
});

export const FileTypeCatalogSchema = z.array(FileTypeDocumentSchema);

export const DriverDocumentSchema = z.strictObject({
  exe: z.string().min(1),
  env: z.record(z.string(), z.string()).default({}),
});

/**
 * `default` and `choices` are not checked against `type` here; the option
 * model reports those mismatches as schema type errors.
 */
export const OptionSchemaDocumentSchema = z.strictObject({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  type: z.enum(OPTION_TYPE_NAMES),
  default: OptionValueSchema,
  choices: z.array(OptionValueSchema).nullable().optional(),
});

export const InputTypeDocumentSchema = z.strictObject({
  file_type_id: z.string().min(1),
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
});

export const OutputTypeDocumentSchema = z.strictObject({
  ...InputTypeDocumentSchema.shape,
  default_name: z
    .union([z.string().min(1), z.tuple([z.string().min(1), z.string()])])
    .refine(isPlainDefaultName, {
      message: 'default_name must be a file name without path separators',
    })
    .nullable()
    .optional(),
});

export const ToolContractDocumentSchema = z.strictObject({
  version: z.string().min(1),
  tool_contract_id: z.string().min(1),
  driver: DriverDocumentSchema,
  tool_contract: z.strictObject({
    _comment: z.string().optional(),
    tool_contract_id: z.string().optional(),
    name: z.string(),
    description: z.string(),
    task_type: z.enum(TASK_TYPES),
    is_distributed: z.boolean(),
    input_types: z.array(InputTypeDocumentSchema),
    output_types: z.array(OutputTypeDocumentSchema),
    schema_options: z.array(OptionSchemaDocumentSchema),
    nproc: IntOrSymbolSchema,
    resource_types: z.array(z.string()),
    chunk_keys: z.array(z.string()).optional(),
    nchunks: IntOrSymbolSchema.optional(),
    chunk_key: z.string().optional(),
  }),
});

export const ResolvedResourceDocumentSchema = z.strictObject({
  resource_type: z.enum(RESOLVED_RESOURCE_TYPES),
  path: z.string().min(1),
});

export const ResolvedToolContractDocumentSchema = z.strictObject({
  driver: DriverDocumentSchema,
  resolved_tool_contract: z.strictObject({
    _comment: z.string().optional(),
    tool_contract_id: z.string().min(1),
    task_type: z.enum(TASK_TYPES),
    is_distributed: z.boolean(),
    input_files: z.array(z.string()),
    output_files: z.array(z.string()),
    options: z.record(z.string(), OptionValueSchema),
    nproc: z.number().int().min(1),
    resources: z.array(ResolvedResourceDocumentSchema),
    max_nchunks: z.number().int().min(1).optional(),
    chunk_keys: z.array(z.string()).optional(),
    chunk_key: z.string().startsWith(CHUNK_KEY_PREFIX).optional(),
  }),
});

export const ChunkDocumentSchema = z.strictObject({
  _comment: z.string().optional(),
  _version: z.string().optional(),
  nchunks: z.number().int().min(0),
  chunks: z.array(
    z.strictObject({
      chunk_id: z.string().min(1),
      chunk: z.record(
        z.string(),
        z.union([z.string(), z.number(), z.boolean(), z.null()])
      ),
    })
  ),
});

export type OptionSchemaDocument = z.infer<typeof OptionSchemaDocumentSchema>;
export type OutputTypeDocument = z.infer<typeof OutputTypeDocumentSchema>;
export type ToolContractDocument = z.infer<typeof ToolContractDocumentSchema>;
export type ResolvedToolContractDocument = z.infer<
  typeof ResolvedToolContractDocumentSchema
>;
export type ChunkDocument = z.infer<typeof ChunkDocumentSchema>;

export function parseDocument<S extends z.ZodType>(
  schema: S,
  raw: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidDocumentError(
      `Invalid ${label}: ${z.prettifyError(result.error)}`
    );
  }
  return result.data;
}
