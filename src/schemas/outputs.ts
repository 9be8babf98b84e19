import { z } from 'zod';

import { TASK_TYPES } from '../lib/types.js';

import {
  ResolvedToolContractDocumentSchema,
  ToolContractDocumentSchema,
} from './documents.js';

const ErrorInfoSchema = z.strictObject({
  code: z.string(),
  message: z.string(),
});

const ChunkValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ContractResolveResultSchema = z.strictObject({
  resolvedToolContract: ResolvedToolContractDocumentSchema,
  writtenTo: z
    .string()
    .optional()
    .describe('Absolute path the resolved contract was written to.'),
});

export const ContractValidateResultSchema = z.strictObject({
  toolContractId: z.string(),
  taskType: z.enum(TASK_TYPES),
  inputCount: z.number(),
  outputCount: z.number(),
  optionIds: z.array(z.string()),
  toolContract: ToolContractDocumentSchema.describe(
    'Normalized tool contract document.'
  ),
});

export const ChunksGatherResultSchema = z.strictObject({
  chunkKey: z.string().describe('Chunk key after prefix normalization.'),
  nchunks: z.number(),
  values: z.array(ChunkValueSchema),
});

/**
 * The ok/error envelope a tool advertises as its outputSchema.
 */
export function createToolOutputSchema<T extends z.ZodType>(result: T) {
  return z
    .strictObject({
      ok: z.boolean(),
      result: result.optional(),
      error: ErrorInfoSchema.optional(),
    })
    .superRefine((data, ctx) => {
      if (data.ok && data.result === undefined) {
        ctx.addIssue({
          code: 'custom',
          message: 'result is required when ok is true',
          path: ['result'],
        });
      }
      if (!data.ok && data.error === undefined) {
        ctx.addIssue({
          code: 'custom',
          message: 'error is required when ok is false',
          path: ['error'],
        });
      }
    });
}

export const ContractResolveOutputSchema = createToolOutputSchema(
  ContractResolveResultSchema
);
export const ContractValidateOutputSchema = createToolOutputSchema(
  ContractValidateResultSchema
);
export const ChunksGatherOutputSchema = createToolOutputSchema(
  ChunksGatherResultSchema
);

/** Generic ok/error envelope, for contract tests and external validators. */
export const DefaultOutputSchema = z.union([
  z.strictObject({ ok: z.literal(true), result: z.unknown() }),
  z.strictObject({ ok: z.literal(false), error: ErrorInfoSchema }),
]);

export type ContractValidateResult = z.infer<
  typeof ContractValidateResultSchema
>;
