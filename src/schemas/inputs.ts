import { z } from 'zod';

const PATH_SCHEMA = z.string().min(1).max(4096);
const DOCUMENT_SCHEMA = z.record(z.string(), z.unknown());

function addCustomIssue(
  ctx: z.RefinementCtx,
  path: string[],
  message: string
): void {
  ctx.addIssue({
    code: 'custom',
    message,
    path,
  });
}

function requireExactlyOne(
  ctx: z.RefinementCtx,
  data: Record<string, unknown>,
  documentField: string,
  pathField: string
): void {
  const hasDocument = data[documentField] !== undefined;
  const hasPath = data[pathField] !== undefined;

  if (!hasDocument && !hasPath) {
    addCustomIssue(
      ctx,
      [documentField],
      `Either ${documentField} or ${pathField} is required`
    );
  }
  if (hasDocument && hasPath) {
    addCustomIssue(
      ctx,
      [pathField],
      `Provide ${documentField} or ${pathField}, not both`
    );
  }
}

export const ContractResolveInputSchema = z
  .strictObject({
    toolContract: DOCUMENT_SCHEMA.optional().describe(
      'Tool contract document (JSON object)'
    ),
    toolContractPath: PATH_SCHEMA.optional().describe(
      'Path to a tool contract JSON file, used instead of toolContract'
    ),
    inputFiles: z
      .array(PATH_SCHEMA)
      .describe(
        'Concrete input paths, one per declared input file type, in declared order'
      ),
    outputDir: PATH_SCHEMA.describe('Directory the output files resolve under'),
    tmpDir: PATH_SCHEMA.optional().describe(
      'Root for temp resources (default: TC_TMP_DIR or the OS temp dir)'
    ),
    maxNproc: z
      .number()
      .int()
      .min(1)
      .optional()
      .describe('Processor ceiling (default: TC_MAX_NPROC or CPU count)'),
    maxNchunks: z
      .number()
      .int()
      .min(1)
      .optional()
      .describe('Chunk ceiling for scattered tasks (default: TC_MAX_NCHUNKS)'),
    chunkKeys: z
      .array(z.string().min(1))
      .optional()
      .describe('Chunk keys a scattered task populates (default: declared keys)'),
    chunkKey: z
      .string()
      .min(1)
      .optional()
      .describe('Chunk key a gathered task reads (default: declared key)'),
    options: z
      .record(z.string(), z.unknown())
      .optional()
      .describe('Option overrides keyed by option id'),
    resolvedContractPath: PATH_SCHEMA.optional().describe(
      'When set, the resolved contract is also written to this path'
    ),
  })
  .superRefine((data, ctx) => {
    requireExactlyOne(ctx, data, 'toolContract', 'toolContractPath');
  });

export const ContractValidateInputSchema = z
  .strictObject({
    toolContract: DOCUMENT_SCHEMA.optional().describe(
      'Tool contract document (JSON object)'
    ),
    toolContractPath: PATH_SCHEMA.optional().describe(
      'Path to a tool contract JSON file, used instead of toolContract'
    ),
  })
  .superRefine((data, ctx) => {
    requireExactlyOne(ctx, data, 'toolContract', 'toolContractPath');
  });

export const ChunksGatherInputSchema = z
  .strictObject({
    chunkDocument: DOCUMENT_SCHEMA.optional().describe(
      'Chunk document: {nchunks, chunks: [{chunk_id, chunk}]}'
    ),
    chunkPath: PATH_SCHEMA.optional().describe(
      'Path to a chunk JSON file, used instead of chunkDocument'
    ),
    chunkKey: z
      .string()
      .min(1)
      .describe('Chunk key to collect; "$chunk." is added when missing'),
  })
  .superRefine((data, ctx) => {
    requireExactlyOne(ctx, data, 'chunkDocument', 'chunkPath');
  });

export type ContractResolveInput = z.infer<typeof ContractResolveInputSchema>;
export type ContractValidateInput = z.infer<typeof ContractValidateInputSchema>;
export type ChunksGatherInput = z.infer<typeof ChunksGatherInputSchema>;
