import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import {
  chunksFromDocument,
  getChunkValues,
  normalizeChunkKey,
  type PipelineChunk,
} from '../engine/chunks.js';
import { loadPipelineChunks } from '../engine/contract-io.js';

import {
  type ChunksGatherInput,
  ChunksGatherInputSchema,
} from '../schemas/inputs.js';
import { ChunksGatherOutputSchema } from '../schemas/outputs.js';

import {
  createToolFailure,
  createToolResponse,
  emitToolLog,
} from '../lib/tool-response.js';

const TOOL_NAME = 'chunks_gather';

function loadChunks(input: ChunksGatherInput): Promise<PipelineChunk[]> {
  if (input.chunkPath !== undefined) {
    return loadPipelineChunks(input.chunkPath);
  }
  return Promise.resolve(chunksFromDocument(input.chunkDocument));
}

async function handleChunksGather(
  server: McpServer,
  input: ChunksGatherInput
): Promise<CallToolResult> {
  try {
    const chunks = await loadChunks(input);
    const chunkKey = normalizeChunkKey(input.chunkKey);
    return createToolResponse({
      ok: true,
      result: {
        chunkKey,
        nchunks: chunks.length,
        values: getChunkValues(chunks, chunkKey),
      },
    });
  } catch (err) {
    const failure = createToolFailure(err);
    await emitToolLog(server, TOOL_NAME, 'error', {
      event: 'failed',
      ...failure.structuredContent.error,
    });
    return failure;
  }
}

export function registerChunksGatherTool(server: McpServer): void {
  server.registerTool(
    TOOL_NAME,
    {
      title: 'Gather Chunk Values',
      description:
        'Read a chunk document and collect the value stored under one chunk key from every chunk, in chunk order. Fails when any chunk lacks the key.',
      inputSchema: ChunksGatherInputSchema,
      outputSchema: ChunksGatherOutputSchema,
      annotations: {
        readOnlyHint: true,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    (input) => handleChunksGather(server, input)
  );
}
