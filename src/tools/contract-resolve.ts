import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import { getResolverDefaults } from '../engine/config.js';
import {
  loadToolContract,
  writeResolvedToolContract,
} from '../engine/contract-io.js';
import { resolvedToolContractToDocument } from '../engine/resolved-contract.js';
import {
  type AnyResolveRequest,
  resolveAnyToolContract,
} from '../engine/resolver.js';
import { toolContractFromDocument } from '../engine/tool-contract.js';

import {
  type ContractResolveInput,
  ContractResolveInputSchema,
} from '../schemas/inputs.js';
import { ContractResolveOutputSchema } from '../schemas/outputs.js';

import type { ToolContract } from '../lib/types.js';
import {
  createToolFailure,
  createToolResponse,
  emitToolLog,
} from '../lib/tool-response.js';

const TOOL_NAME = 'contract_resolve';

export async function loadContractInput(input: {
  toolContract?: Record<string, unknown> | undefined;
  toolContractPath?: string | undefined;
}): Promise<ToolContract> {
  if (input.toolContractPath !== undefined) {
    return loadToolContract(input.toolContractPath);
  }
  return toolContractFromDocument(input.toolContract);
}

function buildResolveRequest(input: ContractResolveInput): AnyResolveRequest {
  const defaults = getResolverDefaults();
  return {
    inputFiles: input.inputFiles,
    outputDir: input.outputDir,
    tmpDir: input.tmpDir ?? defaults.tmpDir,
    maxNproc: input.maxNproc ?? defaults.maxNproc,
    maxNchunks: input.maxNchunks ?? defaults.maxNchunks,
    ...(input.options !== undefined ? { options: input.options } : {}),
    ...(input.chunkKeys !== undefined ? { chunkKeys: input.chunkKeys } : {}),
    ...(input.chunkKey !== undefined ? { chunkKey: input.chunkKey } : {}),
  };
}

async function handleContractResolve(
  server: McpServer,
  input: ContractResolveInput
): Promise<CallToolResult> {
  try {
    const contract = await loadContractInput(input);
    const resolved = resolveAnyToolContract(
      contract,
      buildResolveRequest(input)
    );
    const writtenTo =
      input.resolvedContractPath !== undefined
        ? await writeResolvedToolContract(resolved, input.resolvedContractPath)
        : undefined;

    await emitToolLog(server, TOOL_NAME, 'info', {
      event: 'resolved',
      toolContractId: resolved.task.taskId,
      taskType: resolved.task.taskType,
      ...(writtenTo !== undefined ? { writtenTo } : {}),
    });

    return createToolResponse({
      ok: true,
      result: {
        resolvedToolContract: resolvedToolContractToDocument(resolved),
        ...(writtenTo !== undefined ? { writtenTo } : {}),
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

export function registerContractResolveTool(server: McpServer): void {
  server.registerTool(
    TOOL_NAME,
    {
      title: 'Resolve Tool Contract',
      description:
        'Bind a tool contract to concrete input paths, an output directory and processor/chunk ceilings. Returns the resolved contract with output paths, option values, nproc and resource paths. Optionally writes it to resolvedContractPath.',
      inputSchema: ContractResolveInputSchema,
      outputSchema: ContractResolveOutputSchema,
      annotations: {
        readOnlyHint: false,
        idempotentHint: false,
        openWorldHint: false,
      },
    },
    (input) => handleContractResolve(server, input)
  );
}
