import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import { toolContractToDocument } from '../engine/tool-contract.js';

import {
  type ContractValidateInput,
  ContractValidateInputSchema,
} from '../schemas/inputs.js';
import {
  type ContractValidateResult,
  ContractValidateOutputSchema,
} from '../schemas/outputs.js';

import type { ToolContract } from '../lib/types.js';
import {
  createToolFailure,
  createToolResponse,
  emitToolLog,
} from '../lib/tool-response.js';

import { loadContractInput } from './contract-resolve.js';

const TOOL_NAME = 'contract_validate';

export function summarizeContract(
  contract: ToolContract
): ContractValidateResult {
  const { task } = contract;
  return {
    toolContractId: task.taskId,
    taskType: task.taskType,
    inputCount: task.inputFileTypes.length,
    outputCount: task.outputFileTypes.length,
    optionIds: task.options.map((option) => option.id),
    toolContract: toolContractToDocument(contract),
  };
}

async function handleContractValidate(
  server: McpServer,
  input: ContractValidateInput
): Promise<CallToolResult> {
  try {
    const result = summarizeContract(await loadContractInput(input));
    return createToolResponse({ ok: true, result });
  } catch (err) {
    const failure = createToolFailure(err);
    await emitToolLog(server, TOOL_NAME, 'warning', {
      event: 'invalid',
      ...failure.structuredContent.error,
    });
    return failure;
  }
}

export function registerContractValidateTool(server: McpServer): void {
  server.registerTool(
    TOOL_NAME,
    {
      title: 'Validate Tool Contract',
      description:
        'Parse and check a tool contract document without resolving it. Returns its id, task type, input/output counts, option ids and the normalized document.',
      inputSchema: ContractValidateInputSchema,
      outputSchema: ContractValidateOutputSchema,
      annotations: {
        readOnlyHint: true,
        idempotentHint: true,
        openWorldHint: false,
      },
    },
    (input) => handleContractValidate(server, input)
  );
}
