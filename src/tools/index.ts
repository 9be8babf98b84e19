import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { registerChunksGatherTool } from './chunks-gather.js';
import { registerContractResolveTool } from './contract-resolve.js';
import { registerContractValidateTool } from './contract-validate.js';

type ToolRegistrar = (server: McpServer) => void;

const TOOL_REGISTRARS: readonly ToolRegistrar[] = [
  registerContractResolveTool,
  registerContractValidateTool,
  registerChunksGatherTool,
];

export function registerAllTools(server: McpServer): void {
  for (const registerTool of TOOL_REGISTRARS) {
    registerTool(server);
  }
}
