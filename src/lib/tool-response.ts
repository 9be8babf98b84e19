import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type {
  ContentBlock,
  LoggingLevel,
} from '@modelcontextprotocol/sdk/types.js';

import {
  createErrorResponse,
  getErrorCode,
  getErrorMessage,
} from './errors.js';

export function createToolResponse<T extends object>(
  structured: T
): {
  content: ContentBlock[];
  structuredContent: T;
} {
  return {
    content: [{ type: 'text', text: JSON.stringify(structured) }],
    structuredContent: structured,
  };
}

/** Error envelope for a failed tool call, keyed by the engine error code. */
export function createToolFailure(
  err: unknown
): ReturnType<typeof createErrorResponse> {
  return createErrorResponse(getErrorCode(err), getErrorMessage(err));
}

export async function emitToolLog(
  server: McpServer,
  logger: string,
  level: LoggingLevel,
  data: Record<string, unknown>
): Promise<void> {
  try {
    await server.sendLoggingMessage({ level, logger, data });
  } catch {
    // Logging should never fail a tool call.
  }
}
