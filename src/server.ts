import { readFileSync } from 'node:fs';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { LoggingLevel } from '@modelcontextprotocol/sdk/types.js';

import { engineEvents } from './engine/events.js';
import type {
  ChunkKeyCorrectedPayload,
  ContractResolvedPayload,
  FileTypeConflictPayload,
} from './engine/events.js';

import { getErrorMessage } from './lib/errors.js';

import { registerAllTools } from './tools/index.js';

import { registerAllResources } from './resources/index.js';

const SERVER_NAME = 'tool-contract-resolver';
const SERVER_TITLE = 'Tool Contract Resolver';
const SERVER_DESCRIPTION =
  'Resolves pipeline tool contracts into concrete, runnable invocations.';
const PACKAGE_JSON_URL = new URL('../package.json', import.meta.url);
const SERVER_INSTRUCTIONS =
  'Use contract_validate to check a tool contract, contract_resolve to bind it to input paths, an output directory and nproc/nchunks ceilings, and chunks_gather to collect one chunk key across a chunk document. Registered file types are listed at file-types://registry.';

let cachedVersion: string | undefined;

function getPackageVersion(parsed: unknown): string {
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('version' in parsed) ||
    typeof parsed.version !== 'string'
  ) {
    throw new Error('Invalid package.json: missing or invalid version field');
  }
  return parsed.version;
}

function loadVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }
  const packageJson = readFileSync(PACKAGE_JSON_URL, 'utf8');
  cachedVersion = getPackageVersion(JSON.parse(packageJson) as unknown);
  return cachedVersion;
}

function attachEngineEventHandlers(server: McpServer): () => void {
  const forward = (
    level: LoggingLevel,
    logger: string,
    data: Record<string, unknown>
  ): void => {
    void server
      .sendLoggingMessage({ level, logger, data })
      .catch((err: unknown) => {
        // Logging failures go to stderr.
        process.stderr.write(
          `[${SERVER_NAME}] Failed to log ${String(data.event)}: ${getErrorMessage(err)}\n`
        );
      });
  };

  const onFileTypeConflict = (data: FileTypeConflictPayload): void => {
    forward('warning', 'tool-contract.file-types', {
      event: 'file_type_conflict',
      ...data,
    });
  };

  const onChunkKeyCorrected = (data: ChunkKeyCorrectedPayload): void => {
    forward('warning', 'tool-contract.chunks', {
      event: 'chunk_key_corrected',
      ...data,
    });
  };

  const onContractResolved = (data: ContractResolvedPayload): void => {
    forward('info', 'tool-contract.resolver', {
      event: 'contract_resolved',
      ...data,
    });
  };

  engineEvents.on('file-type:conflict', onFileTypeConflict);
  engineEvents.on('chunk-key:corrected', onChunkKeyCorrected);
  engineEvents.on('contract:resolved', onContractResolved);

  let detached = false;
  return (): void => {
    if (detached) {
      return;
    }
    detached = true;
    engineEvents.off('file-type:conflict', onFileTypeConflict);
    engineEvents.off('chunk-key:corrected', onChunkKeyCorrected);
    engineEvents.off('contract:resolved', onContractResolved);
  };
}

function installCloseCleanup(server: McpServer, cleanup: () => void): void {
  const originalClose = server.close.bind(server);
  let closed = false;

  server.close = async (): Promise<void> => {
    if (closed) {
      return;
    }
    closed = true;
    cleanup();
    await originalClose();
  };
}

export function createServer(): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      title: SERVER_TITLE,
      description: SERVER_DESCRIPTION,
      version: loadVersion(),
    },
    {
      capabilities: {
        tools: {},
        logging: {},
        completions: {},
        resources: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  registerAllTools(server);
  registerAllResources(server);

  const detachEngineHandlers = attachEngineEventHandlers(server);
  installCloseCleanup(server, detachEngineHandlers);

  return server;
}
