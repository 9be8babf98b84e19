import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Variables } from '@modelcontextprotocol/sdk/shared/uriTemplate.js';
import { McpError } from '@modelcontextprotocol/sdk/types.js';

import { type FileTypeRegistry, fileTypes } from '../engine/file-types.js';

import type { FileType } from '../lib/types.js';
import { collectPrefixMatches } from '../lib/validators.js';

const REGISTRY_RESOURCE_URI = 'file-types://registry';
const FILE_TYPE_RESOURCE_PREFIX = `${REGISTRY_RESOURCE_URI}/`;
const MAX_COMPLETION_RESULTS = 20;

function extractStringVariable(
  variables: Variables,
  name: string,
  uri: URL
): string {
  const raw = variables[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string' || value.length === 0) {
    throw new McpError(-32602, `Invalid ${name} in URI: ${uri.toString()}`);
  }
  return value;
}

function serializeJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function toFileTypeDocument(fileType: FileType): Record<string, string> {
  return {
    file_type_id: fileType.fileTypeId,
    base_name: fileType.baseName,
    ext: fileType.ext,
    mime_type: fileType.mimeType,
  };
}

export function registerAllResources(
  server: McpServer,
  registry: FileTypeRegistry = fileTypes
): void {
  server.registerResource(
    'file-types.registry',
    REGISTRY_RESOURCE_URI,
    {
      title: 'File Type Registry',
      description:
        'Every registered file type with its default base name, extension and MIME type.',
      mimeType: 'application/json',
      annotations: { audience: ['assistant', 'user'], priority: 0.6 },
    },
    () => {
      const entries = registry.list().map(toFileTypeDocument);
      return {
        contents: [
          {
            uri: REGISTRY_RESOURCE_URI,
            mimeType: 'application/json',
            text: serializeJson({
              totalFileTypes: entries.length,
              fileTypes: entries,
            }),
          },
        ],
      };
    }
  );

  server.registerResource(
    'file-types.entry',
    new ResourceTemplate(`${FILE_TYPE_RESOURCE_PREFIX}{fileTypeId}`, {
      list: () => ({
        resources: registry.list().map((fileType) => ({
          uri: `${FILE_TYPE_RESOURCE_PREFIX}${fileType.fileTypeId}`,
          name: fileType.fileTypeId,
          description: `${fileType.baseName}.${fileType.ext} (${fileType.mimeType})`,
          mimeType: 'application/json',
        })),
      }),
      complete: {
        fileTypeId: (value) =>
          collectPrefixMatches(
            registry.list().map((fileType) => fileType.fileTypeId),
            value,
            MAX_COMPLETION_RESULTS
          ),
      },
    }),
    {
      title: 'File Type',
      description: 'A single registered file type, by id.',
      mimeType: 'application/json',
    },
    (uri, variables) => {
      const fileTypeId = extractStringVariable(variables, 'fileTypeId', uri);
      const fileType = registry.get(fileTypeId);
      if (!fileType) {
        throw new McpError(-32002, `Resource not found: ${uri.toString()}`);
      }
      return {
        contents: [
          {
            uri: uri.toString(),
            mimeType: 'application/json',
            text: serializeJson(toFileTypeDocument(fileType)),
          },
        ],
      };
    }
  );
}
