import { inspect } from 'node:util';

const INSPECT_OPTIONS = {
  depth: 3,
  breakLength: 120,
} as const;
const UNKNOWN_ERROR_MESSAGE = 'Unknown error';

interface ErrorResponse {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent: { ok: false; error: { code: string; message: string } };
  isError: true;
}

export class ToolContractError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FileTypeNotFoundError extends ToolContractError {
  constructor(fileTypeId: string) {
    super('E_FILE_TYPE_NOT_FOUND', `File type not registered: ${fileTypeId}`);
  }
}

export class InvalidIdError extends ToolContractError {
  constructor(kind: string, id: string, pattern: RegExp) {
    super(
      'E_INVALID_ID',
      `Invalid ${kind} '${id}'. Expected format ${pattern.source}`
    );
  }
}

export class SchemaTypeError extends ToolContractError {
  constructor(message: string) {
    super('E_SCHEMA_TYPE', message);
  }
}

export class MalformedContractError extends ToolContractError {
  constructor(message: string) {
    super('E_MALFORMED_CONTRACT', message);
  }
}

export class IncompatibleInputsError extends ToolContractError {
  constructor(supplied: number, expected: number) {
    super(
      'E_INCOMPATIBLE_INPUTS',
      `Incompatible inputs. Supplied ${String(supplied)} input file(s), contract declares ${String(expected)}`
    );
  }
}

export class UnsupportedResourceError extends ToolContractError {
  constructor(resourceType: string) {
    super(
      'E_UNSUPPORTED_RESOURCE',
      `Unsupported resource type '${resourceType}'`
    );
  }
}

export class MissingChunkKeyError extends ToolContractError {
  constructor(chunkKey: string, chunkId: string) {
    super(
      'E_MISSING_CHUNK_KEY',
      `Unable to find chunk key '${chunkKey}' in chunk '${chunkId}'`
    );
  }
}

export class MalformedChunkKeyError extends ToolContractError {
  constructor(message: string) {
    super('E_MALFORMED_CHUNK_KEY', message);
  }
}

export class InvalidSymbolError extends ToolContractError {
  constructor(message: string) {
    super('E_INVALID_SYMBOL', message);
  }
}

export class InvalidDocumentError extends ToolContractError {
  constructor(message: string) {
    super('E_INVALID_DOCUMENT', message);
  }
}

export function isObjectRecord(
  value: unknown
): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function stringifyUnknown(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    // Fall through to inspect-based serialization.
  }
  return inspect(value, INSPECT_OPTIONS);
}

function getMessageFromErrorLike(value: unknown): string | undefined {
  if (!isObjectRecord(value)) {
    return undefined;
  }

  return typeof value.message === 'string' ? value.message : undefined;
}

export function getErrorMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (error === null || error === undefined) {
    return UNKNOWN_ERROR_MESSAGE;
  }
  const errorLikeMessage = getMessageFromErrorLike(error);
  if (errorLikeMessage !== undefined) {
    return errorLikeMessage;
  }
  return stringifyUnknown(error);
}

export function getErrorCode(error: unknown): string {
  return error instanceof ToolContractError ? error.code : 'E_INTERNAL';
}

export function createErrorResponse(
  code: string,
  message: string
): ErrorResponse {
  const structured = { ok: false as const, error: { code, message } };
  const text = JSON.stringify(structured);
  return {
    content: [{ type: 'text' as const, text }],
    structuredContent: structured,
    isError: true as const,
  };
}
