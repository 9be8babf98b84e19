import {
  type ChunkDocument,
  ChunkDocumentSchema,
  parseDocument,
} from '../schemas/documents.js';

import {
  InvalidDocumentError,
  MalformedChunkKeyError,
  MissingChunkKeyError,
} from '../lib/errors.js';
import { CHUNK_KEY_PREFIX, type ChunkValue } from '../lib/types.js';

import { engineEvents } from './events.js';

export const CHUNK_DOCUMENT_VERSION = '0.1.0';
const CHUNK_KEY_PATTERN = /^\$chunk\.[A-Za-z0-9_]*/;

export function isChunkKey(key: string): boolean {
  return key.startsWith(CHUNK_KEY_PREFIX);
}

/**
 * Callers often drop the `$chunk.` prefix. It is added back with a
 * `chunk-key:corrected` warning instead of failing the lookup.
 */
export function normalizeChunkKey(key: string): string {
  if (isChunkKey(key)) {
    return key;
  }
  const corrected = `${CHUNK_KEY_PREFIX}${key}`;
  engineEvents.emit('chunk-key:corrected', { requested: key, corrected });
  return corrected;
}

/**
 * One shard of a scattered task. Keys starting with `$chunk.` are routed to
 * chunked task inputs; every other key is metadata.
 */
export class PipelineChunk {
  readonly chunkId: string;
  private readonly datum: Map<string, ChunkValue>;

  constructor(chunkId: string, data: Readonly<Record<string, ChunkValue>> = {}) {
    if (CHUNK_KEY_PATTERN.test(chunkId)) {
      throw new MalformedChunkKeyError(
        `Chunk id '${chunkId}' must not look like a chunk key`
      );
    }
    this.chunkId = chunkId;
    this.datum = new Map(Object.entries(data));
  }

  get(key: string): ChunkValue {
    const chunkKey = normalizeChunkKey(key);
    if (!this.datum.has(chunkKey)) {
      throw new MissingChunkKeyError(chunkKey, this.chunkId);
    }
    return this.datum.get(chunkKey) ?? null;
  }

  /** Same key matching as `get`, without the correction warning. */
  has(key: string): boolean {
    return this.datum.has(isChunkKey(key) ? key : `${CHUNK_KEY_PREFIX}${key}`);
  }

  setChunkKey(key: string, value: ChunkValue): this {
    this.datum.set(normalizeChunkKey(key), value);
    return this;
  }

  setMetadataKey(key: string, value: ChunkValue): this {
    if (isChunkKey(key)) {
      throw new MalformedChunkKeyError(
        `Metadata key '${key}' must not start with '${CHUNK_KEY_PREFIX}'`
      );
    }
    this.datum.set(key, value);
    return this;
  }

  get chunkData(): Record<string, ChunkValue> {
    return Object.fromEntries(
      [...this.datum].filter(([key]) => isChunkKey(key))
    );
  }

  get chunkKeys(): string[] {
    return [...this.datum.keys()].filter(isChunkKey);
  }

  get metadata(): Record<string, ChunkValue> {
    return Object.fromEntries(
      [...this.datum].filter(([key]) => !isChunkKey(key))
    );
  }

  toDocument(): ChunkDocument['chunks'][number] {
    return { chunk_id: this.chunkId, chunk: Object.fromEntries(this.datum) };
  }
}

export function chunksToDocument(
  chunks: readonly PipelineChunk[],
  comment?: string
): ChunkDocument {
  return {
    nchunks: chunks.length,
    _version: CHUNK_DOCUMENT_VERSION,
    ...(comment !== undefined ? { _comment: comment } : {}),
    chunks: chunks.map((chunk) => chunk.toDocument()),
  };
}

export function chunksFromDocument(raw: unknown): PipelineChunk[] {
  const document = parseDocument(ChunkDocumentSchema, raw, 'chunk document');
  if (document.nchunks !== document.chunks.length) {
    throw new InvalidDocumentError(
      `Chunk document declares ${String(document.nchunks)} chunk(s) but lists ${String(document.chunks.length)}`
    );
  }
  return document.chunks.map(
    (entry) => new PipelineChunk(entry.chunk_id, entry.chunk)
  );
}

/**
 * Collect the value stored under `key` from every chunk, in chunk order. A
 * chunk without the key fails the whole lookup.
 */
export function getChunkValues(
  chunks: readonly PipelineChunk[],
  key: string
): ChunkValue[] {
  const chunkKey = normalizeChunkKey(key);
  return chunks.map((chunk) => chunk.get(chunkKey));
}
