import { EventEmitter } from 'node:events';

import { getErrorMessage } from '../lib/errors.js';
import type { TaskType } from '../lib/types.js';

const ENGINE_ERROR_LOG_PREFIX = '[engine]';

export interface FileTypeConflictPayload {
  fileTypeId: string;
  attribute: 'baseName' | 'ext' | 'mimeType';
  registered: string;
  requested: string;
}

export interface ChunkKeyCorrectedPayload {
  requested: string;
  corrected: string;
}

export interface ContractResolvedPayload {
  taskId: string;
  taskType: TaskType;
  outputFiles: number;
  nproc: number;
}

interface EngineEvents {
  'file-type:conflict': [FileTypeConflictPayload];
  'chunk-key:corrected': [ChunkKeyCorrectedPayload];
  'contract:resolved': [ContractResolvedPayload];
  error: [unknown];
}

interface TypedEmitter<T> extends Omit<EventEmitter, 'on' | 'off' | 'emit'> {
  on<K extends keyof T>(
    event: K,
    listener: (...args: T[K] extends unknown[] ? T[K] : never) => void
  ): this;
  off<K extends keyof T>(
    event: K,
    listener: (...args: T[K] extends unknown[] ? T[K] : never) => void
  ): this;
  emit<K extends keyof T>(
    event: K,
    ...args: T[K] extends unknown[] ? T[K] : never
  ): boolean;
}

export const engineEvents = new EventEmitter({
  captureRejections: true,
}) as TypedEmitter<EngineEvents>;

function logEngineError(err: unknown): void {
  process.stderr.write(`${ENGINE_ERROR_LOG_PREFIX} ${getErrorMessage(err)}\n`);
}

engineEvents.on('error', logEngineError);
