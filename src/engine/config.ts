import { availableParallelism, tmpdir } from 'node:os';

import { parsePositiveIntEnv, readStringEnv } from '../lib/validators.js';

export const DEFAULT_MAX_NCHUNKS = 24;

export interface ResolverDefaults {
  readonly maxNproc: number;
  readonly maxNchunks: number;
  readonly tmpDir: string;
}

/**
 * Ceilings and the temp root the server falls back to when a caller leaves
 * them out. Read on every call so tests can adjust the environment.
 */
export function getResolverDefaults(): ResolverDefaults {
  return {
    maxNproc: parsePositiveIntEnv('TC_MAX_NPROC', availableParallelism()),
    maxNchunks: parsePositiveIntEnv('TC_MAX_NCHUNKS', DEFAULT_MAX_NCHUNKS),
    tmpDir: readStringEnv('TC_TMP_DIR', tmpdir()),
  };
}
