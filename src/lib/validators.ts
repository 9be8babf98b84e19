import { InvalidIdError } from './errors.js';
import type { DefaultName, OptionValue, OptionValueType } from './types.js';

export const TASK_ID_PATTERN = /^[A-Za-z0-9_]+\.tasks\.[A-Za-z0-9_]+$/;
export const TASK_OPTION_ID_PATTERN =
  /^[A-Za-z0-9_]+(?:\.[A-Za-z0-9_]+)*\.task_options\.[A-Za-z0-9_]+$/;

function readEnv(name: string): string | undefined {
  return process.env[name];
}

function parseEnvInt(raw: string): number | undefined {
  const parsed = Number.parseInt(raw, 10);
  return Number.isInteger(parsed) ? parsed : undefined;
}

export function validateTaskId(taskId: string): string {
  if (!TASK_ID_PATTERN.test(taskId)) {
    throw new InvalidIdError('task id', taskId, TASK_ID_PATTERN);
  }
  return taskId;
}

export function validateTaskOptionId(optionId: string): string {
  if (!TASK_OPTION_ID_PATTERN.test(optionId)) {
    throw new InvalidIdError('task option id', optionId, TASK_OPTION_ID_PATTERN);
  }
  return optionId;
}

/** A bare file name: no path separator, and neither `.` nor `..`. */
export function isPlainFileName(name: string): boolean {
  return !/[\\/]/.test(name) && name !== '.' && name !== '..';
}

export function isPlainDefaultName(defaultName: DefaultName): boolean {
  return typeof defaultName === 'string'
    ? isPlainFileName(defaultName)
    : isPlainFileName(defaultName[0]) && isPlainFileName(defaultName[1]);
}

/**
 * Name the runtime type of a value the way option schemas name theirs, so
 * error messages can put "actual" and "expected" side by side.
 */
export function describeValueType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'number';
  }
  return typeof value;
}

export function matchesValueType(
  value: unknown,
  type: OptionValueType
): value is OptionValue {
  switch (type) {
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'string':
      return typeof value === 'string';
    case 'boolean':
      return typeof value === 'boolean';
  }
}

export function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

/**
 * Parse a positive integer from an environment variable, returning `fallback`
 * if the variable is absent or invalid. Values below `minimum` also fall back.
 */
export function parsePositiveIntEnv(
  name: string,
  fallback: number,
  minimum = 1
): number {
  const raw = readEnv(name);
  if (raw === undefined) {
    return fallback;
  }

  const parsed = parseEnvInt(raw);
  if (parsed === undefined || parsed < minimum) {
    return fallback;
  }
  return parsed;
}

export function readStringEnv(name: string, fallback: string): string {
  const raw = readEnv(name);
  if (raw === undefined || raw.trim().length === 0) {
    return fallback;
  }
  return raw.trim();
}

export function collectPrefixMatches(
  candidates: readonly string[],
  value: string,
  limit: number
): string[] {
  const results: string[] = [];
  for (const candidate of candidates) {
    if (!candidate.startsWith(value)) {
      continue;
    }
    results.push(candidate);
    if (results.length >= limit) {
      break;
    }
  }
  return results;
}
