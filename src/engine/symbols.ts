import { InvalidSymbolError } from '../lib/errors.js';
import type { IntOrMax, MaxSymbol } from '../lib/types.js';
import { isPositiveInteger } from '../lib/validators.js';

export const USE_MAXIMUM: IntOrMax = Object.freeze({ kind: 'max' });

export function literal(value: number): IntOrMax {
  assertPositiveInteger(value, 'literal');
  return Object.freeze({ kind: 'literal', value });
}

export function assertPositiveInteger(value: number, label: string): number {
  if (!isPositiveInteger(value)) {
    throw new InvalidSymbolError(
      `${label} must be a positive integer (received ${String(value)})`
    );
  }
  return value;
}

/** Decode a document field holding an integer or the given max symbol. */
export function parseIntOrMax(raw: number | string, symbol: MaxSymbol): IntOrMax {
  if (typeof raw === 'number') {
    return literal(raw);
  }
  if (raw === symbol) {
    return USE_MAXIMUM;
  }
  throw new InvalidSymbolError(
    `Unsupported value '${raw}'. Expected an integer or '${symbol}'`
  );
}

export function encodeIntOrMax(
  value: IntOrMax,
  symbol: MaxSymbol
): number | MaxSymbol {
  return value.kind === 'literal' ? value.value : symbol;
}

/**
 * A literal is capped at the ceiling; the max symbol takes the ceiling as is.
 */
export function resolveIntOrMax(value: IntOrMax, ceiling: number): number {
  if (value.kind === 'max') {
    return ceiling;
  }
  return Math.min(value.value, ceiling);
}
