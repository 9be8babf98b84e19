import assert from 'node:assert/strict';
import { after, before, describe, it } from 'node:test';

import { InvalidIdError } from '../lib/errors.js';
import {
  collectPrefixMatches,
  describeValueType,
  isPositiveInteger,
  matchesValueType,
  parsePositiveIntEnv,
  readStringEnv,
  validateTaskId,
  validateTaskOptionId,
} from '../lib/validators.js';

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

describe('validateTaskId', () => {
  it('accepts <namespace>.tasks.<name>', () => {
    assert.equal(validateTaskId('demo.tasks.align'), 'demo.tasks.align');
  });

  it('rejects ids without the tasks segment', () => {
    assert.throws(() => validateTaskId('demo.align'), InvalidIdError);
  });

  it('rejects extra segments and punctuation', () => {
    assert.throws(() => validateTaskId('a.b.tasks.c'), InvalidIdError);
    assert.throws(() => validateTaskId('demo.tasks.al-ign'), InvalidIdError);
  });
});

describe('validateTaskOptionId', () => {
  it('accepts dotted namespaces before task_options', () => {
    assert.equal(
      validateTaskOptionId('demo.pipeline.task_options.min_length'),
      'demo.pipeline.task_options.min_length'
    );
  });

  it('rejects ids without the task_options segment', () => {
    assert.throws(
      () => validateTaskOptionId('demo.options.min_length'),
      InvalidIdError
    );
  });
});

// ---------------------------------------------------------------------------
// Value types
// ---------------------------------------------------------------------------

describe('describeValueType', () => {
  it('distinguishes integers from other numbers', () => {
    assert.equal(describeValueType(3), 'integer');
    assert.equal(describeValueType(3.5), 'number');
  });

  it('names null and arrays explicitly', () => {
    assert.equal(describeValueType(null), 'null');
    assert.equal(describeValueType([1]), 'array');
    assert.equal(describeValueType('x'), 'string');
  });
});

describe('matchesValueType', () => {
  it('treats integers as numbers but not the reverse', () => {
    assert.equal(matchesValueType(2, 'number'), true);
    assert.equal(matchesValueType(2.5, 'integer'), false);
  });

  it('rejects non-finite numbers', () => {
    assert.equal(matchesValueType(Number.NaN, 'number'), false);
  });

  it('does not coerce strings', () => {
    assert.equal(matchesValueType('1', 'integer'), false);
    assert.equal(matchesValueType('true', 'boolean'), false);
  });
});

describe('isPositiveInteger', () => {
  it('accepts 1 and rejects 0 and fractions', () => {
    assert.equal(isPositiveInteger(1), true);
    assert.equal(isPositiveInteger(0), false);
    assert.equal(isPositiveInteger(1.5), false);
  });
});

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

describe('parsePositiveIntEnv', () => {
  const ENV_KEY = 'TC_TEST_INT_ENV';
  let saved: string | undefined;

  before(() => {
    saved = process.env[ENV_KEY];
  });

  after(() => {
    if (saved === undefined) {
      delete process.env[ENV_KEY];
    } else {
      process.env[ENV_KEY] = saved;
    }
  });

  it('returns fallback when env var is not set', () => {
    delete process.env[ENV_KEY];
    assert.equal(parsePositiveIntEnv(ENV_KEY, 42), 42);
  });

  it('parses a valid positive integer', () => {
    process.env[ENV_KEY] = '8';
    assert.equal(parsePositiveIntEnv(ENV_KEY, 42), 8);
  });

  it('returns fallback for non-numeric or zero values', () => {
    process.env[ENV_KEY] = 'many';
    assert.equal(parsePositiveIntEnv(ENV_KEY, 42), 42);
    process.env[ENV_KEY] = '0';
    assert.equal(parsePositiveIntEnv(ENV_KEY, 42), 42);
  });
});

describe('readStringEnv', () => {
  const ENV_KEY = 'TC_TEST_STRING_ENV';

  after(() => {
    delete process.env[ENV_KEY];
  });

  it('trims the value', () => {
    process.env[ENV_KEY] = '  /scratch  ';
    assert.equal(readStringEnv(ENV_KEY, '/tmp'), '/scratch');
  });

  it('falls back on blank values', () => {
    process.env[ENV_KEY] = '   ';
    assert.equal(readStringEnv(ENV_KEY, '/tmp'), '/tmp');
  });
});

// ---------------------------------------------------------------------------
// collectPrefixMatches
// ---------------------------------------------------------------------------

describe('collectPrefixMatches', () => {
  it('keeps candidate order and stops at the limit', () => {
    const candidates = ['Demo.FileTypes.a', 'Other.x', 'Demo.FileTypes.b'];
    assert.deepEqual(collectPrefixMatches(candidates, 'Demo.', 1), [
      'Demo.FileTypes.a',
    ]);
    assert.deepEqual(collectPrefixMatches(candidates, 'Demo.', 5), [
      'Demo.FileTypes.a',
      'Demo.FileTypes.b',
    ]);
  });
});
