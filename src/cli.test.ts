import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';

import {
  collect,
  exitCodeFor,
  parseFailurePolicy,
  parseJobTime,
  parseLogLevel,
  parseOutputFormat,
  parsePositiveInt,
  prepareScorer,
} from './cli';
import { ConfigurationError, RestoreIntegrityError, ShardFailedError } from './errors';
import { silentLogger } from './logger';

describe('option parsers', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('3')).toBe(3);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('2.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('many')).toThrow(InvalidArgumentError);
  });

  it('parses enumerated values', () => {
    expect(parseFailurePolicy('lenient')).toBe('lenient');
    expect(() => parseFailurePolicy('retry')).toThrow('must be one of fail-fast, lenient');
    expect(parseOutputFormat('json')).toBe('json');
    expect(() => parseOutputFormat('xml')).toThrow(InvalidArgumentError);
    expect(parseLogLevel('debug')).toBe('debug');
    expect(() => parseLogLevel('loud')).toThrow(InvalidArgumentError);
  });

  it('parses job times', () => {
    expect(parseJobTime('2024-05-01T00:00:00Z')).toEqual(new Date('2024-05-01T00:00:00.000Z'));
    expect(() => parseJobTime('soon')).toThrow(InvalidArgumentError);
  });

  it('collects repeated options', () => {
    expect(collect('b', collect('a'))).toEqual(['a', 'b']);
  });
});

describe('exitCodeFor', () => {
  it('uses 2 for problems found before work starts and 1 otherwise', () => {
    expect(exitCodeFor(new ConfigurationError('bad'))).toBe(2);
    expect(exitCodeFor(new RestoreIntegrityError(5, 4))).toBe(2);
    expect(exitCodeFor(new ShardFailedError(0, 7))).toBe(1);
    expect(exitCodeFor(new Error('other'))).toBe(1);
  });
});

describe('prepareScorer', () => {
  it('returns null when scoring is disabled', async () => {
    expect(await prepareScorer({ enabled: false }, silentLogger)).toBeNull();
  });

  it('uses the default scorer and its name as the column', async () => {
    const prepared = await prepareScorer({ enabled: true }, silentLogger);

    expect(prepared?.column).toBe('default_score');
    expect(prepared?.scorer.name).toBe('default_score');
  });

  it('prefers an explicit column name', async () => {
    const prepared = await prepareScorer({ enabled: true, column: 'score' }, silentLogger);

    expect(prepared?.column).toBe('score');
  });
});
