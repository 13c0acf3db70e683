// src/cli.ts
// Pieces shared by the collect-signals and signals-worker entry points.

import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';

import { FAILURE_POLICIES, type FailurePolicy } from './Collector';
import { ConfigurationError, RestoreIntegrityError, errorMessage } from './errors';
import { isLogLevel, type LogLevel, type Logger } from './logger';
import { Scorer } from './Scorer';
import { OUTPUT_FORMATS, type OutputFormat } from './SignalWriter';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('must be one of debug, info, warn, error');
  }
  return value;
}

export function parseFailurePolicy(value: string): FailurePolicy {
  const policy = FAILURE_POLICIES.find((p) => p === value);
  if (!policy) {
    throw new InvalidArgumentError(`must be one of ${FAILURE_POLICIES.join(', ')}`);
  }
  return policy;
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidArgumentError(`must be one of ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

export function parseJobTime(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError('must be an ISO-8601 timestamp');
  }
  return date;
}

/** Repeatable option: `--disable-source a --disable-source b`. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export interface ScoringOptions {
  enabled: boolean;
  configPath?: string;
  column?: string;
}

export interface PreparedScorer {
  scorer: Scorer;
  column: string;
}

export async function prepareScorer(options: ScoringOptions, logger: Logger): Promise<PreparedScorer | null> {
  if (!options.enabled) {
    logger.info('Scoring disabled');
    return null;
  }
  let scorer: Scorer;
  if (options.configPath) {
    logger.info('Preparing scorer from config', { filename: options.configPath });
    scorer = await Scorer.fromFile(options.configPath);
  } else {
    logger.info('Preparing default scorer');
    scorer = await Scorer.fromDefaultConfig();
  }
  return { scorer, column: options.column || scorer.name };
}

/** 2 for anything that is wrong before work starts, 1 for a failed job. */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigurationError || error instanceof RestoreIntegrityError ? 2 : 1;
}

export function reportFatal(error: unknown, verbose = false): void {
  console.error(chalk.red.bold('\n❌ Fatal error:'), errorMessage(error));
  let cause = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined) {
    console.error(chalk.red('  caused by:'), errorMessage(cause));
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  if (verbose && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
}
