#!/usr/bin/env node
// src/main.ts
// collect-signals: one pass over a list of repository URLs, writing one
// output row per repository.

import 'dotenv/config';
import chalk from 'chalk';
import type { WriteStream } from 'fs';
import * as fsp from 'fs/promises';
import { Command } from 'commander';

import { GitHubClient } from './api';
import {
  collect,
  exitCodeFor,
  parseFailurePolicy,
  parseLogLevel,
  parseOutputFormat,
  prepareScorer,
  reportFatal,
} from './cli';
import { Collector, type FailurePolicy } from './Collector';
import { githubTokenFromEnv } from './config';
import { InputError, UncollectableRepoError, errorCode, errorMessage } from './errors';
import { nonBlankLines, readLines, STDIN_PATH } from './input';
import { createLogger, type LogLevel } from './logger';
import { parseRepoUrl, type RepoIdentity } from './repo';
import { formatScore } from './Scorer';
import type { SignalSet } from './signal';
import { createSignalWriter, streamSink, type ExtraField, type OutputFormat } from './SignalWriter';
import { buildRegistry, defaultSources } from './sources';

interface CollectOptions {
  out: string;
  force: boolean;
  format: OutputFormat;
  failurePolicy: FailurePolicy;
  disableSource: string[];
  scoringDisable: boolean;
  scoringConfig?: string;
  scoringColumn?: string;
  skipInvalid: boolean;
  logLevel: LogLevel;
}

/** Opens the output file up front so a bad path fails before any collection. */
async function openOutput(filePath: string, force: boolean): Promise<WriteStream> {
  let handle: fsp.FileHandle;
  try {
    handle = await fsp.open(filePath, force ? 'w' : 'wx');
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      throw new Error(`${filePath} already exists; use --force to overwrite`, { cause: error });
    }
    throw error;
  }
  return handle.createWriteStream({ encoding: 'utf-8' });
}

async function run(inputs: string[], options: CollectOptions): Promise<void> {
  const logger = createLogger({ level: options.logLevel, scope: 'collect' });
  const prepared = await prepareScorer(
    { enabled: !options.scoringDisable, configPath: options.scoringConfig, column: options.scoringColumn },
    logger
  );

  const client = GitHubClient.fromToken(githubTokenFromEnv(), logger.child({ component: 'api' }));
  const registry = buildRegistry(defaultSources(client), options.disableSource);
  const collector = new Collector(registry, { failurePolicy: options.failurePolicy, logger });

  const toStdout = options.out === STDIN_PATH;
  const stream = toStdout ? process.stdout : await openOutput(options.out, options.force);
  const sink = streamSink(stream);
  const out = createSignalWriter(options.format, sink, collector.emptySets(), prepared ? [prepared.column] : []);

  const jobId = new Date().toISOString();
  let collected = 0;
  let skipped = 0;

  try {
    for await (const line of nonBlankLines(readLines(inputs))) {
      let repo: RepoIdentity;
      try {
        repo = parseRepoUrl(line);
      } catch (error) {
        if (error instanceof InputError && options.skipInvalid) {
          logger.warn('Skipping malformed project url', { url: line, error: errorMessage(error) });
          skipped++;
          continue;
        }
        throw error;
      }

      const l = logger.child({ url: repo.canonical });
      l.debug('Parsed project url');

      let sets: SignalSet[];
      try {
        sets = await collector.collect(repo, { jobId });
      } catch (error) {
        if (error instanceof UncollectableRepoError) {
          l.warn('Repo cannot be collected', { error: errorMessage(error) });
          skipped++;
          continue;
        }
        throw error;
      }

      const extras: ExtraField[] = prepared
        ? [{ key: prepared.column, value: formatScore(prepared.scorer.score(sets)) }]
        : [];
      await out.writeSignals(sets, extras);
      collected++;
    }
  } catch (error) {
    if (!toStdout) {
      stream.destroy();
    }
    throw error;
  }
  if (!toStdout) {
    await sink.end();
  }

  logger.info('Collection complete', { collected, skipped });
}

async function main() {
  const program = new Command();
  program
    .name('collect-signals')
    .description('Collects signals for each project repository listed')
    .argument('<in...>', 'input files with one repository url per line, or - for stdin')
    .option('-o, --out <file>', 'output file, or - for stdout', STDIN_PATH)
    .option('--force', 'overwrite the output file if it exists', false)
    .option('--format <format>', 'csv or json', parseOutputFormat, 'csv')
    .option('--failure-policy <policy>', 'fail-fast or lenient handling of a failing source', parseFailurePolicy, 'fail-fast')
    .option('--disable-source <namespace>', 'disable a source by namespace (repeatable)', collect, [])
    .option('--scoring-disable', 'disable the generation of scores', false)
    .option('--scoring-config <file>', 'YAML file configuring the scoring algorithm')
    .option('--scoring-column <name>', 'name of the column holding the score')
    .option('--skip-invalid', 'skip malformed urls instead of stopping', false)
    .option('--log-level <level>', 'debug, info, warn or error', parseLogLevel, 'info')
    .action(async (inputs: string[], options: CollectOptions) => {
      await run(inputs, options);
    });

  await program.parseAsync(process.argv);
}

// Only run main if this file is executed directly (not imported)
if (require.main === module) {
  main().catch((error: unknown) => {
    reportFatal(error, process.env.DEBUG === '1');
    console.error(chalk.gray('collect-signals stopped'));
    process.exit(exitCodeFor(error));
  });
}
