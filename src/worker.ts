#!/usr/bin/env node
// src/worker.ts
// signals-worker: the resumable batch job. Reads repository URLs, collects
// them shard by shard into the result directories, and picks up where it left
// off after a crash or an interrupt.

import 'dotenv/config';
import chalk from 'chalk';
import { Command } from 'commander';

import { GitHubClient } from './api';
import { FileCheckpointStore } from './checkpoint';
import {
  collect,
  exitCodeFor,
  parseFailurePolicy,
  parseJobTime,
  parseLogLevel,
  parsePositiveInt,
  prepareScorer,
  reportFatal,
} from './cli';
import { Collector, type FailurePolicy } from './Collector';
import { githubTokenFromEnv, loadWorkerConfig, type WorkerConfig } from './config';
import { nonBlankLines, readLines } from './input';
import { createLogger, type LogLevel, type Logger } from './logger';
import { exportJobToParquet } from './parquetWriter';
import { DirectoryResultStore } from './ResultStore';
import { ShardWorker } from './ShardWorker';
import { buildRegistry, defaultSources } from './sources';
import { WorkLoop } from './WorkLoop';

export const DEFAULT_WORKER_CONFIG = 'config/worker.yml';

interface WorkerCliOptions {
  config: string;
  input?: string[];
  shardSize?: number;
  maxAttempts?: number;
  stateFile?: string;
  resultDataDir?: string;
  rawResultDataDir?: string;
  failurePolicy?: FailurePolicy;
  concurrency?: number;
  disableSource?: string[];
  scoringDisable?: boolean;
  scoringConfig?: string;
  scoringColumn?: string;
  jobTime?: Date;
  parquet: boolean;
  logLevel: LogLevel;
}

function describe(config: WorkerConfig, logger: Logger): void {
  logger.info('Worker configuration', {
    inputs: config.inputFiles.join(','),
    shardSize: config.shardSize,
    maxAttempts: config.maxAttempts,
    state: config.stateFile,
    results: config.resultDataDir,
    raw: config.rawResultDataDir,
    failurePolicy: config.failurePolicy,
    concurrency: config.concurrency,
  });
}

async function run(options: WorkerCliOptions): Promise<void> {
  const logger = createLogger({ level: options.logLevel, scope: 'worker' });

  const config = await loadWorkerConfig(options.config, {
    inputFiles: options.input,
    shardSize: options.shardSize,
    maxAttempts: options.maxAttempts,
    stateFile: options.stateFile,
    resultDataDir: options.resultDataDir,
    rawResultDataDir: options.rawResultDataDir,
    failurePolicy: options.failurePolicy,
    concurrency: options.concurrency,
    disabledSources: options.disableSource?.length ? options.disableSource : undefined,
    scoring: {
      enabled: options.scoringDisable ? false : undefined,
      configPath: options.scoringConfig,
      column: options.scoringColumn,
    },
  });
  describe(config, logger);

  const prepared = await prepareScorer(config.scoring, logger);
  const client = GitHubClient.fromToken(githubTokenFromEnv(), logger.child({ component: 'api' }));
  const registry = buildRegistry(defaultSources(client), config.disabledSources);
  const collector = new Collector(registry, { failurePolicy: config.failurePolicy, logger });

  const primary = new DirectoryResultStore(config.resultDataDir, 'csv');
  const raw = new DirectoryResultStore(config.rawResultDataDir, 'jsonl');

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.warn('Received signal, stopping at the next boundary', { signal });
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    const loop = new WorkLoop({
      input: nonBlankLines(readLines(config.inputFiles)),
      shardSize: config.shardSize,
      maxAttempts: config.maxAttempts,
      checkpoints: new FileCheckpointStore(config.stateFile),
      primary,
      raw,
      jobTime: options.jobTime,
      signal: controller.signal,
      logger,
      onStateChange: (state) => logger.debug('Loop state', { state }),
      worker: new ShardWorker({
        collector,
        primary,
        raw,
        scorer: prepared?.scorer,
        scoreColumn: prepared?.column,
        concurrency: config.concurrency,
        logger,
      }),
    });

    const result = await loop.run();
    console.error(chalk.green(`✓ ${result.shardCount} shards complete (${result.processedShards} processed, ${result.skippedShards} already present)`));
    console.error(chalk.gray(`  Results: ${primary.jobDir(result.jobTime)}`));
    console.error(chalk.gray(`  Raw:     ${raw.jobDir(result.jobTime)}`));

    if (options.parquet) {
      const parquetPath = await exportJobToParquet(primary.jobDir(result.jobTime), logger);
      if (parquetPath) {
        console.error(chalk.gray(`  Parquet: ${parquetPath}`));
      }
    }
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}

async function main() {
  const program = new Command();
  program
    .name('signals-worker')
    .description('Collects signals for every listed repository in checkpointed shards')
    .option('-c, --config <file>', 'worker config file', DEFAULT_WORKER_CONFIG)
    .option('-i, --input <file>', 'input file with one repository url per line (repeatable), or - for stdin', collect)
    .option('--shard-size <n>', 'repositories per shard', parsePositiveInt)
    .option('--max-attempts <n>', 'attempts per shard before the job stops', parsePositiveInt)
    .option('--state-file <file>', 'checkpoint file used to resume')
    .option('--result-data-dir <dir>', 'directory for scored CSV shards')
    .option('--raw-result-data-dir <dir>', 'directory for raw JSON-lines shards')
    .option('--failure-policy <policy>', 'fail-fast or lenient handling of a failing source', parseFailurePolicy)
    .option('--concurrency <n>', 'repositories collected at once within a shard', parsePositiveInt)
    .option('--disable-source <namespace>', 'disable a source by namespace (repeatable)', collect)
    .option('--scoring-disable', 'disable the generation of scores')
    .option('--scoring-config <file>', 'YAML file configuring the scoring algorithm')
    .option('--scoring-column <name>', 'name of the column holding the score')
    .option(
      '--job-time <timestamp>',
      'job time for a fresh run (ignored when resuming); pin it so a rerun after a lost checkpoint skips finished shards',
      parseJobTime
    )
    .option('--parquet', 'export the finished job to Parquet', false)
    .option('--log-level <level>', 'debug, info, warn or error', parseLogLevel, 'info')
    .action(async (options: WorkerCliOptions) => {
      await run(options);
    });

  await program.parseAsync(process.argv);
}

// Only run main if this file is executed directly (not imported)
if (require.main === module) {
  main().catch((error: unknown) => {
    reportFatal(error, process.env.DEBUG === '1');
    process.exit(exitCodeFor(error));
  });
}
