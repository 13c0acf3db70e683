// src/ShardWorker.ts
// Collector-backed worker: turns one shard of repository URLs into a raw
// JSON-lines file and a primary CSV file.

import type { Collector } from './Collector';
import { InputError, UncollectableRepoError, errorMessage } from './errors';
import { silentLogger, type Logger } from './logger';
import { parseRepoUrl, type RepoIdentity } from './repo';
import type { ResultStore } from './ResultStore';
import { formatScore, type Scorer } from './Scorer';
import { BufferSink, CsvSignalWriter, JsonSignalWriter, type ExtraField } from './SignalWriter';
import type { SignalSet } from './signal';

export interface ShardRequest {
  shard: number;
  jobTime: Date;
  repos: readonly string[];
}

export interface ShardSummary {
  collected: number;
  skipped: number;
}

/** What the work loop drives, one shard at a time. */
export interface BatchWorker {
  process(request: ShardRequest, signal?: AbortSignal): Promise<ShardSummary>;
}

export interface ShardWorkerOptions {
  collector: Collector;
  primary: ResultStore;
  raw: ResultStore;
  scorer?: Scorer | null;
  /** Defaults to the scorer's name. */
  scoreColumn?: string;
  /** Repositories collected at once; output keeps input order. */
  concurrency?: number;
  logger?: Logger;
}

type RepoOutcome = { status: 'collected'; sets: SignalSet[] } | { status: 'skipped' };

export class ShardWorker implements BatchWorker {
  private readonly concurrency: number;
  private readonly logger: Logger;
  private readonly scoreColumn: string | null;

  constructor(private readonly options: ShardWorkerOptions) {
    this.concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${this.concurrency}`);
    }
    this.logger = options.logger ?? silentLogger;
    this.scoreColumn = options.scorer ? options.scoreColumn || options.scorer.name : null;
  }

  async process(request: ShardRequest, signal?: AbortSignal): Promise<ShardSummary> {
    const jobId = request.jobTime.toISOString();
    const logger = this.logger.child({ shard: request.shard });

    const outcomes = await this.collectAll(request.repos, jobId, logger, signal);

    const emptySets = this.options.collector.emptySets();
    const primary = new BufferSink();
    const raw = new BufferSink();
    const csv = new CsvSignalWriter(primary, emptySets, this.scoreColumn ? [this.scoreColumn] : []);
    const json = new JsonSignalWriter(raw, emptySets, []);
    await csv.writeHeader();

    let collected = 0;
    for (const outcome of outcomes) {
      if (outcome.status === 'skipped') {
        continue;
      }
      collected++;
      await json.writeSignals(outcome.sets);
      await csv.writeSignals(outcome.sets, this.extrasFor(outcome.sets));
    }

    signal?.throwIfAborted();
    // Raw first: the primary file is what marks the shard as done.
    await this.options.raw.write(request.shard, request.jobTime, raw.toString());
    await this.options.primary.write(request.shard, request.jobTime, primary.toString());

    const summary = { collected, skipped: outcomes.length - collected };
    logger.info('Shard written', { ...summary });
    return summary;
  }

  /**
   * Collects in groups of `concurrency`. The first failure aborts the rest of
   * the attempt, and every repository settles before it is rethrown, so no
   * fetch outlives a failed attempt.
   */
  private async collectAll(
    repos: readonly string[],
    jobId: string,
    logger: Logger,
    signal?: AbortSignal
  ): Promise<RepoOutcome[]> {
    const attempt = new AbortController();
    const forwardAbort = () => attempt.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    }
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const failures: unknown[] = [];
    const outcomes: RepoOutcome[] = [];
    try {
      for (let i = 0; i < repos.length && failures.length === 0; i += this.concurrency) {
        const group = repos.slice(i, i + this.concurrency);
        const settled = await Promise.allSettled(
          group.map((line) =>
            this.collectOne(line, jobId, logger, attempt.signal).catch((error: unknown) => {
              if (failures.length === 0) {
                attempt.abort(error);
              }
              failures.push(error);
              throw error;
            })
          )
        );
        for (const result of settled) {
          if (result.status === 'fulfilled') {
            outcomes.push(result.value);
          }
        }
      }
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
    if (failures.length > 0) {
      throw failures[0];
    }
    return outcomes;
  }

  private extrasFor(sets: SignalSet[]): ExtraField[] {
    if (!this.options.scorer || !this.scoreColumn) {
      return [];
    }
    return [{ key: this.scoreColumn, value: formatScore(this.options.scorer.score(sets)) }];
  }

  private async collectOne(line: string, jobId: string, logger: Logger, signal?: AbortSignal): Promise<RepoOutcome> {
    let repo: RepoIdentity;
    try {
      repo = parseRepoUrl(line);
    } catch (error) {
      if (error instanceof InputError) {
        logger.warn('Skipping malformed repository url', { url: line, error: errorMessage(error) });
        return { status: 'skipped' };
      }
      throw error;
    }

    try {
      const sets = await this.options.collector.collect(repo, { jobId, signal });
      logger.debug('Collected repository', { repo: repo.canonical });
      return { status: 'collected', sets };
    } catch (error) {
      if (error instanceof UncollectableRepoError) {
        logger.warn('Repo cannot be collected', { repo: repo.canonical, error: errorMessage(error) });
        return { status: 'skipped' };
      }
      throw error;
    }
  }
}
