// src/WorkLoop.ts
// Resumable batch loop: shards the input, drives each shard through a worker
// with bounded retries, and checkpoints progress so an interrupted job resumes
// at the first shard that did not complete.
//
// Shards are processed one after another, so "shard N complete" implies every
// shard before N is complete.

import { type Checkpoint, type CheckpointStore, loadCheckpoint } from './checkpoint';
import { RestoreIntegrityError, ShardFailedError, errorMessage, isAbortError } from './errors';
import { batch } from './input';
import { silentLogger, type Logger } from './logger';
import type { ResultStore } from './ResultStore';
import type { BatchWorker, ShardRequest } from './ShardWorker';

/** Attempts per shard before the whole job stops. */
export const DEFAULT_MAX_ATTEMPTS = 7;

export type LoopState =
  | 'initializing'
  | 'restoring'
  | 'processing'
  | 'checkpointing'
  | 'finalizing'
  | 'done'
  | 'failed';

export interface WorkLoopOptions {
  input: AsyncIterable<string> | Iterable<string>;
  shardSize: number;
  worker: BatchWorker;
  checkpoints: CheckpointStore;
  /** Shard output; also checked before each attempt to skip finished shards. */
  primary: ResultStore;
  raw: ResultStore;
  maxAttempts?: number;
  /** Job time for a fresh run; defaults to now. Ignored when restoring. */
  jobTime?: Date;
  signal?: AbortSignal;
  logger?: Logger;
  onStateChange?: (state: LoopState) => void;
}

export interface WorkLoopResult {
  shardCount: number;
  jobTime: Date;
  /** Shards this run invoked the worker for. */
  processedShards: number;
  /** Shards whose output already existed. */
  skippedShards: number;
}

export class WorkLoop {
  private current: LoopState = 'initializing';
  private readonly maxAttempts: number;
  private readonly logger: Logger;

  constructor(private readonly options: WorkLoopOptions) {
    if (!Number.isInteger(options.shardSize) || options.shardSize < 1) {
      throw new RangeError(`shard size must be a positive integer, got ${options.shardSize}`);
    }
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`max attempts must be a positive integer, got ${this.maxAttempts}`);
    }
    this.logger = options.logger ?? silentLogger;
  }

  get state(): LoopState {
    return this.current;
  }

  /**
   * Runs the job to completion. On success the completion metadata is in both
   * destinations and the checkpoint is gone; on failure the checkpoint is left
   * where it was so the next run resumes.
   */
  async run(): Promise<WorkLoopResult> {
    try {
      return await this.runJob();
    } catch (error) {
      this.transition('failed');
      throw error;
    }
  }

  private transition(state: LoopState): void {
    this.current = state;
    this.options.onStateChange?.(state);
  }

  private async runJob(): Promise<WorkLoopResult> {
    this.transition('initializing');
    const { checkpoint, restored } = await loadCheckpoint(this.options.checkpoints, this.options.jobTime ?? new Date());
    const shards = batch(this.options.input, this.options.shardSize);
    try {
      return await this.drive(shards, checkpoint, restored);
    } finally {
      await shards.return(undefined);
    }
  }

  private async drive(shards: AsyncGenerator<string[]>, checkpoint: Checkpoint, restored: boolean): Promise<WorkLoopResult> {
    const { checkpoints, signal } = this.options;
    const jobTime = checkpoint.jobTime;

    if (restored && checkpoint.shard > 0) {
      this.transition('restoring');
      await this.fastForward(shards, checkpoint);
    }

    this.logger.info('Starting worker loop', {
      jobTime,
      shard: checkpoint.shard,
      attempt: checkpoint.attempt,
      state: checkpoints.location,
    });

    let processedShards = 0;
    let skippedShards = 0;
    for (;;) {
      signal?.throwIfAborted();
      const next = await shards.next();
      if (next.done) {
        break;
      }
      this.transition('processing');
      const request: ShardRequest = { shard: checkpoint.shard, jobTime, repos: next.value };
      const ran = await this.processShard(request, checkpoint);
      if (ran) {
        processedShards++;
      } else {
        skippedShards++;
      }

      this.transition('checkpointing');
      checkpoint.attempt = 0;
      checkpoint.shard++;
      await checkpoints.save(checkpoint);
    }

    this.transition('finalizing');
    const metadata = { shardCount: checkpoint.shard, jobTime };
    await this.options.primary.writeMetadata(metadata);
    await this.options.raw.writeMetadata(metadata);
    await checkpoints.clear();

    this.transition('done');
    this.logger.info('Worker loop complete', { jobTime, shards: checkpoint.shard, processedShards, skippedShards });
    return { shardCount: checkpoint.shard, jobTime, processedShards, skippedShards };
  }

  /** Consumes shards 0..S-1 without processing them. */
  private async fastForward(shards: AsyncGenerator<string[]>, checkpoint: Checkpoint): Promise<void> {
    this.logger.info('Restoring previous position', { shard: checkpoint.shard, jobTime: checkpoint.jobTime });
    let consumed = 0;
    while (consumed < checkpoint.shard) {
      const next = await shards.next();
      if (next.done) {
        break;
      }
      consumed++;
    }
    if (consumed < checkpoint.shard) {
      throw new RestoreIntegrityError(checkpoint.shard, consumed);
    }
  }

  /**
   * Attempts one shard until it succeeds or runs out of attempts. The attempt
   * is counted and saved before the work starts, so a crash mid-attempt still
   * counts. Returns false when the shard's output already existed.
   */
  private async processShard(request: ShardRequest, checkpoint: Checkpoint): Promise<boolean> {
    const { checkpoints, primary, worker, signal } = this.options;
    const logger = this.logger.child({ shard: request.shard });
    logger.info('Processing shard', { repos: request.repos.length });

    let lastError: unknown;
    while (checkpoint.attempt < this.maxAttempts) {
      signal?.throwIfAborted();
      checkpoint.attempt++;
      await checkpoints.save(checkpoint);

      try {
        if (await primary.exists(request.shard, request.jobTime)) {
          logger.info('Shard output already exists, skipping');
          return false;
        }
        await worker.process(request, signal);
        return true;
      } catch (error) {
        if (isAbortError(error) || signal?.aborted) {
          throw error;
        }
        lastError = error;
        // No broker to redeliver later: retry straight away.
        logger.warn('Error processing shard', { attempt: checkpoint.attempt, error: errorMessage(error) });
      }
    }
    throw new ShardFailedError(request.shard, checkpoint.attempt, lastError);
  }
}
