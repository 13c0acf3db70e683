// src/checkpoint.ts
// Durable progress of a batch job: which shard is next, how many attempts it
// has had, and the job timestamp fixed when the run started.

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

import { CheckpointError, errorCode } from './errors';

export interface Checkpoint {
  shard: number;
  attempt: number;
  jobTime: Date;
}

export interface CheckpointStore {
  /** Where the checkpoint lives, for log lines. */
  readonly location: string;
  /** Returns null when no checkpoint has been written. */
  load(): Promise<Checkpoint | null>;
  save(checkpoint: Checkpoint): Promise<void>;
  clear(): Promise<void>;
}

const MAX_SHARD = 2 ** 31 - 1;

const checkpointFileSchema = z.object({
  shard: z.number().int().min(0).max(MAX_SHARD),
  attempt: z.number().int().min(0),
  job_time: z.string().datetime({ offset: true }),
});

type CheckpointFile = z.infer<typeof checkpointFileSchema>;

export function freshCheckpoint(jobTime: Date): Checkpoint {
  return { shard: 0, attempt: 0, jobTime };
}

/** Load-or-default: a missing checkpoint starts a new job at `jobTime`. */
export async function loadCheckpoint(store: CheckpointStore, jobTime: Date): Promise<{ checkpoint: Checkpoint; restored: boolean }> {
  const checkpoint = await store.load();
  if (checkpoint) {
    return { checkpoint, restored: true };
  }
  return { checkpoint: freshCheckpoint(jobTime), restored: false };
}

/**
 * Keeps the checkpoint as a small JSON file. Saves go through a temporary file
 * and a rename so a crash never leaves a torn checkpoint behind.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  async load(): Promise<Checkpoint | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw new CheckpointError('load', this.filePath, error);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new CheckpointError('load', this.filePath, error);
    }
    const result = checkpointFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new CheckpointError('load', this.filePath, result.error);
    }
    return {
      shard: result.data.shard,
      attempt: result.data.attempt,
      jobTime: new Date(result.data.job_time),
    };
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    const file: CheckpointFile = {
      shard: checkpoint.shard,
      attempt: checkpoint.attempt,
      job_time: checkpoint.jobTime.toISOString(),
    };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(file) + '\n', 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      throw new CheckpointError('save', this.filePath, error);
    }
  }

  async clear(): Promise<void> {
    try {
      await fs.rm(this.filePath, { force: true });
    } catch (error) {
      throw new CheckpointError('clear', this.filePath, error);
    }
  }
}
