// src/ResultStore.ts
// Shard output destinations. A job writes one file per shard into a directory
// named after its job time, then a completion marker once every shard is done.
//
// Layout:
//   <root>/<job time>/shard-000000.csv
//   <root>/<job time>/shard-000001.csv
//   <root>/<job time>/.shard_metadata.json

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

import { errorCode } from './errors';

export interface CompletionMetadata {
  shardCount: number;
  jobTime: Date;
}

export interface ResultStore {
  readonly location: string;
  exists(shard: number, jobTime: Date): Promise<boolean>;
  write(shard: number, jobTime: Date, contents: string): Promise<void>;
  writeMetadata(metadata: CompletionMetadata): Promise<void>;
  readMetadata(jobTime: Date): Promise<CompletionMetadata | null>;
}

export const METADATA_FILENAME = '.shard_metadata.json';

const metadataFileSchema = z.object({
  shard_count: z.number().int().min(0),
  job_time: z.string().datetime({ offset: true }),
});

/** `2022-10-18T17:40:00.000Z` becomes `2022-10-18T17-40-00Z`. */
export function jobDirName(jobTime: Date): string {
  return jobTime.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/:/g, '-');
}

export function shardFileName(shard: number, extension: string): string {
  return `shard-${String(shard).padStart(6, '0')}.${extension}`;
}

async function writeAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, contents, 'utf-8');
  await fs.rename(tempPath, filePath);
}

export class DirectoryResultStore implements ResultStore {
  constructor(
    readonly root: string,
    readonly extension: string
  ) {}

  get location(): string {
    return this.root;
  }

  jobDir(jobTime: Date): string {
    return path.join(this.root, jobDirName(jobTime));
  }

  shardPath(shard: number, jobTime: Date): string {
    return path.join(this.jobDir(jobTime), shardFileName(shard, this.extension));
  }

  async exists(shard: number, jobTime: Date): Promise<boolean> {
    try {
      await fs.access(this.shardPath(shard, jobTime));
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async write(shard: number, jobTime: Date, contents: string): Promise<void> {
    await writeAtomic(this.shardPath(shard, jobTime), contents);
  }

  async writeMetadata(metadata: CompletionMetadata): Promise<void> {
    const file = {
      shard_count: metadata.shardCount,
      job_time: metadata.jobTime.toISOString(),
    };
    await writeAtomic(path.join(this.jobDir(metadata.jobTime), METADATA_FILENAME), JSON.stringify(file, null, 2) + '\n');
  }

  async readMetadata(jobTime: Date): Promise<CompletionMetadata | null> {
    return readMetadataFile(this.jobDir(jobTime));
  }
}

/** Reads a job directory's completion marker; null when the job never finished. */
export async function readMetadataFile(jobDir: string): Promise<CompletionMetadata | null> {
  let content: string;
  try {
    content = await fs.readFile(path.join(jobDir, METADATA_FILENAME), 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
  const file = metadataFileSchema.parse(JSON.parse(content));
  return { shardCount: file.shard_count, jobTime: new Date(file.job_time) };
}
