// src/parquetWriter.ts
// DuckDB-based Parquet export of a finished job's shard files, with the
// completion metadata preserved as Parquet key-value metadata.

import * as fs from 'fs/promises';
import * as path from 'path';

import { silentLogger, type Logger } from './logger';
import { readMetadataFile, type CompletionMetadata } from './ResultStore';

export const PARQUET_FILENAME = 'signals.parquet';

const SHARD_FILE_PATTERN = /^shard-\d+\.csv$/;

function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Build DuckDB KV_METADATA entries from the job's completion marker
 */
export function buildKvMetadata(metadata: CompletionMetadata): Record<string, string> {
  return {
    run_job_time: metadata.jobTime.toISOString(),
    run_shard_count: metadata.shardCount.toString(),
  };
}

/**
 * SQL that loads every shard CSV and writes one Parquet file. All columns are
 * read as text so an empty (unset) cell never trips type detection.
 */
export function buildExportSql(shardFiles: readonly string[], parquetPath: string, kvMetadata: Record<string, string>): string {
  const files = shardFiles.map(sqlString).join(', ');
  const kvMetadataEntries = Object.entries(kvMetadata)
    .map(([key, value]) => `${key}: ${sqlString(value)}`)
    .join(',\n        ');

  return `
    COPY (
      SELECT * FROM read_csv([${files}], header = true, all_varchar = true, union_by_name = true)
    ) TO ${sqlString(parquetPath)} (
      FORMAT PARQUET,
      COMPRESSION ZSTD,
      KV_METADATA {
        ${kvMetadataEntries}
      }
    );
  `;
}

export async function listShardFiles(jobDir: string): Promise<string[]> {
  const entries = await fs.readdir(jobDir);
  return entries
    .filter((name) => SHARD_FILE_PATTERN.test(name))
    .sort()
    .map((name) => path.join(jobDir, name));
}

/**
 * Exports a completed job directory to `<jobDir>/signals.parquet`.
 * The job must have its completion marker; partial jobs are refused.
 * Returns the file written, or null for a job with no shards.
 */
export async function exportJobToParquet(jobDir: string, logger: Logger = silentLogger): Promise<string | null> {
  const metadata = await readMetadataFile(jobDir);
  if (!metadata) {
    throw new Error(`job in ${jobDir} has not completed; no completion metadata found`);
  }
  const shardFiles = await listShardFiles(jobDir);
  if (shardFiles.length !== metadata.shardCount) {
    throw new Error(`expected ${metadata.shardCount} shard files in ${jobDir}, found ${shardFiles.length}`);
  }
  const parquetPath = path.join(jobDir, PARQUET_FILENAME);
  if (shardFiles.length === 0) {
    logger.warn('Job has no shards, skipping Parquet export', { jobDir });
    return null;
  }

  // Loaded here so the native binding is only needed for an actual export.
  const { DuckDBInstance } = await import('@duckdb/node-api');
  const instance = await DuckDBInstance.create(':memory:');
  const connection = await instance.connect();
  try {
    await connection.run(buildExportSql(shardFiles, parquetPath, buildKvMetadata(metadata)));
  } finally {
    connection.closeSync();
  }
  logger.info('Parquet file written', { path: parquetPath, shards: shardFiles.length });
  return parquetPath;
}
