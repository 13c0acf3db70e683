// src/config.ts
// Worker configuration: a YAML file (config/worker.yml) validated with zod,
// with command-line overrides applied on top.

import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { z } from 'zod';

import { FAILURE_POLICIES, type FailurePolicy } from './Collector';
import { ConfigurationError } from './errors';
import { DEFAULT_MAX_ATTEMPTS } from './WorkLoop';

// ============================================================================
// FILE FORMAT
// ============================================================================

const failurePolicySchema = z.enum(FAILURE_POLICIES);

const workerFileSchema = z
  .object({
    'shard-size': z.number().int().positive().default(10),
    'max-attempts': z.number().int().positive().default(DEFAULT_MAX_ATTEMPTS),
    'input-files': z.array(z.string().min(1)).default([]),
    'state-file': z.string().min(1).optional(),
    'result-data-dir': z.string().min(1).optional(),
    'raw-result-data-dir': z.string().min(1).optional(),
    'failure-policy': failurePolicySchema.default('fail-fast'),
    concurrency: z.number().int().positive().default(1),
    'disabled-sources': z.array(z.string()).default([]),
    scoring: z
      .object({
        enabled: z.boolean().default(true),
        config: z.string().min(1).optional(),
        column: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type WorkerFile = z.infer<typeof workerFileSchema>;

// ============================================================================
// RESOLVED CONFIG
// ============================================================================

export interface ScoringConfig {
  enabled: boolean;
  /** Path to a scorer YAML file; the bundled default when absent. */
  configPath?: string;
  column?: string;
}

export interface WorkerConfig {
  shardSize: number;
  maxAttempts: number;
  inputFiles: string[];
  stateFile: string;
  resultDataDir: string;
  rawResultDataDir: string;
  failurePolicy: FailurePolicy;
  concurrency: number;
  disabledSources: string[];
  scoring: ScoringConfig;
}

/** Command-line values; anything set here wins over the file. */
export type WorkerOverrides = Partial<Omit<WorkerConfig, 'scoring'>> & {
  scoring?: Partial<ScoringConfig>;
};

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseWorkerConfig(source: string, origin = 'worker config'): WorkerFile {
  let parsed: unknown;
  try {
    parsed = yaml.parse(source) ?? {};
  } catch (error) {
    throw new ConfigurationError(`${origin} is not valid YAML`, { cause: error });
  }
  const result = workerFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`${origin} is invalid: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return result.data;
}

function required(value: string | undefined, key: string): string {
  if (!value) {
    throw new ConfigurationError(`"${key}" config not set`);
  }
  return value;
}

export function resolveWorkerConfig(file: WorkerFile, overrides: WorkerOverrides = {}): WorkerConfig {
  const inputFiles = overrides.inputFiles?.length ? overrides.inputFiles : file['input-files'];
  if (inputFiles.length === 0) {
    throw new ConfigurationError('"input-files" config not set');
  }

  const config: WorkerConfig = {
    shardSize: overrides.shardSize ?? file['shard-size'],
    maxAttempts: overrides.maxAttempts ?? file['max-attempts'],
    inputFiles,
    stateFile: required(overrides.stateFile ?? file['state-file'], 'state-file'),
    resultDataDir: required(overrides.resultDataDir ?? file['result-data-dir'], 'result-data-dir'),
    rawResultDataDir: required(overrides.rawResultDataDir ?? file['raw-result-data-dir'], 'raw-result-data-dir'),
    failurePolicy: overrides.failurePolicy ?? file['failure-policy'],
    concurrency: overrides.concurrency ?? file.concurrency,
    disabledSources: overrides.disabledSources ?? file['disabled-sources'],
    scoring: {
      enabled: overrides.scoring?.enabled ?? file.scoring.enabled,
      configPath: overrides.scoring?.configPath ?? file.scoring.config,
      column: overrides.scoring?.column ?? file.scoring.column,
    },
  };

  for (const [key, value] of [
    ['shard-size', config.shardSize],
    ['max-attempts', config.maxAttempts],
    ['concurrency', config.concurrency],
  ] as const) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigurationError(`"${key}" must be a positive integer, got ${value}`);
    }
  }
  if (config.resultDataDir === config.rawResultDataDir) {
    throw new ConfigurationError('"result-data-dir" and "raw-result-data-dir" must differ');
  }
  return config;
}

export async function loadWorkerConfig(filePath: string, overrides: WorkerOverrides = {}): Promise<WorkerConfig> {
  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`cannot read worker config ${filePath}`, { cause: error });
  }
  return resolveWorkerConfig(parseWorkerConfig(source, filePath), overrides);
}

/** GitHub token from the environment (.env is loaded by the CLI entry points). */
export function githubTokenFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  const token = env.GITHUB_TOKEN;
  if (!token) {
    throw new ConfigurationError('GITHUB_TOKEN environment variable is required');
  }
  return token;
}
