// src/errors.ts
// Error taxonomy for collection and batch processing.
// Library code throws these; only the CLI entry points decide how to exit.

/**
 * Base class so callers can tell our failures apart from anything thrown by
 * a dependency.
 */
export class SignalsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fatal at startup: bad settings, namespace collisions, missing tokens. */
export class ConfigurationError extends SignalsError {}

export type NamespaceProblem = 'invalid' | 'collision';

export class NamespaceError extends ConfigurationError {
  constructor(
    readonly namespace: string,
    readonly problem: NamespaceProblem
  ) {
    super(
      problem === 'collision'
        ? `namespace "${namespace}" is already registered`
        : `namespace "${namespace}" is not valid`
    );
  }
}

/** A malformed repository identifier in the input. */
export class InputError extends SignalsError {}

/**
 * The repository cannot be collected at all (no source supports it, or it was
 * renamed, deleted or made private upstream). Callers skip it and continue.
 */
export class UncollectableRepoError extends SignalsError {
  constructor(
    readonly repo: string,
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`repo cannot be collected: ${repo}: ${reason}`, options);
  }
}

export class SourceFetchError extends SignalsError {
  constructor(
    readonly namespace: string,
    readonly repo: string,
    cause: unknown
  ) {
    super(`source "${namespace}" failed for ${repo}: ${errorMessage(cause)}`, { cause });
  }
}

export class ShardFailedError extends SignalsError {
  constructor(
    readonly shard: number,
    readonly attempts: number,
    cause?: unknown
  ) {
    super(
      cause === undefined
        ? `shard ${shard} exhausted ${attempts} attempts`
        : `shard ${shard} failed after ${attempts} attempts: ${errorMessage(cause)}`,
      { cause }
    );
  }
}

export type CheckpointOperation = 'load' | 'save' | 'clear';

export class CheckpointError extends SignalsError {
  constructor(
    readonly operation: CheckpointOperation,
    readonly filePath: string,
    cause: unknown
  ) {
    super(`checkpoint ${operation} failed for ${filePath}: ${errorMessage(cause)}`, { cause });
  }
}

/** The input or shard size changed since the checkpoint was written. */
export class RestoreIntegrityError extends SignalsError {
  constructor(
    readonly expectedShards: number,
    readonly actualShards: number
  ) {
    super(`restore state shard mismatch: got = ${actualShards}; want = ${expectedShards}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/** Node's fs errors carry a string `code`; anything else has none. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
