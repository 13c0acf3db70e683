// src/sources/GitHubSource.ts
// Shared plumbing for sources backed by the GitHub GraphQL API.

import type { z } from 'zod';

import { GitHubNotFoundError, type GraphQLQuerier, type QueryVariables } from '../api';
import { UncollectableRepoError } from '../errors';
import type { RepoIdentity } from '../repo';
import type { FetchOptions, FieldMap, SignalSchema, SignalSet, SignalSource } from '../signal';

export const GITHUB_HOST = 'github.com';

export abstract class GitHubSource<F extends FieldMap> implements SignalSource {
  constructor(
    protected readonly client: GraphQLQuerier,
    readonly schema: SignalSchema<F>
  ) {}

  emptySet(): SignalSet<F> {
    return this.schema.empty();
  }

  supports(repo: RepoIdentity): boolean {
    return repo.host === GITHUB_HOST;
  }

  abstract fetch(repo: RepoIdentity, options: FetchOptions): Promise<SignalSet<F>>;

  /**
   * Runs a query and validates the response. NOT_FOUND turns into
   * UncollectableRepoError so the batch skips the repository.
   */
  protected async request<T>(
    repo: RepoIdentity,
    document: string,
    variables: QueryVariables,
    responseSchema: z.ZodType<T>,
    signal?: AbortSignal
  ): Promise<T> {
    let data: unknown;
    try {
      data = await this.client.query(document, variables, signal);
    } catch (error) {
      if (error instanceof GitHubNotFoundError) {
        throw new UncollectableRepoError(repo.canonical, 'repository not found on GitHub', { cause: error });
      }
      throw error;
    }
    const result = responseSchema.safeParse(data);
    if (!result.success) {
      throw new Error(`unexpected GitHub response for ${this.schema.namespace}: ${result.error.message}`);
    }
    return result.data;
  }
}

/** Signals are measured relative to the job time so retries agree. */
export function referenceTime(jobId: string, fallback: () => Date = () => new Date()): Date {
  const parsed = new Date(jobId);
  return Number.isNaN(parsed.getTime()) ? fallback() : parsed;
}

/** `YYYY-MM-DD`, as GitHub search qualifiers expect. */
export function searchDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
