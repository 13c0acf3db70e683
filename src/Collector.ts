// src/Collector.ts
// Collects one repository's record: exactly one signal set per registered
// source, in registration order.

import {
  ConfigurationError,
  SourceFetchError,
  UncollectableRepoError,
  errorMessage,
  isAbortError,
} from './errors';
import { silentLogger, type Logger } from './logger';
import type { RepoIdentity } from './repo';
import type { SignalSet, SignalSource } from './signal';
import type { SourceRegistry } from './SourceRegistry';

/**
 * - `fail-fast`: a failing source aborts the whole repository.
 * - `lenient`: a failing source is logged and replaced by its empty template.
 */
export const FAILURE_POLICIES = ['fail-fast', 'lenient'] as const;

export type FailurePolicy = (typeof FAILURE_POLICIES)[number];

export interface CollectorOptions {
  failurePolicy?: FailurePolicy;
  logger?: Logger;
}

export interface CollectOptions {
  jobId: string;
  signal?: AbortSignal;
}

export class Collector {
  readonly failurePolicy: FailurePolicy;
  private readonly logger: Logger;

  constructor(
    private readonly registry: SourceRegistry,
    options: CollectorOptions = {}
  ) {
    this.failurePolicy = options.failurePolicy ?? 'fail-fast';
    this.logger = options.logger ?? silentLogger;
  }

  /** Templates for every registered source; used to lay out the output. */
  emptySets(): SignalSet[] {
    return this.registry.emptySets();
  }

  /**
   * Fetches from every source that supports the repository and fills the rest
   * with empty templates. Nothing is cached between calls.
   *
   * @throws UncollectableRepoError when no source supports the repository, or
   *   when a source reports it gone.
   * @throws SourceFetchError under `fail-fast` when a source fails.
   */
  async collect(repo: RepoIdentity, options: CollectOptions): Promise<SignalSet[]> {
    const applicable = new Set(this.registry.sourcesFor(repo));
    if (applicable.size === 0) {
      throw new UncollectableRepoError(repo.canonical, 'no registered source supports this repository');
    }

    const sets: SignalSet[] = [];
    for (const source of this.registry.sources()) {
      options.signal?.throwIfAborted();
      if (applicable.has(source)) {
        sets.push(await this.fetchFrom(source, repo, options));
      } else {
        sets.push(source.emptySet());
      }
    }
    return sets;
  }

  private async fetchFrom(source: SignalSource, repo: RepoIdentity, options: CollectOptions): Promise<SignalSet> {
    const template = source.emptySet();
    let set: SignalSet;
    try {
      set = await source.fetch(repo, options);
    } catch (error) {
      if (error instanceof UncollectableRepoError || isAbortError(error) || options.signal?.aborted) {
        throw error;
      }
      if (this.failurePolicy === 'lenient') {
        this.logger.warn('Source failed, using empty signal set', {
          repo: repo.canonical,
          namespace: template.namespace,
          error: errorMessage(error),
        });
        return template;
      }
      throw new SourceFetchError(template.namespace, repo.canonical, error);
    }

    if (set.namespace !== template.namespace) {
      throw new ConfigurationError(
        `source for namespace "${template.namespace}" returned a set for "${set.namespace}"`
      );
    }
    return set;
  }
}
