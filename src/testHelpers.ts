// src/testHelpers.ts
// Fakes shared by the test files.

import type { Checkpoint, CheckpointStore } from './checkpoint';
import type { CompletionMetadata, ResultStore } from './ResultStore';
import type { RepoIdentity } from './repo';
import {
  defineSchema,
  type FetchOptions,
  type FieldMap,
  type SignalSchema,
  type SignalSet,
  type SignalSource,
} from './signal';

const fakeFields = { count: 'int', label: 'string' } as const;

/**
 * A source that supports repositories matching `supports` and returns a set
 * with `count` filled in, or throws `failWith`.
 */
export class FakeSource implements SignalSource {
  readonly schema: SignalSchema<typeof fakeFields>;
  readonly calls: Array<{ repo: string; jobId: string }> = [];

  constructor(
    namespace: string,
    private readonly behaviour: {
      supports?: (repo: RepoIdentity) => boolean;
      count?: number;
      /** Thrown for every repository, or for those the function picks. */
      failWith?: unknown;
      failFor?: (repo: RepoIdentity) => boolean;
      returnSet?: () => SignalSet;
    } = {}
  ) {
    this.schema = defineSchema(namespace, fakeFields);
  }

  emptySet(): SignalSet {
    return this.schema.empty();
  }

  supports(repo: RepoIdentity): boolean {
    return this.behaviour.supports ? this.behaviour.supports(repo) : true;
  }

  async fetch(repo: RepoIdentity, options: FetchOptions): Promise<SignalSet> {
    this.calls.push({ repo: repo.canonical, jobId: options.jobId });
    if (this.behaviour.failWith !== undefined && (this.behaviour.failFor?.(repo) ?? true)) {
      throw this.behaviour.failWith;
    }
    if (this.behaviour.returnSet) {
      return this.behaviour.returnSet();
    }
    return this.schema.populate({ count: this.behaviour.count ?? 1, label: repo.name });
  }
}

/** A source whose template reports an arbitrary (possibly invalid) namespace. */
export function sourceWithNamespace(namespace: string, fields: FieldMap = { value: 'int' }): SignalSource {
  const schema = defineSchema(namespace, fields);
  return {
    emptySet: () => schema.empty(),
    supports: () => true,
    fetch: async () => schema.empty(),
  };
}

export class MemoryCheckpointStore implements CheckpointStore {
  readonly location = 'memory';
  readonly saves: Checkpoint[] = [];
  cleared = false;

  constructor(private current: Checkpoint | null = null) {}

  get checkpoint(): Checkpoint | null {
    return this.current ? { ...this.current } : null;
  }

  async load(): Promise<Checkpoint | null> {
    return this.current ? { ...this.current } : null;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    this.current = { ...checkpoint };
    this.saves.push({ ...checkpoint });
  }

  async clear(): Promise<void> {
    this.current = null;
    this.cleared = true;
  }
}

export class MemoryResultStore implements ResultStore {
  readonly location = 'memory';
  readonly files = new Map<string, string>();
  readonly metadata: CompletionMetadata[] = [];

  static key(shard: number, jobTime: Date): string {
    return `${jobTime.toISOString()}/${shard}`;
  }

  async exists(shard: number, jobTime: Date): Promise<boolean> {
    return this.files.has(MemoryResultStore.key(shard, jobTime));
  }

  async write(shard: number, jobTime: Date, contents: string): Promise<void> {
    this.files.set(MemoryResultStore.key(shard, jobTime), contents);
  }

  async writeMetadata(metadata: CompletionMetadata): Promise<void> {
    this.metadata.push({ ...metadata });
  }

  async readMetadata(jobTime: Date): Promise<CompletionMetadata | null> {
    return this.metadata.find((m) => m.jobTime.getTime() === jobTime.getTime()) ?? null;
  }
}
