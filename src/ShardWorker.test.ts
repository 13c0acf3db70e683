import { describe, expect, it } from 'vitest';

import type { RepoIdentity } from './repo';

import { Collector, type FailurePolicy } from './Collector';
import { SourceFetchError } from './errors';
import { Scorer } from './Scorer';
import { defineSchema, type FetchOptions, type SignalSet, type SignalSource } from './signal';
import { ShardWorker } from './ShardWorker';
import { SourceRegistry } from './SourceRegistry';
import { FakeSource, MemoryCheckpointStore, MemoryResultStore } from './testHelpers';
import { WorkLoop } from './WorkLoop';

const jobTime = new Date('2024-05-01T00:00:00.000Z');

function setup(sources: FakeSource[], options: { failurePolicy?: FailurePolicy; scorer?: Scorer; concurrency?: number } = {}) {
  const registry = new SourceRegistry();
  registry.registerAll(sources);
  const primary = new MemoryResultStore();
  const raw = new MemoryResultStore();
  const worker = new ShardWorker({
    collector: new Collector(registry, { failurePolicy: options.failurePolicy }),
    primary,
    raw,
    scorer: options.scorer,
    concurrency: options.concurrency,
  });
  return { worker, primary, raw };
}

const githubOnly = { supports: (repo: { host: string }) => repo.host === 'github.com' };

describe('ShardWorker.process', () => {
  it('writes a CSV and a JSON-lines file for the shard', async () => {
    const { worker, primary, raw } = setup([new FakeSource('a', githubOnly)]);

    const summary = await worker.process({ shard: 3, jobTime, repos: ['https://github.com/acme/one'] });

    expect(summary).toEqual({ collected: 1, skipped: 0 });
    expect(primary.files.get(MemoryResultStore.key(3, jobTime))).toBe('a.count,a.label\n1,one\n');
    expect(raw.files.get(MemoryResultStore.key(3, jobTime))).toBe('{"a":{"count":1,"label":"one"}}\n');
  });

  it('skips malformed and uncollectable repositories', async () => {
    const { worker, primary } = setup([new FakeSource('a', githubOnly)]);

    const summary = await worker.process({
      shard: 0,
      jobTime,
      repos: ['https://github.com/acme/one', 'not a url', 'https://gitlab.com/acme/two'],
    });

    expect(summary).toEqual({ collected: 1, skipped: 2 });
    expect(primary.files.get(MemoryResultStore.key(0, jobTime))).toBe('a.count,a.label\n1,one\n');
  });

  it('writes the header even when every repository is skipped', async () => {
    const { worker, primary, raw } = setup([new FakeSource('a', githubOnly)]);

    await worker.process({ shard: 0, jobTime, repos: ['https://gitlab.com/acme/two'] });

    expect(primary.files.get(MemoryResultStore.key(0, jobTime))).toBe('a.count,a.label\n');
    expect(raw.files.get(MemoryResultStore.key(0, jobTime))).toBe('');
  });

  it('adds the score column named after the scorer', async () => {
    const scorer = Scorer.fromConfig('s', 'inputs:\n  - field: a.count\n    weight: 1\n    bounds: { upper: 2 }\n');
    const { worker, primary, raw } = setup([new FakeSource('a')], { scorer });

    await worker.process({ shard: 0, jobTime, repos: ['https://github.com/acme/one'] });

    expect(primary.files.get(MemoryResultStore.key(0, jobTime))).toBe('a.count,a.label,s\n1,one,0.50000\n');
    expect(raw.files.get(MemoryResultStore.key(0, jobTime))).toBe('{"a":{"count":1,"label":"one"}}\n');
  });

  it('passes the job time as the job id', async () => {
    const source = new FakeSource('a');
    const { worker } = setup([source]);

    await worker.process({ shard: 0, jobTime, repos: ['https://github.com/acme/one'] });

    expect(source.calls).toEqual([{ repo: 'https://github.com/acme/one', jobId: '2024-05-01T00:00:00.000Z' }]);
  });

  it('keeps input order when collecting concurrently', async () => {
    const { worker, primary } = setup([new FakeSource('a')], { concurrency: 2 });

    await worker.process({
      shard: 0,
      jobTime,
      repos: ['https://github.com/acme/one', 'https://github.com/acme/two', 'https://github.com/acme/three'],
    });

    expect(primary.files.get(MemoryResultStore.key(0, jobTime))).toBe('a.count,a.label\n1,one\n1,two\n1,three\n');
  });

  it('writes nothing when a source fails under fail-fast', async () => {
    const { worker, primary, raw } = setup([new FakeSource('a', { failWith: new Error('rate limited') })]);

    await expect(worker.process({ shard: 0, jobTime, repos: ['https://github.com/acme/one'] })).rejects.toThrow(
      SourceFetchError
    );
    expect(primary.files.size).toBe(0);
    expect(raw.files.size).toBe(0);
  });

  it('writes the empty template for a failing source under lenient', async () => {
    const { worker, primary } = setup([new FakeSource('a'), new FakeSource('b', { failWith: new Error('rate limited') })], {
      failurePolicy: 'lenient',
    });

    await worker.process({ shard: 0, jobTime, repos: ['https://github.com/acme/one'] });

    expect(primary.files.get(MemoryResultStore.key(0, jobTime))).toBe('a.count,a.label,b.count,b.label\n1,one,,\n');
  });

  it('rejects a concurrency that is not a positive integer', () => {
    expect(() => setup([new FakeSource('a')], { concurrency: 0 })).toThrow(RangeError);
  });
});

/** Fails `acme/r0` after a tick and answers every other repository after a longer delay. */
class SlowSource implements SignalSource {
  readonly schema = defineSchema('slow', { count: 'int' });
  inFlight = 0;
  maxInFlight = 0;
  readonly abortedWhileRunning: string[] = [];

  emptySet(): SignalSet {
    return this.schema.empty();
  }

  supports(): boolean {
    return true;
  }

  async fetch(repo: RepoIdentity, options: FetchOptions): Promise<SignalSet> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (repo.name === 'r0') {
        await new Promise((resolve) => setTimeout(resolve, 5));
        throw new Error('provider down');
      }
      await new Promise((resolve) => setTimeout(resolve, 40));
      if (options.signal?.aborted) {
        this.abortedWhileRunning.push(repo.name);
      }
      return this.schema.populate({ count: 1 });
    } finally {
      this.inFlight--;
    }
  }
}

describe('ShardWorker concurrency', () => {
  const repos = ['https://github.com/acme/r0', 'https://github.com/acme/r1'];

  function slowWorker(source: SlowSource) {
    const registry = new SourceRegistry();
    registry.register(source);
    const primary = new MemoryResultStore();
    const raw = new MemoryResultStore();
    return { worker: new ShardWorker({ collector: new Collector(registry), primary, raw, concurrency: 2 }), primary, raw };
  }

  it('settles every repository of a failed attempt before rejecting', async () => {
    const source = new SlowSource();
    const { worker, primary } = slowWorker(source);

    await expect(worker.process({ shard: 0, jobTime, repos })).rejects.toThrow(SourceFetchError);

    expect(source.inFlight).toBe(0);
    expect(source.abortedWhileRunning).toEqual(['r1']);
    expect(primary.files.size).toBe(0);
  });

  it('never overlaps the attempts of a shard', async () => {
    const source = new SlowSource();
    const { worker, primary, raw } = slowWorker(source);
    const loop = new WorkLoop({
      input: repos,
      shardSize: 2,
      maxAttempts: 3,
      worker,
      checkpoints: new MemoryCheckpointStore(),
      primary,
      raw,
      jobTime,
    });

    await expect(loop.run()).rejects.toThrow('shard 0 failed after 3 attempts');

    expect(source.maxInFlight).toBe(2);
    expect(source.inFlight).toBe(0);
  });
});
