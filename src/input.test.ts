import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PassThrough, Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { batch, nonBlankLines, readLines } from './input';

async function toArray<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

describe('batch', () => {
  it('groups items into shards with a short last shard', async () => {
    const items = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

    expect(await toArray(batch(items, 3))).toEqual([[0, 1, 2], [3, 4, 5], [6, 7, 8], [9]]);
  });

  it('yields no shard for empty input', async () => {
    expect(await toArray(batch([], 3))).toEqual([]);
  });

  it('yields exact shards when the input divides evenly', async () => {
    expect(await toArray(batch(['a', 'b', 'c', 'd'], 2))).toEqual([
      ['a', 'b'],
      ['c', 'd'],
    ]);
  });

  it('rejects a shard size that is not a positive integer', async () => {
    await expect(toArray(batch([1], 0))).rejects.toThrow(RangeError);
    await expect(toArray(batch([1], 1.5))).rejects.toThrow('shard size must be a positive integer, got 1.5');
  });
});

describe('nonBlankLines', () => {
  it('trims lines and drops blank ones', async () => {
    expect(await toArray(nonBlankLines(['  a ', '', '   ', 'b']))).toEqual(['a', 'b']);
  });
});

describe('readLines', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'input-test-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads every file in order', async () => {
    const first = path.join(dir, 'first.txt');
    const second = path.join(dir, 'second.txt');
    await fs.writeFile(first, 'https://github.com/acme/one\nhttps://github.com/acme/two\n');
    await fs.writeFile(second, 'https://github.com/acme/three\r\n');

    expect(await toArray(readLines([first, second]))).toEqual([
      'https://github.com/acme/one',
      'https://github.com/acme/two',
      'https://github.com/acme/three',
    ]);
  });

  it('reads standard input for "-"', async () => {
    const stdin = Readable.from(['x\ny\n']);

    expect(await toArray(readLines(['-'], stdin))).toEqual(['x', 'y']);
  });

  it('destroys a file stream when reading stops early', async () => {
    const file = new PassThrough();
    file.write('https://github.com/acme/one\nhttps://github.com/acme/two\n');
    const lines = readLines(['repos.txt'], new PassThrough(), () => file);

    expect(await lines.next()).toEqual({ done: false, value: 'https://github.com/acme/one' });
    await lines.return(undefined);

    expect(file.destroyed).toBe(true);
  });

  it('leaves stdin open when reading stops early', async () => {
    const stdin = new PassThrough();
    stdin.write('x\ny\n');
    const lines = readLines(['-'], stdin);

    expect(await lines.next()).toEqual({ done: false, value: 'x' });
    await lines.return(undefined);

    expect(stdin.destroyed).toBe(false);
  });
});
