// src/input.ts
// Newline-delimited input and shard batching.

import * as fs from 'fs';
import * as readline from 'readline';
import type { Readable } from 'stream';

/** Path that stands for standard input. */
export const STDIN_PATH = '-';

export type OpenFile = (filePath: string) => Readable;

const openFile: OpenFile = (filePath) => fs.createReadStream(filePath, { encoding: 'utf-8' });

/**
 * Yields every line of each file in order. `-` reads from `stdin`, which is
 * left open when reading stops; file streams are destroyed.
 */
export async function* readLines(
  paths: readonly string[],
  stdin: Readable = process.stdin,
  open: OpenFile = openFile
): AsyncGenerator<string> {
  for (const filePath of paths) {
    const input = filePath === STDIN_PATH ? stdin : open(filePath);
    const lines = readline.createInterface({ input, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        yield line;
      }
    } finally {
      lines.close();
      if (input !== stdin) {
        input.destroy();
      }
    }
  }
}

export async function* nonBlankLines(lines: AsyncIterable<string> | Iterable<string>): AsyncGenerator<string> {
  for await (const line of lines) {
    const trimmed = line.trim();
    if (trimmed) {
      yield trimmed;
    }
  }
}

/**
 * Groups items into shards of `size`; the last shard may be shorter.
 */
export async function* batch<T>(items: AsyncIterable<T> | Iterable<T>, size: number): AsyncGenerator<T[]> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`shard size must be a positive integer, got ${size}`);
  }
  let current: T[] = [];
  for await (const item of items) {
    current.push(item);
    if (current.length === size) {
      yield current;
      current = [];
    }
  }
  if (current.length > 0) {
    yield current;
  }
}
