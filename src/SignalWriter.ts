// src/SignalWriter.ts
// Output writers: one row per repository, one column per template field.
//
// Columns are `namespace.field` for every field of every registered template,
// in registration order, followed by the caller's extra columns (e.g. a score).

import type { Writable } from 'stream';

import { NAMESPACE_SEPARATOR, type FieldValue, type SignalSet } from './signal';

export interface ExtraField {
  key: string;
  value: string;
}

export interface SignalWriter {
  writeSignals(sets: readonly SignalSet[], extras?: readonly ExtraField[]): Promise<void>;
}

export type OutputFormat = 'csv' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['csv', 'json'];

/** Anything text can be written to. */
export interface TextSink {
  write(text: string): Promise<void>;
}

/** Collects output in memory, e.g. for a shard file written in one go. */
export class BufferSink implements TextSink {
  private readonly chunks: string[] = [];

  async write(text: string): Promise<void> {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

/** A sink over a stream; `end` flushes it and reports any stream failure. */
export interface StreamSink extends TextSink {
  end(): Promise<void>;
}

/**
 * Adapts a Node stream, waiting for 'drain' when the buffer is full. One
 * 'error' listener lives as long as the sink: a failure (such as a file that
 * cannot be opened) rejects the pending operation and every later one.
 */
export function streamSink(stream: Writable): StreamSink {
  let failure: Error | null = null;
  const pending = new Set<(error: Error) => void>();
  stream.on('error', (error: Error) => {
    failure = error;
    for (const fail of pending) {
      fail(error);
    }
    pending.clear();
  });

  const settle = (event: 'drain' | 'finish', resolve: () => void, reject: (error: Error) => void) => {
    const fail = (error: Error) => {
      stream.off(event, done);
      reject(error);
    };
    const done = () => {
      pending.delete(fail);
      resolve();
    };
    pending.add(fail);
    stream.once(event, done);
  };

  return {
    write: (text) =>
      new Promise<void>((resolve, reject) => {
        if (failure) {
          reject(failure);
          return;
        }
        if (stream.write(text, 'utf-8')) {
          resolve();
        } else {
          settle('drain', resolve, reject);
        }
      }),
    end: () =>
      new Promise<void>((resolve, reject) => {
        if (failure) {
          reject(failure);
          return;
        }
        settle('finish', resolve, reject);
        stream.end();
      }),
  };
}

export function columnName(namespace: string, field: string): string {
  return `${namespace}${NAMESPACE_SEPARATOR}${field}`;
}

export function columnsFor(emptySets: readonly SignalSet[], extraKeys: readonly string[] = []): string[] {
  const columns = emptySets.flatMap((set) => set.schema.fieldNames.map((field) => columnName(set.namespace, field)));
  return [...columns, ...extraKeys];
}

export function formatValue(value: FieldValue | null): string {
  if (value === null) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function escapeCsv(cell: string): string {
  return /[",\r\n]/.test(cell) ? `"${cell.replace(/"/g, '""')}"` : cell;
}

/**
 * Shared checks: the record must hold the template namespaces in order, and
 * the extras must be exactly the declared extra columns.
 */
abstract class BaseSignalWriter implements SignalWriter {
  protected readonly namespaces: readonly string[];

  constructor(
    protected readonly sink: TextSink,
    emptySets: readonly SignalSet[],
    protected readonly extraKeys: readonly string[]
  ) {
    this.namespaces = emptySets.map((set) => set.namespace);
  }

  async writeSignals(sets: readonly SignalSet[], extras: readonly ExtraField[] = []): Promise<void> {
    const namespaces = sets.map((set) => set.namespace);
    if (namespaces.join(',') !== this.namespaces.join(',')) {
      throw new Error(`record namespaces [${namespaces.join(', ')}] do not match output [${this.namespaces.join(', ')}]`);
    }
    const keys = extras.map((extra) => extra.key);
    if (keys.join(',') !== this.extraKeys.join(',')) {
      throw new Error(`extra fields [${keys.join(', ')}] do not match output [${this.extraKeys.join(', ')}]`);
    }
    await this.writeRecord(sets, extras);
  }

  protected abstract writeRecord(sets: readonly SignalSet[], extras: readonly ExtraField[]): Promise<void>;
}

export class CsvSignalWriter extends BaseSignalWriter {
  private readonly header: string[];
  private headerWritten = false;

  constructor(sink: TextSink, emptySets: readonly SignalSet[], extraKeys: readonly string[] = []) {
    super(sink, emptySets, extraKeys);
    this.header = columnsFor(emptySets, extraKeys);
  }

  /** Writes the header now, even if no rows follow. */
  async writeHeader(): Promise<void> {
    if (!this.headerWritten) {
      this.headerWritten = true;
      await this.sink.write(this.header.map(escapeCsv).join(',') + '\n');
    }
  }

  protected async writeRecord(sets: readonly SignalSet[], extras: readonly ExtraField[]): Promise<void> {
    await this.writeHeader();
    const cells = [
      ...sets.flatMap((set) => set.fields().map((field) => formatValue(field.value))),
      ...extras.map((extra) => extra.value),
    ];
    await this.sink.write(cells.map(escapeCsv).join(',') + '\n');
  }
}

type JsonValue = string | number | boolean | null;

/** One JSON object per line, nested by namespace; extras at the top level. */
export class JsonSignalWriter extends BaseSignalWriter {
  protected async writeRecord(sets: readonly SignalSet[], extras: readonly ExtraField[]): Promise<void> {
    const record: Record<string, Record<string, JsonValue> | string> = {};
    for (const set of sets) {
      const fields: Record<string, JsonValue> = {};
      for (const field of set.fields()) {
        fields[field.name] = field.value instanceof Date ? field.value.toISOString() : field.value;
      }
      record[set.namespace] = fields;
    }
    for (const extra of extras) {
      record[extra.key] = extra.value;
    }
    await this.sink.write(JSON.stringify(record) + '\n');
  }
}

export function createSignalWriter(
  format: OutputFormat,
  sink: TextSink,
  emptySets: readonly SignalSet[],
  extraKeys: readonly string[] = []
): SignalWriter {
  return format === 'json'
    ? new JsonSignalWriter(sink, emptySets, extraKeys)
    : new CsvSignalWriter(sink, emptySets, extraKeys);
}
