// src/signal.ts
// Namespaced, ordered, typed field sets produced by signal sources.

import type { RepoIdentity } from './repo';

export type Namespace = string;

export type FieldKind = 'int' | 'float' | 'string' | 'bool' | 'date';

/** Runtime value type for each field kind. */
export interface FieldKindValue {
  int: number;
  float: number;
  string: string;
  bool: boolean;
  date: Date;
}

export type FieldValue = FieldKindValue[FieldKind];

/** Ordered field declarations: object key order is column order. */
export type FieldMap = Record<string, FieldKind>;

export type FieldValues<F extends FieldMap> = {
  [K in keyof F]?: FieldKindValue[F[K]] | null;
};

export interface Field {
  name: string;
  kind: FieldKind;
  /** null means unset, which is not the same as zero. */
  value: FieldValue | null;
}

/** Separates namespace and field name in output column names. */
export const NAMESPACE_SEPARATOR = '.';

const NAME_PATTERN = /^[a-z0-9_]+$/;

export function isValidNamespace(namespace: string): boolean {
  return NAME_PATTERN.test(namespace);
}

export function isValidFieldName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

function matchesKind(kind: FieldKind, value: FieldValue): boolean {
  switch (kind) {
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'float':
      return typeof value === 'number' && Number.isFinite(value);
    case 'string':
      return typeof value === 'string';
    case 'bool':
      return typeof value === 'boolean';
    case 'date':
      return value instanceof Date && !Number.isNaN(value.getTime());
  }
}

/**
 * Declares a namespace and its fields. Sources build one at construction time;
 * writers read the same description to lay out columns.
 *
 * The namespace itself is checked when the owning source is registered.
 */
export class SignalSchema<F extends FieldMap = FieldMap> {
  readonly fieldNames: readonly string[];

  constructor(
    readonly namespace: Namespace,
    readonly fields: F
  ) {
    this.fieldNames = Object.keys(fields);
    for (const name of this.fieldNames) {
      if (!isValidFieldName(name)) {
        throw new TypeError(`invalid field name "${name}" in namespace "${namespace}"`);
      }
    }
  }

  kindOf(name: string): FieldKind | undefined {
    return Object.prototype.hasOwnProperty.call(this.fields, name) ? this.fields[name] : undefined;
  }

  /** All fields unset. */
  empty(): SignalSet<F> {
    return new SignalSet(this);
  }

  populate(values: FieldValues<F>): SignalSet<F> {
    const set = new SignalSet(this);
    const byName: Partial<Record<string, FieldValue | null>> = values;
    for (const name of this.fieldNames) {
      const value = byName[name];
      if (value !== undefined) {
        set.set(name, value);
      }
    }
    return set;
  }
}

export function defineSchema<F extends FieldMap>(namespace: Namespace, fields: F): SignalSchema<F> {
  return new SignalSchema(namespace, fields);
}

export class SignalSet<F extends FieldMap = FieldMap> {
  private readonly values = new Map<string, FieldValue>();

  constructor(readonly schema: SignalSchema<F>) {}

  get namespace(): Namespace {
    return this.schema.namespace;
  }

  /** Checked at runtime against the schema; `populate` is the typed way in. */
  set(name: string, value: FieldValue | null): this {
    const kind = this.schema.kindOf(name);
    if (kind === undefined) {
      throw new TypeError(`unknown field "${name}" in namespace "${this.namespace}"`);
    }
    if (value === null) {
      this.values.delete(name);
      return this;
    }
    if (!matchesKind(kind, value)) {
      throw new TypeError(`field "${this.namespace}.${name}" expects ${kind}, got ${String(value)}`);
    }
    this.values.set(name, value);
    return this;
  }

  get(name: string): FieldValue | null {
    return this.values.get(name) ?? null;
  }

  isSet(name: string): boolean {
    return this.values.has(name);
  }

  /** True for an empty template: nothing has been collected. */
  isEmpty(): boolean {
    return this.values.size === 0;
  }

  fields(): Field[] {
    return this.schema.fieldNames.map((name) => ({
      name,
      kind: this.schema.fields[name],
      value: this.get(name),
    }));
  }
}

export interface FetchOptions {
  /** Job timestamp of the run, shared by every request in it. */
  jobId: string;
  signal?: AbortSignal;
}

/**
 * A pluggable producer of one namespace's signal set.
 *
 * `emptySet` must not do any I/O; the registry calls it to learn the
 * namespace and the output schema.
 */
export interface SignalSource {
  emptySet(): SignalSet;
  supports(repo: RepoIdentity): boolean;
  fetch(repo: RepoIdentity, options: FetchOptions): Promise<SignalSet>;
}
