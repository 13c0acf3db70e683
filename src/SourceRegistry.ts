// src/SourceRegistry.ts
// The signal sources of one process, in registration order. The order is the
// output column order, and no two sources may share a namespace. One instance
// is built at startup and handed to the Collector.

import { NamespaceError } from './errors';
import type { RepoIdentity } from './repo';
import { isValidNamespace, type Namespace, type SignalSet, type SignalSource } from './signal';

export type RegistrationResult =
  | { ok: true; namespace: Namespace }
  | { ok: false; error: NamespaceError };

export class SourceRegistry {
  private readonly entries: Array<{ namespace: Namespace; source: SignalSource }> = [];

  /**
   * Registers a source. A collision or an invalid namespace is returned, not
   * thrown, so the caller decides whether it is fatal.
   */
  register(source: SignalSource): RegistrationResult {
    const namespace = source.emptySet().namespace;
    if (!isValidNamespace(namespace)) {
      return { ok: false, error: new NamespaceError(namespace, 'invalid') };
    }
    if (this.entries.some((entry) => entry.namespace === namespace)) {
      return { ok: false, error: new NamespaceError(namespace, 'collision') };
    }
    this.entries.push({ namespace, source });
    return { ok: true, namespace };
  }

  /** Registers each source in turn; the first failure is thrown. */
  registerAll(sources: Iterable<SignalSource>): void {
    for (const source of sources) {
      const result = this.register(source);
      if (!result.ok) {
        throw result.error;
      }
    }
  }

  get size(): number {
    return this.entries.length;
  }

  namespaces(): Namespace[] {
    return this.entries.map((entry) => entry.namespace);
  }

  sources(): SignalSource[] {
    return this.entries.map((entry) => entry.source);
  }

  /** One empty template per source, in registration order. */
  emptySets(): SignalSet[] {
    return this.entries.map((entry) => entry.source.emptySet());
  }

  sourcesFor(repo: RepoIdentity): SignalSource[] {
    return this.entries.filter((entry) => entry.source.supports(repo)).map((entry) => entry.source);
  }
}
