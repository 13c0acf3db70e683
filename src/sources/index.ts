// src/sources/index.ts
// The built-in sources and the registry the CLIs build from them.
//
// To add a source:
// 1. Create a class extending GitHubSource (or implementing SignalSource)
//    with its own namespace and schema
// 2. Add it to defaultSources below; its position is its column position

import type { GraphQLQuerier } from '../api';
import { ConfigurationError } from '../errors';
import type { SignalSource } from '../signal';
import { SourceRegistry } from '../SourceRegistry';
import { GitHubIssuesSource } from './GitHubIssuesSource';
import { GitHubMentionsSource } from './GitHubMentionsSource';
import { GitHubRepoSource } from './GitHubRepoSource';

export { GitHubIssuesSource } from './GitHubIssuesSource';
export { GitHubMentionsSource } from './GitHubMentionsSource';
export { GitHubRepoSource } from './GitHubRepoSource';

export function defaultSources(client: GraphQLQuerier): SignalSource[] {
  return [new GitHubRepoSource(client), new GitHubIssuesSource(client), new GitHubMentionsSource(client)];
}

/**
 * Registers every source whose namespace is not disabled. Naming a namespace
 * that no source has is a configuration error, as is a namespace collision.
 */
export function buildRegistry(sources: readonly SignalSource[], disabled: readonly string[] = []): SourceRegistry {
  const known = new Set(sources.map((source) => source.emptySet().namespace));
  const unknown = disabled.filter((namespace) => !known.has(namespace));
  if (unknown.length > 0) {
    throw new ConfigurationError(`cannot disable unknown source(s): ${unknown.join(', ')}`);
  }

  const registry = new SourceRegistry();
  registry.registerAll(sources.filter((source) => !disabled.includes(source.emptySet().namespace)));
  if (registry.size === 0) {
    throw new ConfigurationError('every source is disabled');
  }
  return registry;
}
