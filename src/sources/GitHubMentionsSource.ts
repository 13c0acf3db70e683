// src/sources/GitHubMentionsSource.ts
// How often `owner/name` is mentioned in issues and pull requests outside
// the repository itself. A noisy signal, but a cheap proxy for dependents.

import { z } from 'zod';

import type { GraphQLQuerier } from '../api';
import type { RepoIdentity } from '../repo';
import { defineSchema, type FetchOptions, type SignalSet } from '../signal';
import { GitHubSource } from './GitHubSource';

export const MENTIONS_QUERY = /* GraphQL */ `
  query MentionSignals($query: String!) {
    search(query: $query, type: ISSUE, first: 1) {
      issueCount
    }
  }
`;

export const mentionsSchema = defineSchema('github_mentions', {
  github_mention_count: 'int',
});

const mentionsResponseSchema = z.object({
  search: z.object({ issueCount: z.number().int().min(0) }),
});

export function mentionQuery(repo: RepoIdentity): string {
  const fullName = `${repo.owner}/${repo.name}`;
  return `"${fullName}" -repo:${fullName}`;
}

export class GitHubMentionsSource extends GitHubSource<typeof mentionsSchema.fields> {
  constructor(client: GraphQLQuerier) {
    super(client, mentionsSchema);
  }

  async fetch(repo: RepoIdentity, options: FetchOptions): Promise<SignalSet<typeof mentionsSchema.fields>> {
    const data = await this.request(
      repo,
      MENTIONS_QUERY,
      { query: mentionQuery(repo) },
      mentionsResponseSchema,
      options.signal
    );
    return this.schema.populate({ github_mention_count: data.search.issueCount });
  }
}
