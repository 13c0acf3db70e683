// src/sources/GitHubRepoSource.ts
// Basic repository metadata: popularity, age, activity, language and license.

import { z } from 'zod';

import { UncollectableRepoError } from '../errors';
import type { RepoIdentity } from '../repo';
import { defineSchema, type FetchOptions, type SignalSet } from '../signal';
import type { GraphQLQuerier } from '../api';
import { GitHubSource } from './GitHubSource';

export const REPO_QUERY = /* GraphQL */ `
  query RepoSignals($owner: String!, $name: String!) {
    repository(owner: $owner, name: $name) {
      url
      isArchived
      stargazerCount
      forkCount
      createdAt
      pushedAt
      primaryLanguage {
        name
      }
      licenseInfo {
        spdxId
      }
    }
  }
`;

export const repoSchema = defineSchema('repo', {
  url: 'string',
  language: 'string',
  license: 'string',
  star_count: 'int',
  fork_count: 'int',
  created_at: 'date',
  updated_at: 'date',
  archived: 'bool',
});

const repoResponseSchema = z.object({
  repository: z
    .object({
      url: z.string(),
      isArchived: z.boolean(),
      stargazerCount: z.number().int(),
      forkCount: z.number().int(),
      createdAt: z.string().datetime({ offset: true }),
      pushedAt: z.string().datetime({ offset: true }).nullable(),
      primaryLanguage: z.object({ name: z.string() }).nullable(),
      licenseInfo: z.object({ spdxId: z.string().nullable() }).nullable(),
    })
    .nullable(),
});

export class GitHubRepoSource extends GitHubSource<typeof repoSchema.fields> {
  constructor(client: GraphQLQuerier) {
    super(client, repoSchema);
  }

  async fetch(repo: RepoIdentity, options: FetchOptions): Promise<SignalSet<typeof repoSchema.fields>> {
    const data = await this.request(
      repo,
      REPO_QUERY,
      { owner: repo.owner, name: repo.name },
      repoResponseSchema,
      options.signal
    );
    const r = data.repository;
    if (!r) {
      throw new UncollectableRepoError(repo.canonical, 'repository not found or access denied');
    }
    return this.schema.populate({
      url: r.url,
      language: r.primaryLanguage?.name ?? null,
      license: r.licenseInfo?.spdxId ?? null,
      star_count: r.stargazerCount,
      fork_count: r.forkCount,
      created_at: new Date(r.createdAt),
      updated_at: r.pushedAt ? new Date(r.pushedAt) : null,
      archived: r.isArchived,
    });
  }
}
