// src/sources/GitHubIssuesSource.ts
// Issue activity over a trailing window, counted with GitHub search.

import { z } from 'zod';

import type { GraphQLQuerier } from '../api';
import type { RepoIdentity } from '../repo';
import { defineSchema, type FetchOptions, type SignalSet } from '../signal';
import { GitHubSource, referenceTime, searchDate } from './GitHubSource';

export const ISSUES_QUERY = /* GraphQL */ `
  query IssueSignals($updated: String!, $closed: String!) {
    updated: search(query: $updated, type: ISSUE, first: 1) {
      issueCount
    }
    closed: search(query: $closed, type: ISSUE, first: 1) {
      issueCount
    }
  }
`;

export const DEFAULT_LOOKBACK_DAYS = 90;

const DAY_MS = 24 * 60 * 60 * 1000;

export const issuesSchema = defineSchema('issues', {
  updated_count: 'int',
  closed_count: 'int',
});

const countSchema = z.object({ issueCount: z.number().int().min(0) });

const issuesResponseSchema = z.object({
  updated: countSchema,
  closed: countSchema,
});

export interface IssuesSourceOptions {
  lookbackDays?: number;
  now?: () => Date;
}

export class GitHubIssuesSource extends GitHubSource<typeof issuesSchema.fields> {
  private readonly lookbackDays: number;
  private readonly now: () => Date;

  constructor(client: GraphQLQuerier, options: IssuesSourceOptions = {}) {
    super(client, issuesSchema);
    this.lookbackDays = options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  searchQueries(repo: RepoIdentity, jobId: string): { updated: string; closed: string } {
    const since = searchDate(new Date(referenceTime(jobId, this.now).getTime() - this.lookbackDays * DAY_MS));
    const scope = `repo:${repo.owner}/${repo.name} is:issue`;
    return {
      updated: `${scope} updated:>=${since}`,
      closed: `${scope} is:closed closed:>=${since}`,
    };
  }

  async fetch(repo: RepoIdentity, options: FetchOptions): Promise<SignalSet<typeof issuesSchema.fields>> {
    const data = await this.request(
      repo,
      ISSUES_QUERY,
      this.searchQueries(repo, options.jobId),
      issuesResponseSchema,
      options.signal
    );
    return this.schema.populate({
      updated_count: data.updated.issueCount,
      closed_count: data.closed.issueCount,
    });
  }
}
