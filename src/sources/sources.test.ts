import { describe, expect, it } from 'vitest';

import { GitHubNotFoundError, type GraphQLQuerier, type QueryVariables } from '../api';
import { UncollectableRepoError } from '../errors';
import { parseRepoUrl } from '../repo';
import { GitHubIssuesSource } from './GitHubIssuesSource';
import { GitHubMentionsSource, mentionQuery } from './GitHubMentionsSource';
import { GitHubRepoSource } from './GitHubRepoSource';
import { buildRegistry, defaultSources } from './index';

class FakeQuerier implements GraphQLQuerier {
  readonly variables: QueryVariables[] = [];

  constructor(private readonly respond: (variables: QueryVariables) => unknown) {}

  async query(_document: string, variables: QueryVariables): Promise<unknown> {
    this.variables.push(variables);
    return this.respond(variables);
  }
}

const repo = parseRepoUrl('https://github.com/acme/widget');
const jobId = '2024-05-01T00:00:00.000Z';

const repository = {
  url: 'https://github.com/acme/widget',
  isArchived: false,
  stargazerCount: 1200,
  forkCount: 30,
  createdAt: '2020-01-01T00:00:00Z',
  pushedAt: '2024-04-30T12:00:00Z',
  primaryLanguage: { name: 'TypeScript' },
  licenseInfo: { spdxId: 'MIT' },
};

describe('GitHubRepoSource', () => {
  it('maps the repository metadata', async () => {
    const querier = new FakeQuerier(() => ({ repository }));

    const set = await new GitHubRepoSource(querier).fetch(repo, { jobId });

    expect(querier.variables).toEqual([{ owner: 'acme', name: 'widget' }]);
    expect(set.namespace).toBe('repo');
    expect(set.fields().map((f) => [f.name, f.value])).toEqual([
      ['url', 'https://github.com/acme/widget'],
      ['language', 'TypeScript'],
      ['license', 'MIT'],
      ['star_count', 1200],
      ['fork_count', 30],
      ['created_at', new Date('2020-01-01T00:00:00.000Z')],
      ['updated_at', new Date('2024-04-30T12:00:00.000Z')],
      ['archived', false],
    ]);
  });

  it('leaves missing optional metadata unset', async () => {
    const querier = new FakeQuerier(() => ({
      repository: { ...repository, pushedAt: null, primaryLanguage: null, licenseInfo: null },
    }));

    const set = await new GitHubRepoSource(querier).fetch(repo, { jobId });

    expect(set.isSet('language')).toBe(false);
    expect(set.isSet('license')).toBe(false);
    expect(set.isSet('updated_at')).toBe(false);
    expect(set.get('star_count')).toBe(1200);
  });

  it('treats a null repository as uncollectable', async () => {
    const source = new GitHubRepoSource(new FakeQuerier(() => ({ repository: null })));

    await expect(source.fetch(repo, { jobId })).rejects.toThrow(UncollectableRepoError);
  });

  it('treats NOT_FOUND as uncollectable', async () => {
    const source = new GitHubRepoSource(
      new FakeQuerier(() => {
        throw new GitHubNotFoundError('GitHub reported NOT_FOUND');
      })
    );

    await expect(source.fetch(repo, { jobId })).rejects.toMatchObject({
      message: 'repo cannot be collected: https://github.com/acme/widget: repository not found on GitHub',
    });
  });

  it('passes other errors through', async () => {
    const failure = new Error('socket hang up');
    const source = new GitHubRepoSource(
      new FakeQuerier(() => {
        throw failure;
      })
    );

    await expect(source.fetch(repo, { jobId })).rejects.toBe(failure);
  });

  it('rejects a response of the wrong shape', async () => {
    const source = new GitHubRepoSource(new FakeQuerier(() => ({ repository: { url: 42 } })));

    await expect(source.fetch(repo, { jobId })).rejects.toThrow(/^unexpected GitHub response for repo: /);
  });

  it('supports github.com repositories only', () => {
    const source = new GitHubRepoSource(new FakeQuerier(() => ({})));

    expect(source.supports(repo)).toBe(true);
    expect(source.supports(parseRepoUrl('https://gitlab.com/acme/widget'))).toBe(false);
  });
});

describe('GitHubIssuesSource', () => {
  it('searches a window ending at the job time', () => {
    const source = new GitHubIssuesSource(new FakeQuerier(() => ({})));

    expect(source.searchQueries(repo, jobId)).toEqual({
      updated: 'repo:acme/widget is:issue updated:>=2024-02-01',
      closed: 'repo:acme/widget is:issue is:closed closed:>=2024-02-01',
    });
  });

  it('falls back to the current time when the job id is not a date', () => {
    const source = new GitHubIssuesSource(new FakeQuerier(() => ({})), {
      lookbackDays: 30,
      now: () => new Date('2024-03-31T10:00:00.000Z'),
    });

    expect(source.searchQueries(repo, 'job-1').updated).toBe('repo:acme/widget is:issue updated:>=2024-03-01');
  });

  it('counts updated and closed issues', async () => {
    const querier = new FakeQuerier(() => ({ updated: { issueCount: 12 }, closed: { issueCount: 5 } }));

    const set = await new GitHubIssuesSource(querier).fetch(repo, { jobId });

    expect(set.get('updated_count')).toBe(12);
    expect(set.get('closed_count')).toBe(5);
    expect(querier.variables).toEqual([
      {
        updated: 'repo:acme/widget is:issue updated:>=2024-02-01',
        closed: 'repo:acme/widget is:issue is:closed closed:>=2024-02-01',
      },
    ]);
  });
});

describe('GitHubMentionsSource', () => {
  it('searches for mentions outside the repository', async () => {
    const querier = new FakeQuerier(() => ({ search: { issueCount: 42 } }));

    const set = await new GitHubMentionsSource(querier).fetch(repo, { jobId });

    expect(mentionQuery(repo)).toBe('"acme/widget" -repo:acme/widget');
    expect(querier.variables).toEqual([{ query: '"acme/widget" -repo:acme/widget' }]);
    expect(set.get('github_mention_count')).toBe(42);
  });
});

describe('buildRegistry', () => {
  const sources = defaultSources(new FakeQuerier(() => ({})));

  it('registers the built-in sources in order', () => {
    expect(buildRegistry(sources).namespaces()).toEqual(['repo', 'issues', 'github_mentions']);
  });

  it('leaves out disabled sources', () => {
    expect(buildRegistry(sources, ['issues']).namespaces()).toEqual(['repo', 'github_mentions']);
  });

  it('refuses to disable an unknown source', () => {
    expect(() => buildRegistry(sources, ['scorecard'])).toThrow('cannot disable unknown source(s): scorecard');
  });

  it('refuses to disable every source', () => {
    expect(() => buildRegistry(sources, ['repo', 'issues', 'github_mentions'])).toThrow('every source is disabled');
  });
});
