// src/repo.ts
// Repository identity: a parsed project URL compared by its canonical form.

import { InputError } from './errors';

export interface RepoIdentity {
  readonly url: URL;
  readonly host: string;
  readonly owner: string;
  readonly name: string;
  /** `https://<host>/<owner>/<name>`; the only basis for comparison. */
  readonly canonical: string;
  toString(): string;
}

class ProjectRepo implements RepoIdentity {
  readonly canonical: string;

  constructor(
    readonly url: URL,
    readonly host: string,
    readonly owner: string,
    readonly name: string
  ) {
    this.canonical = `https://${host}/${owner}/${name}`;
  }

  toString(): string {
    return this.canonical;
  }
}

/**
 * Parses `https://github.com/owner/name`, `github.com/owner/name` and the
 * like. Extra path segments (`/tree/main`) and a `.git` suffix are dropped.
 */
export function parseRepoUrl(raw: string): RepoIdentity {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new InputError('empty repository url');
  }
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (error) {
    throw new InputError(`invalid repository url: ${raw}`, { cause: error });
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new InputError(`unsupported url scheme "${url.protocol}" in ${raw}`);
  }

  const segments = url.pathname.split('/').filter(Boolean);
  if (segments.length < 2) {
    throw new InputError(`repository url must name an owner and a repository: ${raw}`);
  }
  const owner = segments[0];
  const name = segments[1].replace(/\.git$/, '');
  if (!name) {
    throw new InputError(`repository url must name an owner and a repository: ${raw}`);
  }

  const host = url.hostname.toLowerCase();
  return new ProjectRepo(new URL(`https://${host}/${owner}/${name}`), host, owner, name);
}

export function sameRepo(a: RepoIdentity, b: RepoIdentity): boolean {
  return a.canonical === b.canonical;
}
