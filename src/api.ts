// src/api.ts
// This module encapsulates all interactions with the GitHub GraphQL API.
//
// Sources depend on the small GraphQLQuerier interface rather than on
// graphql-request directly, so tests can hand them a fake.

import { ClientError, GraphQLClient } from 'graphql-request';
import { z } from 'zod';

import { SignalsError } from './errors';
import { silentLogger, type Logger } from './logger';

export const GITHUB_GRAPHQL_URL = 'https://api.github.com/graphql';

export type QueryVariables = Record<string, string | number | boolean>;

export interface GraphQLQuerier {
  query(document: string, variables: QueryVariables, signal?: AbortSignal): Promise<unknown>;
}

/** The API answered NOT_FOUND: renamed, deleted or private. */
export class GitHubNotFoundError extends SignalsError {}

/**
 * Creates and configures a GraphQLClient for the GitHub API.
 * @param token - The GitHub Personal Access Token.
 */
export function createApiClient(token: string): GraphQLClient {
  return new GraphQLClient(GITHUB_GRAPHQL_URL, {
    headers: {
      Authorization: `Bearer ${token}`,
    },
  });
}

const graphqlErrorsSchema = z.array(
  z
    .object({
      type: z.string().optional(),
      message: z.string().optional(),
    })
    .passthrough()
);

/** GitHub tags each GraphQL error with a `type` such as NOT_FOUND or RATE_LIMITED. */
export function graphqlErrorTypes(errors: unknown): string[] {
  const parsed = graphqlErrorsSchema.safeParse(errors);
  if (!parsed.success) {
    return [];
  }
  return parsed.data.flatMap((error) => (error.type ? [error.type] : []));
}

function headerValue(headers: unknown, name: string): string | null {
  if (typeof headers === 'object' && headers !== null && 'get' in headers && typeof headers.get === 'function') {
    const value: unknown = headers.get(name);
    return typeof value === 'string' ? value : null;
  }
  return null;
}

export class GitHubClient implements GraphQLQuerier {
  constructor(
    private readonly client: GraphQLClient,
    private readonly logger: Logger = silentLogger
  ) {}

  static fromToken(token: string, logger?: Logger): GitHubClient {
    return new GitHubClient(createApiClient(token), logger);
  }

  async query(document: string, variables: QueryVariables, signal?: AbortSignal): Promise<unknown> {
    try {
      return await this.client.request<unknown>({ document, variables, signal });
    } catch (error: unknown) {
      if (error instanceof ClientError) {
        this.reportClientError(error, variables);
        if (graphqlErrorTypes(error.response.errors).includes('NOT_FOUND')) {
          throw new GitHubNotFoundError('GitHub reported NOT_FOUND', { cause: error });
        }
      }
      throw error;
    }
  }

  private reportClientError(error: ClientError, variables: QueryVariables): void {
    const fields: Record<string, unknown> = { variables, status: error.response.status };
    if (error.response.errors) {
      fields.errors = error.response.errors.map((e) => e.message);
    }
    // Surface rate limit info if present
    const remaining = headerValue(error.response.headers, 'x-ratelimit-remaining');
    const reset = headerValue(error.response.headers, 'x-ratelimit-reset');
    if (remaining !== null) {
      fields.rateLimitRemaining = remaining;
    }
    if (reset !== null) {
      fields.rateLimitReset = new Date(Number(reset) * 1000);
    }
    this.logger.warn('[API] Request failed', fields);
  }
}
