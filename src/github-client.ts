import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { ConfigurationError, GitHubApiError, errorMessage } from './errors';
import { TokenBucket } from './rate-limiter';
import { isRepositoryFilter } from './types';
import type {
  Page,
  PullRequest,
  RateLimitStatus,
  Repository,
  RepositoryEvent,
  RepositoryFilter,
  RepositoryReference,
  Review,
} from './types';

export const GITHUB_API_URL = 'https://api.github.com';
export const PER_PAGE = 100;
export const LOW_QUOTA_THRESHOLD = 100;

export interface PullRequestListOptions {
  state: 'open' | 'closed' | 'all';
  sort: 'created' | 'updated' | 'popularity' | 'long-running';
  direction: 'asc' | 'desc';
  page: number;
  perPage?: number;
}

/**
 * Everything the monitors need from GitHub. `RestGitHubClient` talks to the REST API;
 * tests substitute an in-memory implementation.
 */
export interface GitHubClient {
  executeWithRateLimit<T>(operation: (signal?: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T>;
  getRateLimit(signal?: AbortSignal): Promise<RateLimitStatus>;
  listPullRequests(
    repository: RepositoryReference,
    options: PullRequestListOptions,
    signal?: AbortSignal,
  ): Promise<Page<PullRequest>>;
  listPullRequestReviews(repository: RepositoryReference, prNumber: number, signal?: AbortSignal): Promise<Review[]>;
  listUserRepositories(visibility: string, signal?: AbortSignal): Promise<Repository[]>;
  listOrganizationRepositories(org: string, visibility: string, signal?: AbortSignal): Promise<Repository[]>;
  listRepositoryEvents(
    repository: RepositoryReference,
    options: { page: number },
    signal?: AbortSignal,
  ): Promise<Page<RepositoryEvent>>;
  listUserEventsForOrganization(org: string, user: string, signal?: AbortSignal): Promise<RepositoryEvent[]>;
  listPublicEvents(signal?: AbortSignal): Promise<RepositoryEvent[]>;
}

interface RawUser {
  login: string;
}

interface RawPullRequest {
  number: number;
  title: string;
  html_url: string;
  user: RawUser | null;
  created_at: string;
  updated_at: string;
  merged_at: string | null;
}

interface RawReview {
  user: RawUser | null;
  state: string | null;
  submitted_at?: string | null;
}

interface RawRepository {
  name: string;
  full_name: string;
  owner: RawUser | null;
  private: boolean;
  created_at?: string | null;
}

interface RawEvent {
  type: string | null;
  repo: { name: string } | null;
  created_at: string | null;
}

interface RawRateLimit {
  resources: {
    core: {
      limit: number;
      remaining: number;
      reset: number;
    };
  };
}

const API_VISIBILITY: Record<RepositoryFilter, string> = {
  all: 'all',
  'public-only': 'public',
  'private-only': 'private',
};

function toDate(value: string | null | undefined): Date | null {
  return value ? new Date(value) : null;
}

function toPullRequest(raw: RawPullRequest): PullRequest {
  return {
    number: raw.number,
    title: raw.title,
    author: raw.user?.login || 'unknown',
    url: raw.html_url,
    createdAt: new Date(raw.created_at),
    updatedAt: new Date(raw.updated_at),
    mergedAt: toDate(raw.merged_at),
  };
}

function toReview(raw: RawReview): Review {
  return {
    reviewer: raw.user?.login || '',
    state: raw.state || '',
    submittedAt: toDate(raw.submitted_at),
  };
}

function toRepository(raw: RawRepository): Repository {
  return {
    name: raw.name,
    fullName: raw.full_name,
    owner: raw.owner?.login || raw.full_name.split('/')[0],
    private: raw.private,
    createdAt: toDate(raw.created_at),
  };
}

function toEvent(raw: RawEvent): RepositoryEvent {
  return {
    type: raw.type || '',
    repositoryName: raw.repo?.name || '',
    createdAt: toDate(raw.created_at),
  };
}

function headerValue(headers: AxiosResponse['headers'], name: string): string | undefined {
  const value = headers[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Page number of the `rel="next"` entry of a GitHub `Link` header, or null on the last page.
 */
export function parseNextPage(linkHeader: string | undefined): number | null {
  if (!linkHeader) {
    return null;
  }

  for (const part of linkHeader.split(',')) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="next"/);
    if (!match) {
      continue;
    }
    const page = new URL(match[1]).searchParams.get('page');
    const parsed = page ? parseInt(page, 10) : NaN;
    return Number.isNaN(parsed) ? null : parsed;
  }

  return null;
}

export async function collectPages<T>(fetchPage: (page: number) => Promise<Page<T>>): Promise<T[]> {
  const all: T[] = [];
  let page: number | null = 1;

  while (page !== null) {
    const result: Page<T> = await fetchPage(page);
    all.push(...result.items);
    page = result.nextPage;
  }

  return all;
}

function toApiError(error: unknown, path: string): GitHubApiError {
  if (axios.isCancel(error)) {
    return new GitHubApiError(`Request to ${path} was cancelled`, { cancelled: true, cause: error });
  }

  if (!axios.isAxiosError(error)) {
    return new GitHubApiError(`Request to ${path} failed: ${errorMessage(error)}`, { cause: error });
  }

  const status = error.response?.status;
  if (status === 401) {
    return new GitHubApiError('GitHub authentication failed. Check your token.', { status, cause: error });
  }
  if (status === 403 && error.response && headerValue(error.response.headers, 'x-ratelimit-remaining') === '0') {
    const reset = headerValue(error.response.headers, 'x-ratelimit-reset');
    const resetAt = reset ? new Date(Number(reset) * 1000).toISOString() : 'unknown';
    return new GitHubApiError(`GitHub rate limit exceeded. Resets at ${resetAt}`, { status, cause: error });
  }
  if (status === 404) {
    return new GitHubApiError(`GitHub resource not found or no access: ${path}`, { status, cause: error });
  }
  if (status !== undefined) {
    return new GitHubApiError(`GitHub API error ${status} for ${path}: ${error.message}`, { status, cause: error });
  }
  return new GitHubApiError(`Request to ${path} failed: ${error.message}`, { cause: error });
}

export interface RestGitHubClientOptions {
  token: string;
  baseURL?: string;
  limiter?: TokenBucket;
  lowQuotaThreshold?: number;
  adapter?: AxiosAdapter;
}

export class RestGitHubClient implements GitHubClient {
  private http: AxiosInstance;
  private limiter: TokenBucket;
  private lowQuotaThreshold: number;
  lastRateLimit: RateLimitStatus | null = null;

  constructor(options: RestGitHubClientOptions) {
    this.http = axios.create({
      baseURL: options.baseURL ?? GITHUB_API_URL,
      headers: {
        Authorization: `Bearer ${options.token}`,
        Accept: 'application/vnd.github+json',
        'X-GitHub-Api-Version': '2022-11-28',
        'User-Agent': 'git-policy-monitor',
      },
      adapter: options.adapter,
    });
    this.limiter = options.limiter ?? new TokenBucket();
    this.lowQuotaThreshold = options.lowQuotaThreshold ?? LOW_QUOTA_THRESHOLD;
  }

  async executeWithRateLimit<T>(operation: (signal?: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.limiter.wait(signal);

    try {
      return await operation(signal);
    } finally {
      await this.warnOnLowQuota(signal);
    }
  }

  async getRateLimit(signal?: AbortSignal): Promise<RateLimitStatus> {
    const response = await this.get<RawRateLimit>('/rate_limit', {}, signal);
    const core = response.data.resources.core;
    this.lastRateLimit = {
      limit: core.limit,
      remaining: core.remaining,
      resetAt: new Date(core.reset * 1000),
    };
    return this.lastRateLimit;
  }

  async listPullRequests(
    repository: RepositoryReference,
    options: PullRequestListOptions,
    signal?: AbortSignal,
  ): Promise<Page<PullRequest>> {
    return this.getPage<RawPullRequest, PullRequest>(
      `${this.repoPath(repository)}/pulls`,
      { state: options.state, sort: options.sort, direction: options.direction, per_page: options.perPage ?? PER_PAGE },
      options.page,
      toPullRequest,
      signal,
    );
  }

  async listPullRequestReviews(repository: RepositoryReference, prNumber: number, signal?: AbortSignal): Promise<Review[]> {
    return collectPages((page) =>
      this.getPage<RawReview, Review>(
        `${this.repoPath(repository)}/pulls/${prNumber}/reviews`,
        { per_page: PER_PAGE },
        page,
        toReview,
        signal,
      ),
    );
  }

  async listUserRepositories(visibility: string, signal?: AbortSignal): Promise<Repository[]> {
    if (!isRepositoryFilter(visibility)) {
      throw new ConfigurationError('invalid-visibility', visibility);
    }

    return collectPages((page) =>
      this.getPage<RawRepository, Repository>(
        '/user/repos',
        { visibility: API_VISIBILITY[visibility], per_page: PER_PAGE },
        page,
        toRepository,
        signal,
      ),
    );
  }

  async listOrganizationRepositories(org: string, visibility: string, signal?: AbortSignal): Promise<Repository[]> {
    if (!org) {
      throw new TypeError('Organization name cannot be empty');
    }
    if (!isRepositoryFilter(visibility)) {
      throw new ConfigurationError('invalid-visibility', visibility);
    }

    return collectPages((page) =>
      this.getPage<RawRepository, Repository>(
        `/orgs/${encodeURIComponent(org)}/repos`,
        { type: API_VISIBILITY[visibility], per_page: PER_PAGE },
        page,
        toRepository,
        signal,
      ),
    );
  }

  async listRepositoryEvents(
    repository: RepositoryReference,
    options: { page: number },
    signal?: AbortSignal,
  ): Promise<Page<RepositoryEvent>> {
    return this.getPage<RawEvent, RepositoryEvent>(
      `${this.repoPath(repository)}/events`,
      { per_page: PER_PAGE },
      options.page,
      toEvent,
      signal,
    );
  }

  async listUserEventsForOrganization(org: string, user: string, signal?: AbortSignal): Promise<RepositoryEvent[]> {
    return collectPages((page) =>
      this.getPage<RawEvent, RepositoryEvent>(
        `/users/${encodeURIComponent(user)}/events/orgs/${encodeURIComponent(org)}`,
        { per_page: PER_PAGE },
        page,
        toEvent,
        signal,
      ),
    );
  }

  async listPublicEvents(signal?: AbortSignal): Promise<RepositoryEvent[]> {
    return collectPages((page) =>
      this.getPage<RawEvent, RepositoryEvent>('/events', { per_page: PER_PAGE }, page, toEvent, signal),
    );
  }

  private repoPath(repository: RepositoryReference): string {
    return `/repos/${encodeURIComponent(repository.owner)}/${encodeURIComponent(repository.name)}`;
  }

  private async getPage<TRaw, T>(
    path: string,
    params: Record<string, string | number>,
    page: number,
    map: (raw: TRaw) => T,
    signal?: AbortSignal,
  ): Promise<Page<T>> {
    const response = await this.executeWithRateLimit(
      (operationSignal) => this.get<TRaw[]>(path, { ...params, page }, operationSignal),
      signal,
    );

    return {
      items: response.data.map(map),
      nextPage: parseNextPage(headerValue(response.headers, 'link')),
    };
  }

  private async get<T>(path: string, params: Record<string, string | number>, signal?: AbortSignal): Promise<AxiosResponse<T>> {
    try {
      return await this.http.get<T>(path, { params, signal });
    } catch (error) {
      throw toApiError(error, path);
    }
  }

  private async warnOnLowQuota(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return;
    }

    try {
      const status = await this.getRateLimit(signal);
      if (status.remaining < this.lowQuotaThreshold) {
        console.warn(
          `⚠️  GitHub API rate limit is getting low. ${status.remaining}/${status.limit} requests remaining, resets at ${status.resetAt.toISOString()}`,
        );
      }
    } catch (error) {
      console.warn(`⚠️  Could not read GitHub rate limit status: ${errorMessage(error)}`);
    }
  }
}
