import type { GitHubClient, PullRequestListOptions } from '../github-client';
import type {
  Page,
  PullRequest,
  RateLimitStatus,
  Repository,
  RepositoryEvent,
  RepositoryReference,
  Review,
} from '../types';

export type FakeOperation =
  | 'listPullRequests'
  | 'listPullRequestReviews'
  | 'listUserRepositories'
  | 'listOrganizationRepositories'
  | 'listRepositoryEvents'
  | 'listUserEventsForOrganization'
  | 'listPublicEvents';

export interface FakeCall {
  operation: FakeOperation;
  target: string;
  page?: number;
  visibility?: string;
}

export const NOW = new Date('2026-03-10T12:00:00Z');
const HOUR_MS = 60 * 60 * 1000;

export function hoursAgo(hours: number, from: Date = NOW): Date {
  return new Date(from.getTime() - hours * HOUR_MS);
}

export function pullRequest(overrides: Partial<PullRequest> & { number: number }): PullRequest {
  const updatedAt = overrides.updatedAt ?? overrides.mergedAt ?? hoursAgo(1);
  return {
    title: `Change ${overrides.number}`,
    author: 'dev-one',
    url: `https://github.com/acme/widgets/pull/${overrides.number}`,
    createdAt: hoursAgo(48),
    mergedAt: null,
    ...overrides,
    updatedAt,
  };
}

export function review(reviewer: string, state: string, submittedAt: Date | null = hoursAgo(2)): Review {
  return { reviewer, state, submittedAt };
}

export function repository(owner: string, name: string, overrides: Partial<Repository> = {}): Repository {
  return {
    name,
    fullName: `${owner}/${name}`,
    owner,
    private: false,
    createdAt: hoursAgo(24 * 365),
    ...overrides,
  };
}

export function event(type: string, createdAt: Date | null, repositoryName = ''): RepositoryEvent {
  return { type, createdAt, repositoryName };
}

function key(reference: RepositoryReference): string {
  return `${reference.owner}/${reference.name}`;
}

function pageOf<T>(pages: T[][] | undefined, page: number): Page<T> {
  const all = pages ?? [];
  const items = all[page - 1] ?? [];
  return { items, nextPage: page < all.length ? page + 1 : null };
}

/**
 * In-memory GitHub: fixed data keyed by repository, optional per-operation failures,
 * and a log of every call.
 */
export class FakeGitHubClient implements GitHubClient {
  pullRequestPages: Record<string, PullRequest[][]> = {};
  reviews: Record<string, Review[]> = {};
  userRepositories: Repository[] = [];
  organizationRepositories: Record<string, Repository[]> = {};
  eventPages: Record<string, RepositoryEvent[][]> = {};
  publicEvents: RepositoryEvent[] = [];
  failures: Partial<Record<FakeOperation, Error>> = {};
  rateLimit: RateLimitStatus = { limit: 5000, remaining: 4999, resetAt: hoursAgo(-1) };

  calls: FakeCall[] = [];
  rateLimitedCalls = 0;

  callsTo(operation: FakeOperation): FakeCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  async executeWithRateLimit<T>(operation: (signal?: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    this.rateLimitedCalls++;
    return operation(signal);
  }

  async getRateLimit(): Promise<RateLimitStatus> {
    return this.rateLimit;
  }

  async listPullRequests(reference: RepositoryReference, options: PullRequestListOptions): Promise<Page<PullRequest>> {
    this.record({ operation: 'listPullRequests', target: key(reference), page: options.page });
    return this.executeWithRateLimit(async () => pageOf(this.pullRequestPages[key(reference)], options.page));
  }

  async listPullRequestReviews(reference: RepositoryReference, prNumber: number): Promise<Review[]> {
    this.record({ operation: 'listPullRequestReviews', target: `${key(reference)}#${prNumber}` });
    return this.executeWithRateLimit(async () => this.reviews[`${key(reference)}#${prNumber}`] ?? []);
  }

  async listUserRepositories(visibility: string): Promise<Repository[]> {
    this.record({ operation: 'listUserRepositories', target: 'user', visibility });
    return this.executeWithRateLimit(async () => this.userRepositories);
  }

  async listOrganizationRepositories(org: string, visibility: string): Promise<Repository[]> {
    this.record({ operation: 'listOrganizationRepositories', target: org, visibility });
    return this.executeWithRateLimit(async () => this.organizationRepositories[org] ?? []);
  }

  async listRepositoryEvents(reference: RepositoryReference, options: { page: number }): Promise<Page<RepositoryEvent>> {
    this.record({ operation: 'listRepositoryEvents', target: key(reference), page: options.page });
    return this.executeWithRateLimit(async () => pageOf(this.eventPages[key(reference)], options.page));
  }

  async listUserEventsForOrganization(org: string, user: string): Promise<RepositoryEvent[]> {
    this.record({ operation: 'listUserEventsForOrganization', target: `${org}/${user}` });
    return this.executeWithRateLimit(async () => []);
  }

  async listPublicEvents(): Promise<RepositoryEvent[]> {
    this.record({ operation: 'listPublicEvents', target: 'public' });
    return this.executeWithRateLimit(async () => this.publicEvents);
  }

  private record(call: FakeCall): void {
    this.calls.push(call);
    const failure = this.failures[call.operation];
    if (failure) {
      throw failure;
    }
  }
}
