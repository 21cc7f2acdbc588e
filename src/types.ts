export interface RepositoryReference {
  owner: string;
  name: string;
}

export interface PullRequest {
  number: number;
  title: string;
  author: string;
  url: string;
  createdAt: Date;
  updatedAt: Date;
  mergedAt: Date | null;
}

// APPROVED, CHANGES_REQUESTED, COMMENTED, DISMISSED, PENDING, ...
export type ReviewState = string;

export interface Review {
  reviewer: string;
  state: ReviewState;
  submittedAt: Date | null;
}

export interface Repository {
  name: string;
  fullName: string;
  owner: string;
  private: boolean;
  createdAt: Date | null;
}

export interface RepositoryEvent {
  type: string;
  repositoryName: string;
  createdAt: Date | null;
}

export interface RateLimitStatus {
  limit: number;
  remaining: number;
  resetAt: Date;
}

export interface Page<T> {
  items: T[];
  nextPage: number | null;
}

export interface UnapprovedPR {
  number: number;
  title: string;
  author: string;
  url: string;
}

export interface ScanResult {
  readonly repository: string;
  readonly unapprovedPRs: readonly UnapprovedPR[];
  readonly error?: Error;
}

export type VisibilityFinding = string;

export interface OrganizationFailure {
  organization: string;
  message: string;
}

export interface VisibilityRun {
  findings: VisibilityFinding[];
  /** Organizations skipped because they could not be checked. */
  failedOrganizations: OrganizationFailure[];
}

export type RepositoryFilter = 'all' | 'public-only' | 'private-only';
export type RepositoryVisibility = RepositoryFilter | 'specific';

export const REPOSITORY_FILTERS: readonly RepositoryFilter[] = ['all', 'public-only', 'private-only'];
export const REPOSITORY_VISIBILITIES: readonly RepositoryVisibility[] = [...REPOSITORY_FILTERS, 'specific'];

export function isRepositoryFilter(value: string): value is RepositoryFilter {
  return REPOSITORY_FILTERS.some((filter) => filter === value);
}

export function isRepositoryVisibility(value: string): value is RepositoryVisibility {
  return REPOSITORY_VISIBILITIES.some((visibility) => visibility === value);
}

export interface PRCheckerConfig {
  enabled: boolean;
  repoVisibility: string;
  organization: string;
  specificRepositories: string[];
  excludedRepositories: string[];
  timeWindowHours: number;
  debugLogging: boolean;
}

export interface RepoVisibilityConfig {
  enabled: boolean;
  repoVisibility: string;
  organizations: string[];
  checkWindowHours: number;
}

export interface Config {
  github: {
    token: string;
  };
  monitors: {
    prChecker: PRCheckerConfig;
    repoVisibility: RepoVisibilityConfig;
  };
}
