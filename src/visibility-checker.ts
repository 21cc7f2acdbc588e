import { ConfigurationError, errorMessage, isCancellation } from './errors';
import type { GitHubClient } from './github-client';
import { formatRepository } from './repository-ref';
import { isRepositoryFilter, isRepositoryVisibility } from './types';
import type {
  OrganizationFailure,
  Page,
  Repository,
  RepositoryEvent,
  RepositoryFilter,
  RepositoryReference,
  VisibilityFinding,
  VisibilityRun,
} from './types';

export const DEFAULT_CHECK_WINDOW_HOURS = 24;
export const PUBLIC_EVENT = 'PublicEvent';

const HOUR_MS = 60 * 60 * 1000;

export interface VisibilityCheckerOptions {
  checkWindowHours?: number;
  now?: () => Date;
}

/**
 * Finds repositories that became public inside the check window: public repositories
 * created inside the window, and older ones with a `PublicEvent` in their recent history.
 */
export class VisibilityChecker {
  private client: GitHubClient;
  private checkWindowHours: number;
  private now: () => Date;

  constructor(client: GitHubClient, options: VisibilityCheckerOptions = {}) {
    this.client = client;
    this.checkWindowHours =
      options.checkWindowHours && options.checkWindowHours > 0 ? options.checkWindowHours : DEFAULT_CHECK_WINDOW_HOURS;
    this.now = options.now ?? (() => new Date());
  }

  async run(organizations: string[], visibility: string, signal?: AbortSignal): Promise<VisibilityRun> {
    if (!isRepositoryVisibility(visibility)) {
      throw new ConfigurationError('invalid-visibility', `invalid repository visibility setting: ${visibility}`);
    }

    const findings: VisibilityFinding[] = [];
    const failedOrganizations: OrganizationFailure[] = [];
    for (const org of organizations) {
      try {
        findings.push(...(await this.checkOrganization(org, visibility, signal)));
      } catch (error) {
        if (isCancellation(error)) {
          throw error;
        }
        console.error(`❌ Error checking organization ${org}: ${errorMessage(error)}`);
        failedOrganizations.push({ organization: org, message: errorMessage(error) });
      }
    }
    return { findings, failedOrganizations };
  }

  async checkOrganization(org: string, visibility: string, signal?: AbortSignal): Promise<VisibilityFinding[]> {
    // "specific" monitors the listed organizations' public repositories
    const filter: RepositoryFilter = visibility === 'specific' ? 'public-only' : toFilter(visibility);
    console.log(
      `🔍 Checking for public repositories in ${org} organization with visibility ${visibility} within the last ${this.checkWindowHours}h`,
    );

    let repos: Repository[];
    try {
      repos = await this.client.listOrganizationRepositories(org, filter === 'public-only' ? 'public-only' : 'all', signal);
    } catch (error) {
      throw new Error(`Failed to list organization repositories: ${errorMessage(error)}`, { cause: error });
    }

    const cutoff = this.cutoff();
    const findings: VisibilityFinding[] = [];

    for (const repo of repos) {
      if (filter === 'public-only' && repo.private) {
        continue;
      }
      if (filter === 'private-only' && !repo.private) {
        continue;
      }
      if (repo.private) {
        continue;
      }

      const reference = { owner: org, name: repo.name };
      if (this.isRecent(repo.createdAt, cutoff)) {
        findings.push(formatRepository(reference));
        continue;
      }

      try {
        if (await this.wasRecentlyMadePublic(reference, signal)) {
          findings.push(formatRepository(reference));
        }
      } catch (error) {
        if (isCancellation(error)) {
          throw error;
        }
        console.error(`❌ Error checking events for ${formatRepository(reference)}: ${errorMessage(error)}`);
      }
    }

    return findings;
  }

  /**
   * Single-repository form of the organization check: the repository must be among the
   * owner's public repositories.
   */
  async checkRepository(owner: string, name: string, signal?: AbortSignal): Promise<boolean> {
    console.log(`🔍 Checking repository ${owner}/${name} for visibility changes within the last ${this.checkWindowHours}h`);

    let repos: Repository[];
    try {
      repos = await this.client.listOrganizationRepositories(owner, 'public-only', signal);
    } catch (error) {
      throw new Error(`Failed to list repositories: ${errorMessage(error)}`, { cause: error });
    }

    const repo = repos.find((candidate) => candidate.name === name);
    if (!repo || repo.private) {
      return false;
    }

    if (this.isRecent(repo.createdAt, this.cutoff())) {
      return true;
    }

    return this.wasRecentlyMadePublic({ owner, name }, signal);
  }

  /**
   * Walk the repository's events newest first and stop at the first one older than the
   * cutoff. Events without a timestamp count as recent.
   */
  async wasRecentlyMadePublic(reference: RepositoryReference, signal?: AbortSignal): Promise<boolean> {
    const cutoff = this.cutoff();
    let page: number | null = 1;

    while (page !== null) {
      const result: Page<RepositoryEvent> = await this.client.listRepositoryEvents(reference, { page }, signal);
      for (const event of result.items) {
        if (!this.isRecent(event.createdAt, cutoff)) {
          return false;
        }
        if (event.type === PUBLIC_EVENT) {
          return true;
        }
      }
      page = result.items.length > 0 ? result.nextPage : null;
    }

    return false;
  }

  private cutoff(): Date {
    return new Date(this.now().getTime() - this.checkWindowHours * HOUR_MS);
  }

  private isRecent(timestamp: Date | null, cutoff: Date): boolean {
    return timestamp === null || timestamp.getTime() >= cutoff.getTime();
  }
}

function toFilter(visibility: string): RepositoryFilter {
  if (isRepositoryFilter(visibility)) {
    return visibility;
  }
  throw new ConfigurationError('invalid-visibility', `invalid repository visibility setting: ${visibility}`);
}
