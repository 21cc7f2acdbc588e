import { ConfigurationError, errorMessage } from './errors';
import type { GitHubClient } from './github-client';
import { isRepositoryFilter } from './types';
import type { PRCheckerConfig, Repository, ScanResult } from './types';

export type RepositoryResolution =
  | { ok: true; repositories: string[] }
  | { ok: false; failure: ScanResult };

function failed(repository: string, error: Error): RepositoryResolution {
  return { ok: false, failure: Object.freeze({ repository, unapprovedPRs: Object.freeze([]), error }) };
}

/**
 * Expand the PR checker settings into the list of "owner/name" repositories to scan.
 * Problems come back as a single error-bearing result instead of a partial list.
 */
export async function resolveRepositories(
  client: GitHubClient,
  settings: Pick<PRCheckerConfig, 'repoVisibility' | 'organization' | 'specificRepositories' | 'excludedRepositories'>,
  signal?: AbortSignal,
): Promise<RepositoryResolution> {
  const visibility = settings.repoVisibility;

  if (visibility === 'specific') {
    return { ok: true, repositories: [...settings.specificRepositories] };
  }

  if (!isRepositoryFilter(visibility)) {
    return failed(
      'all-repositories',
      new ConfigurationError('invalid-visibility', `invalid repository visibility setting: ${visibility}`),
    );
  }

  let repos: Repository[];
  if (settings.organization) {
    console.log(`🔍 Fetching repositories for organization '${settings.organization}' with visibility '${visibility}'...`);
    try {
      repos = await client.listOrganizationRepositories(settings.organization, visibility, signal);
    } catch (error) {
      return failed(
        `org:${settings.organization}`,
        new Error(`Failed to fetch organization repositories: ${errorMessage(error)}`, { cause: error }),
      );
    }
    console.log(`📊 Found ${repos.length} repositories for organization '${settings.organization}' with visibility '${visibility}'`);
  } else {
    console.log(`🔍 Fetching repositories for authenticated user with visibility '${visibility}'...`);
    try {
      repos = await client.listUserRepositories(visibility, signal);
    } catch (error) {
      return failed(
        'user-repositories',
        new Error(`Failed to fetch user repositories: ${errorMessage(error)}`, { cause: error }),
      );
    }
    console.log(`📊 Found ${repos.length} repositories for authenticated user with visibility '${visibility}'`);
  }

  const excluded = new Set(settings.excludedRepositories);
  const repositories: string[] = [];
  for (const repo of repos) {
    if (excluded.has(repo.fullName)) {
      console.log(`🚫 Excluding repository: ${repo.fullName} (found in excludedRepositories list)`);
      continue;
    }
    repositories.push(repo.fullName);
  }

  if (excluded.size > 0) {
    console.log(`📊 After applying exclusions: processing ${repositories.length} repositories`);
  }

  return { ok: true, repositories };
}
