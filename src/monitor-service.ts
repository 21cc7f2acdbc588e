import { errorMessage, isCancellation } from './errors';
import type { GitHubClient } from './github-client';
import { PRChecker } from './pr-checker';
import { resolveRepositories } from './repository-resolver';
import type { Config, OrganizationFailure, ScanResult, VisibilityFinding } from './types';
import { VisibilityChecker } from './visibility-checker';

export interface MonitorOutcome {
  prResults: ScanResult[];
  findings: VisibilityFinding[];
  failedOrganizations: OrganizationFailure[];
  /** A monitor hit an error: an errored repository, an organization that could not be checked, or a visibility run that failed. */
  failed: boolean;
}

export interface VisibilityOutcome {
  findings: VisibilityFinding[];
  failedOrganizations: OrganizationFailure[];
  failed: boolean;
}

export interface MonitorServiceOptions {
  now?: () => Date;
}

export class MonitorService {
  private config: Config;
  private client: GitHubClient;
  private now?: () => Date;

  constructor(config: Config, client: GitHubClient, options: MonitorServiceOptions = {}) {
    this.config = config;
    this.client = client;
    this.now = options.now;
  }

  async run(signal?: AbortSignal): Promise<MonitorOutcome> {
    const { prChecker, repoVisibility } = this.config.monitors;
    let prResults: ScanResult[] = [];
    let findings: VisibilityFinding[] = [];
    let failedOrganizations: OrganizationFailure[] = [];
    let failed = false;

    if (prChecker.enabled) {
      console.log('🚀 Running PR Checker monitor...');
      prResults = await this.runPRChecker(signal);
      failed = prResults.some((result) => result.error !== undefined);
    } else {
      console.log('⏭️  PR Checker monitor is disabled in configuration');
    }

    if (repoVisibility.enabled) {
      console.log('🚀 Running Repository Visibility monitor...');
      const visibility = await this.runVisibilityChecker(signal);
      findings = visibility.findings;
      failedOrganizations = visibility.failedOrganizations;
      failed = failed || visibility.failed;
    } else {
      console.log('⏭️  Repository Visibility monitor is disabled in configuration');
    }

    return { prResults, findings, failedOrganizations, failed };
  }

  /**
   * Scan every resolved repository in order. Cancellation of the run signal aborts the
   * whole run; any other error only marks the repository it happened in.
   */
  async runPRChecker(signal?: AbortSignal): Promise<ScanResult[]> {
    const settings = this.config.monitors.prChecker;
    if (!settings.enabled) {
      return [];
    }

    const resolution = await resolveRepositories(this.client, settings, signal);
    if (!resolution.ok) {
      throwIfCancelled(resolution.failure, signal);
      return [resolution.failure];
    }

    const checker = new PRChecker(this.client, {
      timeWindowHours: settings.timeWindowHours,
      debugLogging: settings.debugLogging,
      now: this.now,
    });

    const repositories = resolution.repositories;
    const results: ScanResult[] = [];
    console.log(`📦 Processing ${repositories.length} repositories...`);

    for (const [index, repository] of repositories.entries()) {
      console.log(`[${index + 1}/${repositories.length}] Checking repository: ${repository}`);
      const result = await checker.checkRepository(repository, signal);
      throwIfCancelled(result, signal);
      results.push(result);
    }

    console.log(`✅ Completed checking all ${repositories.length} repositories`);
    return results;
  }

  async runVisibilityChecker(signal?: AbortSignal): Promise<VisibilityOutcome> {
    const settings = this.config.monitors.repoVisibility;
    if (!settings.enabled) {
      return { findings: [], failedOrganizations: [], failed: false };
    }

    const checker = new VisibilityChecker(this.client, {
      checkWindowHours: settings.checkWindowHours,
      now: this.now,
    });

    try {
      const { findings, failedOrganizations } = await checker.run(settings.organizations, settings.repoVisibility, signal);
      if (findings.length > 0) {
        console.log('⚠️  The following repositories were recently made public:');
        for (const repo of findings) {
          console.log(`  - ${repo}`);
        }
      } else {
        console.log('✅ No organization repositories were recently made public');
      }
      if (failedOrganizations.length > 0) {
        console.error(`❌ ${failedOrganizations.length} organization(s) could not be checked`);
      }
      return { findings, failedOrganizations, failed: failedOrganizations.length > 0 };
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      console.error(`❌ Error checking repository visibility: ${errorMessage(error)}`);
      return { findings: [], failedOrganizations: [], failed: true };
    }
  }
}

function throwIfCancelled(result: ScanResult, signal?: AbortSignal): void {
  if (result.error && (signal?.aborted || isCancellation(result.error))) {
    throw result.error;
  }
}
