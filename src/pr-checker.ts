import { ApprovalPolicy } from './approval-policy';
import { RepositoryParseError, errorMessage } from './errors';
import type { GitHubClient } from './github-client';
import { parseRepository } from './repository-ref';
import { OUT_OF_WINDOW_THRESHOLD, ScanWindow } from './scan-window';
import type { Page, PullRequest, RepositoryReference, ScanResult, UnapprovedPR } from './types';

const HOUR_MS = 60 * 60 * 1000;

export interface PRCheckerOptions {
  timeWindowHours: number;
  debugLogging?: boolean;
  outOfWindowThreshold?: number;
  policy?: ApprovalPolicy;
  now?: () => Date;
}

function freezeResult(repository: string, unapprovedPRs: UnapprovedPR[], error?: Error): ScanResult {
  const result: ScanResult = error
    ? { repository, unapprovedPRs: Object.freeze([...unapprovedPRs]), error }
    : { repository, unapprovedPRs: Object.freeze([...unapprovedPRs]) };
  return Object.freeze(result);
}

export class PRChecker {
  private client: GitHubClient;
  private timeWindowHours: number;
  private debugLogging: boolean;
  private outOfWindowThreshold: number;
  private policy: ApprovalPolicy;
  private now: () => Date;

  constructor(client: GitHubClient, options: PRCheckerOptions) {
    this.client = client;
    this.timeWindowHours = options.timeWindowHours;
    this.debugLogging = options.debugLogging ?? false;
    this.outOfWindowThreshold = options.outOfWindowThreshold ?? OUT_OF_WINDOW_THRESHOLD;
    this.policy = options.policy ?? new ApprovalPolicy();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Check every pull request of `repository` merged inside the time window. Errors are
   * returned on the result, never thrown; when `error` is set the PR list is partial.
   */
  async checkRepository(repository: string, signal?: AbortSignal): Promise<ScanResult> {
    const parsed = parseRepository(repository);
    if (!parsed.ok) {
      return freezeResult(repository, [], new RepositoryParseError(repository));
    }
    const reference = parsed.reference;

    const cutoff = new Date(this.now().getTime() - this.timeWindowHours * HOUR_MS);
    const window = new ScanWindow(cutoff, this.outOfWindowThreshold);
    const unapprovedPRs: UnapprovedPR[] = [];

    this.debug(`  Using time window: PRs merged since ${cutoff.toISOString()}`);

    let page = 1;
    while (!window.done) {
      console.log(`  🔍 Fetching PRs from ${repository} (page ${page})...`);

      let result: Page<PullRequest>;
      try {
        result = await this.client.listPullRequests(
          reference,
          { state: 'closed', sort: 'updated', direction: 'desc', page },
          signal,
        );
      } catch (error) {
        return freezeResult(repository, unapprovedPRs, new Error(`Error getting pull requests: ${errorMessage(error)}`, { cause: error }));
      }
      const { items: prs, nextPage } = result;

      if (prs.length === 0) {
        break;
      }

      for (const pr of prs) {
        const decision = window.observe(pr);

        if (decision === 'stop') {
          if (window.stopReason === 'updated-before-cutoff') {
            this.debug(`  Found PR #${pr.number} updated at ${pr.updatedAt.toISOString()} (before cutoff), stopping further requests`);
          } else {
            this.debug(`  Found ${window.consecutiveOutOfWindow} consecutive PRs outside time window, stopping further requests`);
          }
          break;
        }
        if (decision === 'skip') {
          continue;
        }

        this.debug(`  Checking PR #${pr.number} in ${repository}: ${pr.title} (merged at ${pr.mergedAt?.toISOString()})`);

        let approved: boolean;
        try {
          approved = await this.isApproved(reference, pr.number, signal);
        } catch (error) {
          return freezeResult(repository, unapprovedPRs, new Error(`Error checking PR approval: ${errorMessage(error)}`, { cause: error }));
        }

        if (!approved) {
          unapprovedPRs.push({ number: pr.number, title: pr.title, author: pr.author, url: pr.url });
        }
      }

      const summary = window.completePage(nextPage !== null);
      console.log(
        `  📊 Found ${prs.length} PRs on page ${page}, ${summary.mergedInWindow} merged within time window, ${summary.skipped} skipped`,
      );
      if (window.stopReason === 'page-without-merges') {
        this.debug('  No PRs in time window on this page, stopping further requests');
      }

      if (nextPage === null) {
        break;
      }
      page = nextPage;
    }

    console.log(
      `  ✅ Completed checking ${repository}: ${window.examined} total PRs examined, ${window.mergedInWindow} merged within time window, ${window.skipped} skipped, ${unapprovedPRs.length} unapproved`,
    );

    return freezeResult(repository, unapprovedPRs);
  }

  private async isApproved(reference: RepositoryReference, prNumber: number, signal?: AbortSignal): Promise<boolean> {
    const reviews = await this.client.listPullRequestReviews(reference, prNumber, signal);

    if (this.debugLogging) {
      console.log(`PR #${prNumber}: Found ${reviews.length} reviews`);
      for (const review of reviews) {
        console.log(
          `PR #${prNumber}: Review by ${review.reviewer} with state ${review.state} (submitted at ${review.submittedAt?.toISOString() ?? 'unknown'})`,
        );
      }
      console.log(this.policy.getVerdictSummary(prNumber, reviews));
    }

    return this.policy.isApproved(reviews);
  }

  private debug(message: string): void {
    if (this.debugLogging) {
      console.log(message);
    }
  }
}
