import type { PullRequest } from './types';

export const OUT_OF_WINDOW_THRESHOLD = 20;

export type ScanPhase = 'fetching' | 'in-window' | 'trailing-out-of-window' | 'done';

export type PullRequestDecision =
  /** Merged inside the window: its reviews must be checked. */
  | 'check'
  | 'skip'
  /** Nothing further on this or any later page can be relevant. */
  | 'stop';

export type StopReason = 'updated-before-cutoff' | 'consecutive-out-of-window' | 'page-without-merges' | 'last-page';

/**
 * Windowing over pull requests listed by `updated` descending. Pagination itself lives
 * in the caller; this only decides, PR by PR and page by page, when to stop.
 */
export class ScanWindow {
  readonly cutoff: Date;
  readonly threshold: number;

  phase: ScanPhase = 'fetching';
  stopReason: StopReason | null = null;
  consecutiveOutOfWindow = 0;
  examined = 0;
  mergedInWindow = 0;
  skipped = 0;

  private pageMergedInWindow = 0;
  private pageSkipped = 0;

  constructor(cutoff: Date, threshold: number = OUT_OF_WINDOW_THRESHOLD) {
    this.cutoff = cutoff;
    this.threshold = threshold;
  }

  get done(): boolean {
    return this.phase === 'done';
  }

  observe(pr: Pick<PullRequest, 'updatedAt' | 'mergedAt'>): PullRequestDecision {
    if (this.done) {
      return 'stop';
    }
    this.examined++;

    if (pr.updatedAt.getTime() < this.cutoff.getTime()) {
      this.finish('updated-before-cutoff');
      return 'stop';
    }

    if (pr.mergedAt === null) {
      this.recordSkip();
      return 'skip';
    }

    if (pr.mergedAt.getTime() < this.cutoff.getTime()) {
      this.recordSkip();
      if (this.consecutiveOutOfWindow >= this.threshold) {
        this.finish('consecutive-out-of-window');
        return 'stop';
      }
      return 'skip';
    }

    this.phase = 'in-window';
    this.consecutiveOutOfWindow = 0;
    this.mergedInWindow++;
    this.pageMergedInWindow++;
    return 'check';
  }

  /**
   * Close the current page. A page that produced no in-window merge adds half the
   * threshold to the counter; only an in-window PR resets it.
   */
  completePage(hasNextPage: boolean): { mergedInWindow: number; skipped: number } {
    const summary = { mergedInWindow: this.pageMergedInWindow, skipped: this.pageSkipped };
    this.pageMergedInWindow = 0;
    this.pageSkipped = 0;

    if (this.done) {
      return summary;
    }

    if (!hasNextPage) {
      this.finish('last-page');
      return summary;
    }

    if (summary.mergedInWindow === 0) {
      this.consecutiveOutOfWindow += Math.floor(this.threshold / 2);
      if (this.consecutiveOutOfWindow >= this.threshold) {
        this.finish('page-without-merges');
      }
    }

    return summary;
  }

  private recordSkip(): void {
    this.phase = 'trailing-out-of-window';
    this.skipped++;
    this.pageSkipped++;
    this.consecutiveOutOfWindow++;
  }

  private finish(reason: StopReason): void {
    this.phase = 'done';
    this.stopReason = reason;
  }
}
