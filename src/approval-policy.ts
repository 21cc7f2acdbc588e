import type { Review } from './types';

export interface ApprovalCriteria {
  ignoredReviewers: string[];
}

type TrackedState = 'APPROVED' | 'CHANGES_REQUESTED';

function isTrackedState(state: string): state is TrackedState {
  return state === 'APPROVED' || state === 'CHANGES_REQUESTED';
}

export class ApprovalPolicy {
  private criteria: ApprovalCriteria;

  constructor(criteria?: Partial<ApprovalCriteria>) {
    this.criteria = {
      ignoredReviewers: criteria?.ignoredReviewers ?? ['ghost'],
    };
  }

  /**
   * Latest APPROVED / CHANGES_REQUESTED state per reviewer, in the order the reviews
   * were submitted. COMMENTED and other states never replace a tracked state.
   */
  latestStates(reviews: Review[]): Map<string, TrackedState> {
    const latest = new Map<string, TrackedState>();

    for (const review of reviews) {
      if (!review.state || !review.reviewer || this.criteria.ignoredReviewers.includes(review.reviewer)) {
        continue;
      }

      if (isTrackedState(review.state)) {
        latest.set(review.reviewer, review.state);
      }
    }

    return latest;
  }

  isApproved(reviews: Review[]): boolean {
    const states = [...this.latestStates(reviews).values()];
    if (states.includes('CHANGES_REQUESTED')) {
      return false;
    }
    return states.includes('APPROVED');
  }

  getVerdictSummary(prNumber: number, reviews: Review[]): string {
    const latest = this.latestStates(reviews);
    const blockers = [...latest].filter(([, state]) => state === 'CHANGES_REQUESTED').map(([reviewer]) => reviewer);
    if (blockers.length > 0) {
      return `PR #${prNumber}: Changes requested by ${blockers.join(', ')}, PR not approved`;
    }

    const approvers = [...latest].filter(([, state]) => state === 'APPROVED').map(([reviewer]) => reviewer);
    if (approvers.length > 0) {
      return `PR #${prNumber}: Approved by ${approvers.join(', ')} with no pending change requests`;
    }
    return `PR #${prNumber}: No approvals found`;
  }
}
