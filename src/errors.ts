export type ConfigurationErrorKind =
  | 'config-file-missing'
  | 'config-file-malformed'
  | 'missing-token'
  | 'invalid-visibility'
  | 'missing-repositories'
  | 'invalid-time-window'
  | 'missing-organizations'
  | 'invalid-check-window';

const CONFIGURATION_MESSAGES: Record<ConfigurationErrorKind, string> = {
  'config-file-missing': 'Config file not found',
  'config-file-malformed': 'Config file could not be parsed',
  'missing-token': 'GitHub token is required. Set it in the config file or the GITHUB_TOKEN environment variable',
  'invalid-visibility': 'Invalid repository visibility. Must be one of: all, public-only, private-only, specific',
  'missing-repositories': "At least one repository must be specified when repoVisibility is 'specific'",
  'invalid-time-window': 'Time window must be greater than 0',
  'missing-organizations': 'At least one organization must be specified for the repository visibility monitor',
  'invalid-check-window': 'Check window for repository visibility must be greater than 0',
};

export class ConfigurationError extends Error {
  readonly kind: ConfigurationErrorKind;
  readonly detail?: string;

  constructor(kind: ConfigurationErrorKind, detail?: string) {
    super(detail ? `${CONFIGURATION_MESSAGES[kind]} (${detail})` : CONFIGURATION_MESSAGES[kind]);
    this.name = 'ConfigurationError';
    this.kind = kind;
    this.detail = detail;
  }
}

export class RepositoryParseError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`Invalid repository format "${input}", expected 'owner/repo'`);
    this.name = 'RepositoryParseError';
    this.input = input;
  }
}

export class GitHubApiError extends Error {
  readonly status?: number;
  readonly cancelled: boolean;

  constructor(message: string, options: { status?: number; cancelled?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'GitHubApiError';
    this.status = options.status;
    this.cancelled = options.cancelled ?? false;
  }
}

/**
 * Raised when the run signal fires while waiting for a rate limiter token.
 * The operation that was waiting is never invoked.
 */
export class RateLimitWaitError extends Error {
  constructor(reason?: unknown) {
    super('Rate limiter wait was cancelled', { cause: reason });
    this.name = 'RateLimitWaitError';
  }
}

/**
 * True when `error`, or any error in its `cause` chain, comes from the run signal firing.
 */
export function isCancellation(error: unknown): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof RateLimitWaitError || (current instanceof GitHubApiError && current.cancelled)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
