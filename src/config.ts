import * as fs from 'fs';
import { ConfigurationError, errorMessage } from './errors';
import { isRepositoryVisibility } from './types';
import type { Config, PRCheckerConfig, RepoVisibilityConfig } from './types';

export const DEFAULT_CONFIG_PATH = 'config.json';

export function defaultConfig(): Config {
  return {
    github: { token: '' },
    monitors: {
      prChecker: {
        enabled: false,
        repoVisibility: 'specific',
        organization: '',
        specificRepositories: [],
        excludedRepositories: [],
        timeWindowHours: 24,
        debugLogging: false,
      },
      repoVisibility: {
        enabled: false,
        repoVisibility: 'specific',
        organizations: [],
        checkWindowHours: 24,
      },
    },
  };
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: JsonObject, key: string, path: string): JsonObject {
  const value = source[key];
  if (value === undefined) {
    return {};
  }
  if (!isObject(value)) {
    throw new ConfigurationError('config-file-malformed', `${path} must be an object`);
  }
  return value;
}

function readString(source: JsonObject, key: string, fallback: string, path: string): string {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError('config-file-malformed', `${path}.${key} must be a string`);
  }
  return value;
}

function readBoolean(source: JsonObject, key: string, fallback: boolean, path: string): boolean {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError('config-file-malformed', `${path}.${key} must be true or false`);
  }
  return value;
}

function readNumber(source: JsonObject, key: string, fallback: number, path: string): number {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError('config-file-malformed', `${path}.${key} must be a number`);
  }
  return value;
}

function readStringList(source: JsonObject, key: string, fallback: string[], path: string): string[] {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigurationError('config-file-malformed', `${path}.${key} must be a list of strings`);
  }
  return value;
}

/**
 * Overlay a parsed config document on the defaults. Unknown keys are ignored; keys with
 * the wrong type are rejected.
 */
export function parseConfig(document: unknown): Config {
  if (!isObject(document)) {
    throw new ConfigurationError('config-file-malformed', 'top level must be an object');
  }

  const defaults = defaultConfig();
  const github = section(document, 'github', 'github');
  const monitors = section(document, 'monitors', 'monitors');
  const pr = section(monitors, 'prChecker', 'monitors.prChecker');
  const visibility = section(monitors, 'repoVisibility', 'monitors.repoVisibility');
  const prDefaults = defaults.monitors.prChecker;
  const visibilityDefaults = defaults.monitors.repoVisibility;

  const prChecker: PRCheckerConfig = {
    enabled: readBoolean(pr, 'enabled', prDefaults.enabled, 'monitors.prChecker'),
    repoVisibility: readString(pr, 'repoVisibility', prDefaults.repoVisibility, 'monitors.prChecker'),
    organization: readString(pr, 'organization', prDefaults.organization, 'monitors.prChecker'),
    specificRepositories: readStringList(pr, 'specificRepositories', prDefaults.specificRepositories, 'monitors.prChecker'),
    excludedRepositories: readStringList(pr, 'excludedRepositories', prDefaults.excludedRepositories, 'monitors.prChecker'),
    timeWindowHours: readNumber(pr, 'timeWindowHours', prDefaults.timeWindowHours, 'monitors.prChecker'),
    debugLogging: readBoolean(pr, 'debugLogging', prDefaults.debugLogging, 'monitors.prChecker'),
  };

  const repoVisibility: RepoVisibilityConfig = {
    enabled: readBoolean(visibility, 'enabled', visibilityDefaults.enabled, 'monitors.repoVisibility'),
    repoVisibility: readString(visibility, 'repoVisibility', visibilityDefaults.repoVisibility, 'monitors.repoVisibility'),
    organizations: readStringList(visibility, 'organizations', visibilityDefaults.organizations, 'monitors.repoVisibility'),
    checkWindowHours: readNumber(visibility, 'checkWindowHours', visibilityDefaults.checkWindowHours, 'monitors.repoVisibility'),
  };

  return {
    github: { token: readString(github, 'token', defaults.github.token, 'github') },
    monitors: { prChecker, repoVisibility },
  };
}

/**
 * Read the JSON config file. A non-empty GITHUB_TOKEN in `env` replaces the file's token.
 */
export function loadConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): Config {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError('config-file-missing', filePath);
  }

  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError('config-file-malformed', `${filePath}: ${errorMessage(error)}`);
  }

  const config = parseConfig(document);
  const envToken = env.GITHUB_TOKEN;
  if (envToken) {
    config.github.token = envToken;
  }
  return config;
}

export function validateConfig(config: Config): void {
  const { prChecker, repoVisibility } = config.monitors;

  if (!config.github.token) {
    throw new ConfigurationError('missing-token');
  }

  if (prChecker.enabled) {
    if (!isRepositoryVisibility(prChecker.repoVisibility)) {
      throw new ConfigurationError('invalid-visibility', `monitors.prChecker.repoVisibility: ${prChecker.repoVisibility}`);
    }

    if (prChecker.repoVisibility === 'specific' && prChecker.specificRepositories.length === 0) {
      throw new ConfigurationError('missing-repositories');
    }

    if (prChecker.repoVisibility === 'specific' && prChecker.organization) {
      console.warn(
        `⚠️  Organization '${prChecker.organization}' is specified but repoVisibility is 'specific'. The organization setting will be ignored.`,
      );
    }
  }

  if (prChecker.timeWindowHours <= 0) {
    throw new ConfigurationError('invalid-time-window', `monitors.prChecker.timeWindowHours: ${prChecker.timeWindowHours}`);
  }

  if (repoVisibility.enabled) {
    if (!isRepositoryVisibility(repoVisibility.repoVisibility)) {
      throw new ConfigurationError('invalid-visibility', `monitors.repoVisibility.repoVisibility: ${repoVisibility.repoVisibility}`);
    }

    if (repoVisibility.organizations.length === 0) {
      throw new ConfigurationError('missing-organizations');
    }

    if (repoVisibility.checkWindowHours <= 0) {
      throw new ConfigurationError('invalid-check-window', `monitors.repoVisibility.checkWindowHours: ${repoVisibility.checkWindowHours}`);
    }
  }
}
