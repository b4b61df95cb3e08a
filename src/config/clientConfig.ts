import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import { IsDefined, IsIn, IsOptional, IsString, Matches, validateSync } from 'class-validator';
import type { GitlabClientOptions, TokenHeader } from '../gitlab/gitlabClient';
import { GlabCredentials, loadGlabCredentials } from './glabConfig';

export const DEFAULT_GITLAB_URL = 'https://gitlab.com';

const URL_ENV_VARS = ['GITLAB_URL', 'CI_SERVER_URL'] as const;
const TOKEN_ENV_VARS = ['GITLAB_TOKEN', 'GL_TOKEN', 'CI_JOB_TOKEN', 'CI_API_TOKEN', 'GITLAB_ACCESS_TOKEN'] as const;
const TOKEN_HEADERS: readonly TokenHeader[] = ['PRIVATE-TOKEN', 'JOB-TOKEN'];
const PROJECT_ENV_VARS = ['GITLAB_REPO_PATH', 'GITLAB_TOOLBOX_PROJECT'] as const;

/**
 * Raised when the environment or flags do not add up to a usable configuration.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Configuration shape for talking to the GitLab API.
 *
 * @property Url - Base GitLab instance URL.
 * @property Token - Personal access token or CI token; anonymous access when absent.
 * @property TokenHeader - `JOB-TOKEN` when the token came from `CI_JOB_TOKEN`, `PRIVATE-TOKEN` otherwise.
 */
export class Config {
  @IsString()
  @IsDefined({ message: 'GitLab URL is not defined. Pass --gitlab-url or set GITLAB_URL.' })
  @Matches(/^https?:\/\//, { message: 'GitLab URL must start with http:// or https://' })
  Url!: string;

  @IsOptional()
  @IsString()
  Token?: string;

  @IsIn(TOKEN_HEADERS)
  TokenHeader!: TokenHeader;
}

/**
 * Values supplied on the command line; they take precedence over everything else.
 */
export interface ConfigOverrides {
  url?: string;
  token?: string;
}

/**
 * @property env - Environment to read; defaults to `process.env`.
 * @property loadGlab - Reads glab CLI credentials; only consulted when flags and environment leave a gap.
 * @property debug - Receives diagnostics such as skipped config files.
 */
export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  loadGlab?: (onSkip?: (message: string) => void) => GlabCredentials | null;
  debug?: (message: string) => void;
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find(value => value !== undefined && value.trim() !== '');
}

function fromEnv(env: NodeJS.ProcessEnv, names: readonly string[]): string | undefined {
  return firstNonEmpty(...names.map(name => env[name]));
}

/**
 * Resolves and validates the client configuration. URL: flag, `GITLAB_URL`, `CI_SERVER_URL`, glab
 * config, then gitlab.com. Token: flag, `GITLAB_TOKEN`, `GL_TOKEN`, `CI_JOB_TOKEN`, `CI_API_TOKEN`,
 * `GITLAB_ACCESS_TOKEN`, then glab config.
 *
 * @throws ConfigurationError listing every failed constraint.
 */
export function NewClientConfig(overrides: ConfigOverrides = {}, sources: ConfigSources = {}): Config {
  const env = sources.env ?? process.env;
  const loadGlab = sources.loadGlab ?? (onSkip => loadGlabCredentials(undefined, onSkip));

  let url = firstNonEmpty(overrides.url, fromEnv(env, URL_ENV_VARS));
  const tokenSource = overrides.token?.trim() ? undefined : TOKEN_ENV_VARS.find(name => firstNonEmpty(env[name]));
  let token = firstNonEmpty(overrides.token, tokenSource && env[tokenSource]);

  if (!url || !token) {
    const glab = loadGlab(sources.debug);
    url = url ?? glab?.url;
    token = token ?? firstNonEmpty(glab?.token);
  }

  const config = plainToInstance(Config, {
    Url: (url ?? DEFAULT_GITLAB_URL).replace(/\/+$/, ''),
    Token: token,
    TokenHeader: tokenSource === 'CI_JOB_TOKEN' ? 'JOB-TOKEN' : 'PRIVATE-TOKEN',
  });
  const errors = validateSync(config, { skipMissingProperties: false });

  if (errors.length > 0) {
    const uniqueErrorMessages = [...new Set(errors.flatMap(err => Object.values(err.constraints ?? {})))];
    throw new ConfigurationError(`Configuration validation error: ${uniqueErrorMessages.join(', ')}`);
  }

  return config;
}

/**
 * Resolves the project path for project-scoped commands: flag, `GITLAB_REPO_PATH`, then
 * `GITLAB_TOOLBOX_PROJECT`.
 */
export function resolveProjectPath(flag: string | undefined, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return firstNonEmpty(flag, fromEnv(env, PROJECT_ENV_VARS));
}

function parseNumberEnv(env: NodeJS.ProcessEnv, name: string, min: number): number | undefined {
  const rawValue = env[name];
  if (rawValue === undefined || rawValue === '') {
    return undefined;
  }

  const parsedValue = Number(rawValue);
  if (!Number.isInteger(parsedValue)) {
    throw new ConfigurationError(`${name} must be a valid integer, but received "${rawValue}"`);
  }

  if (parsedValue < min) {
    throw new ConfigurationError(`${name} must be greater than or equal to ${min}, but received ${parsedValue}`);
  }

  return parsedValue;
}

/**
 * Builds HTTP resilience options from `GITLAB_HTTP_TIMEOUT_MS`, `GITLAB_HTTP_MAX_RETRIES` and
 * `GITLAB_HTTP_RETRY_DELAY_MS`. Unset variables leave the client defaults in place.
 */
export function httpOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): GitlabClientOptions {
  const options: GitlabClientOptions = {};

  const timeoutMs = parseNumberEnv(env, 'GITLAB_HTTP_TIMEOUT_MS', 1);
  if (timeoutMs !== undefined) {
    options.timeoutMs = timeoutMs;
  }

  const maxRetries = parseNumberEnv(env, 'GITLAB_HTTP_MAX_RETRIES', 0);
  if (maxRetries !== undefined) {
    options.maxRetries = maxRetries;
  }

  const retryDelayMs = parseNumberEnv(env, 'GITLAB_HTTP_RETRY_DELAY_MS', 0);
  if (retryDelayMs !== undefined) {
    options.retryDelayMs = retryDelayMs;
  }

  return options;
}
