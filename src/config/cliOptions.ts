import type { Command } from 'commander';
import { OUTPUT_KINDS, OutputKind } from '../formatters/types';

/**
 * Raised for flag values the command line cannot act on.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptionDefinition {
  flags: string;
  description: string;
}

export interface CliSchema {
  description: string;
  options: CliOptionDefinition[];
}

/**
 * Options accepted before or after any subcommand.
 */
export type GlobalOptions = {
  gitlabUrl?: string;
  token?: string;
  project?: string;
  debug?: boolean;
  color: boolean;
};

export const cliSchema: CliSchema = {
  description: 'Query GitLab groups, projects, merge requests, pipelines and pipeline schedules',
  options: [
    { flags: '--gitlab-url <url>', description: 'GitLab instance URL (default: GITLAB_URL, CI_SERVER_URL, glab config, https://gitlab.com)' },
    { flags: '--token <token>', description: 'Access token (default: GITLAB_TOKEN, GL_TOKEN, CI_JOB_TOKEN, CI_API_TOKEN, GITLAB_ACCESS_TOKEN, glab config)' },
    { flags: '--project <path>', description: 'Project path for project-scoped commands (default: GITLAB_REPO_PATH, GITLAB_TOOLBOX_PROJECT)' },
    { flags: '--debug', description: 'Log every API request and print full error stack traces' },
    { flags: '--no-color', description: 'Disable colours in table, tree and detail output' },
  ],
};

export const OUTPUT_FLAGS = '-o, --output <format>';

export function outputDescription(interactive: OutputKind, piped: OutputKind): string {
  return `Output format: ${OUTPUT_KINDS.join(', ')} (default: ${interactive} on a terminal, ${piped} otherwise)`;
}

export function configureCli(program: Command): Command {
  program.description(cliSchema.description);
  cliSchema.options.forEach(option => {
    program.option(option.flags, option.description);
  });
  return program;
}

function isOutputKind(value: string): value is OutputKind {
  return OUTPUT_KINDS.some(kind => kind === value);
}

/**
 * Resolves the requested output kind. Without `-o` the interactive default applies when stdout is a
 * terminal and the piped default otherwise.
 */
export function resolveOutputKind(
  raw: string | undefined,
  defaults: { interactive: OutputKind; piped: OutputKind },
  stdoutIsTTY: boolean,
): OutputKind {
  if (raw === undefined) {
    return stdoutIsTTY ? defaults.interactive : defaults.piped;
  }

  const normalized = raw.trim().toLowerCase();
  if (!isOutputKind(normalized)) {
    throw new UsageError(`--output must be one of: ${OUTPUT_KINDS.join(', ')}, but received "${raw}".`);
  }
  return normalized;
}

/**
 * Parses `--limit`. Zero is allowed and yields an empty result.
 */
export function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const trimmed = raw.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw new UsageError(`--limit must be a non-negative integer, but received "${raw}".`);
  }
  return parsed;
}

export function parsePositiveInteger(raw: string, name: string): number {
  const trimmed = raw.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(parsed) || parsed <= 0) {
    throw new UsageError(`${name} must be a positive integer, but received "${raw}".`);
  }
  return parsed;
}

/**
 * Validates a flag against a closed set of values.
 */
export function parseChoice<V extends string>(raw: string | undefined, allowed: readonly V[], flag: string): V | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const normalized = raw.trim().toLowerCase();
  const match = allowed.find(candidate => candidate === normalized);
  if (match === undefined) {
    throw new UsageError(`${flag} must be one of: ${allowed.join(', ')}, but received "${raw}".`);
  }
  return match;
}
