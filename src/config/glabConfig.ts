import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { isRecord } from '../utils/records';

/**
 * Connection details recovered from a glab CLI configuration file.
 */
export interface GlabCredentials {
  url: string;
  token?: string;
}

const DEFAULT_GLAB_HOST = 'gitlab.com';

export function defaultGlabConfigPaths(home: string = os.homedir()): string[] {
  return [path.join(home, '.config', 'glab-cli', 'config.yml'), path.join(home, '.glab-cli', 'config.yml')];
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function hostUrl(hostName: string, hostConfig: Record<string, unknown>): string {
  const protocol = stringField(hostConfig, 'api_protocol') ?? 'https';
  const apiHost = stringField(hostConfig, 'api_host') ?? hostName;
  return `${protocol}://${apiHost}`;
}

/**
 * Extracts credentials from the text of a glab `config.yml`. The first host carrying a non-blank
 * token wins; without one, the default `host` entry supplies only the URL.
 *
 * @throws js-yaml's `YAMLException` when the text is not valid YAML.
 */
export function parseGlabConfig(text: string): GlabCredentials | null {
  const document = yaml.load(text);
  if (!isRecord(document)) {
    return null;
  }

  const hosts = isRecord(document.hosts) ? document.hosts : {};
  const defaultHost = stringField(document, 'host') ?? DEFAULT_GLAB_HOST;

  for (const [hostName, hostConfig] of Object.entries(hosts)) {
    if (!isRecord(hostConfig)) {
      continue;
    }
    const token = stringField(hostConfig, 'token');
    if (token && token.trim() !== '') {
      return { url: hostUrl(hostName, hostConfig), token };
    }
  }

  const fallback = hosts[defaultHost];
  if (isRecord(fallback)) {
    return { url: hostUrl(defaultHost, fallback) };
  }

  return null;
}

/**
 * Reads the first usable glab configuration file. Missing files are skipped silently; unreadable or
 * malformed ones are reported through `onSkip` and skipped.
 */
export function loadGlabCredentials(
  paths: readonly string[] = defaultGlabConfigPaths(),
  onSkip?: (message: string) => void,
): GlabCredentials | null {
  for (const configPath of paths) {
    if (!fs.existsSync(configPath)) {
      continue;
    }

    try {
      const credentials = parseGlabConfig(fs.readFileSync(configPath, 'utf8'));
      if (credentials) {
        return credentials;
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      onSkip?.(`Skipping glab config ${configPath}: ${reason}`);
    }
  }

  return null;
}
