import { ConfigOverrides, ConfigSources, httpOptionsFromEnv, NewClientConfig } from '../config/clientConfig';
import { GitlabClient, GitlabClientOptions, NewGitlabClient } from '../gitlab/gitlabClient';
import type LoggerService from '../services/logger';

/**
 * Resolves configuration and HTTP tuning, then constructs the API client. With debug logging enabled
 * every outgoing request is echoed through the logger.
 *
 * @param overrides - URL and token given on the command line.
 * @param logger - Logger receiving debug output.
 * @param sources - Alternative environment or glab loader, mainly for tests.
 * @throws ConfigurationError when the resolved configuration is invalid.
 */
export function getGitlabClient(
  overrides: ConfigOverrides,
  logger: LoggerService,
  sources: ConfigSources = {},
): GitlabClient {
  const debug = logger.isDebugEnabled ? (message: string) => logger.debug(message) : undefined;
  const config = NewClientConfig(overrides, { ...sources, debug: sources.debug ?? debug });
  const options: GitlabClientOptions = {
    ...httpOptionsFromEnv(sources.env ?? process.env),
    debug,
    ...(config.TokenHeader === 'JOB-TOKEN' ? { tokenHeader: config.TokenHeader } : {}),
  };

  logger.debug(`Using GitLab instance ${config.Url}${config.Token ? '' : ' without a token'}`);
  return NewGitlabClient(config.Url, config.Token, options);
}
