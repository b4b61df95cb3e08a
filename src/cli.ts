#!/usr/bin/env node

import { Command } from 'commander';
import packageJson from '../package.json';
import { configureCli, GlobalOptions } from './config/cliOptions';
import { registerGroupsCommand } from './commands/groups';
import { registerMergeRequestsCommand } from './commands/mergeRequests';
import { registerPipelinesCommand } from './commands/pipelines';
import { registerProjectsCommand } from './commands/projects';
import { registerSchedulesCommand } from './commands/schedules';
import { ClientFactory, CommandContext, InputReader, OutputStream } from './commands/context';
import LoggerService from './services/logger';
import { formatError, setDebugLogging } from './utils/errorFormatter';
import { getGitlabClient } from './utils/gitlabHelpers';
import { readProcessStdin } from './utils/stdin';

/**
 * Process-level collaborators, replaceable in tests.
 */
export interface CliRuntime {
  logger?: LoggerService;
  stdout?: OutputStream;
  env?: NodeJS.ProcessEnv;
  clientFactory?: ClientFactory;
  stdin?: InputReader;
}

export interface CliProgram {
  program: Command;
  context: CommandContext;
}

export function createProgram(runtime: CliRuntime = {}): CliProgram {
  const logger = runtime.logger ?? new LoggerService({ header: 'GitLab Toolbox' });
  const env = runtime.env ?? process.env;
  const clientFactory: ClientFactory =
    runtime.clientFactory ??
    ((options: GlobalOptions, log: LoggerService) =>
      getGitlabClient({ url: options.gitlabUrl, token: options.token }, log, { env }));
  const context = new CommandContext(
    logger,
    runtime.stdout ?? process.stdout,
    env,
    clientFactory,
    runtime.stdin ?? readProcessStdin,
  );

  const program = new Command();
  program.name('gitlab-toolbox').version(packageJson.version);
  configureCli(program);

  program.hook('preAction', async (_command, actionCommand) => {
    const debug = Boolean(actionCommand.optsWithGlobals<GlobalOptions>().debug);
    setDebugLogging(debug);
    logger.setDebug(debug);
    await logger.start();
  });

  registerGroupsCommand(program, context);
  registerProjectsCommand(program, context);
  registerMergeRequestsCommand(program, context);
  registerPipelinesCommand(program, context);
  registerSchedulesCommand(program, context);

  return { program, context };
}

/**
 * Parses `argv`, runs the selected command and resolves to the process exit code.
 */
export async function run(argv: readonly string[], runtime: CliRuntime = {}): Promise<number> {
  const { program, context } = createProgram(runtime);
  await program.parseAsync([...argv]);
  context.logger.stop();
  return context.code;
}

if (require.main === module) {
  void run(process.argv).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(`Command failed: ${formatError(error)}`);
      process.exitCode = 1;
    },
  );
}
