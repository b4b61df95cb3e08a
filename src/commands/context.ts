import type { Command } from 'commander';
import { resolveProjectPath } from '../config/clientConfig';
import { GlobalOptions, resolveOutputKind, UsageError } from '../config/cliOptions';
import { NotFoundError } from '../gitlab/errors';
import type { GitlabClient } from '../gitlab/gitlabClient';
import { assertSupported, render } from '../formatters/registry';
import type { EntityKind, EntityPayloads, OutputKind, RenderContext } from '../formatters/types';
import type LoggerService from '../services/logger';
import { formatError } from '../utils/errorFormatter';

/**
 * Where rendered payloads go. Only stdout carries them.
 */
export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

/**
 * Resolves to everything piped on stdin, or an empty string when nothing was.
 */
export type InputReader = () => Promise<string>;

export type ClientFactory = (options: GlobalOptions, logger: LoggerService) => GitlabClient;

/**
 * Per-command output defaults: `interactive` on a terminal, `piped` otherwise.
 */
export interface OutputDefaults {
  interactive: OutputKind;
  piped: OutputKind;
}

/**
 * Kinds rendered for people rather than programs; these print a warning instead of an empty payload.
 */
const HUMAN_OUTPUTS: readonly OutputKind[] = ['table', 'tree', 'detail'];

/**
 * Shared state handed to every command handler.
 */
export class CommandContext {
  private exitCode = 0;

  constructor(
    readonly logger: LoggerService,
    private readonly stdout: OutputStream,
    private readonly env: NodeJS.ProcessEnv,
    private readonly clientFactory: ClientFactory,
    private readonly readStdin: InputReader,
  ) {}

  get code(): number {
    return this.exitCode;
  }

  globals(command: Command): GlobalOptions {
    return command.optsWithGlobals<GlobalOptions>();
  }

  client(command: Command): GitlabClient {
    return this.clientFactory(this.globals(command), this.logger);
  }

  /**
   * @throws UsageError when neither `--project` nor the environment names a project.
   */
  project(command: Command): string {
    const project = resolveProjectPath(this.globals(command).project, this.env);
    if (!project) {
      throw new UsageError('No project given. Pass --project or set GITLAB_REPO_PATH.');
    }
    return project;
  }

  async input(): Promise<string> {
    return this.readStdin();
  }

  /**
   * Sets exit code 1 for a command that printed its result but did not fully succeed.
   */
  fail(): void {
    this.exitCode = 1;
  }

  optionalProject(command: Command): string | undefined {
    return resolveProjectPath(this.globals(command).project, this.env);
  }

  output(raw: string | undefined, entity: EntityKind, defaults: OutputDefaults): OutputKind {
    const output = resolveOutputKind(raw, defaults, Boolean(this.stdout.isTTY));
    assertSupported(entity, output);
    return output;
  }

  renderContext(command: Command): RenderContext {
    return {
      color: this.globals(command).color !== false && Boolean(this.stdout.isTTY) && this.env.NO_COLOR === undefined,
    };
  }

  /**
   * Renders a result, or warns and returns `null` when a human-oriented view would be empty.
   */
  present<E extends EntityKind>(
    command: Command,
    entity: E,
    output: OutputKind,
    data: EntityPayloads[E],
    noun: string,
  ): string | null {
    if (data.length === 0 && HUMAN_OUTPUTS.includes(output)) {
      this.logger.warn(`No ${noun} found.`);
      return null;
    }
    return render(entity, output, data, this.renderContext(command));
  }

  /**
   * Runs a handler, writes its payload to stdout, and turns failures into log lines and exit code 1.
   */
  async execute(handler: () => Promise<string | null>): Promise<void> {
    try {
      const payload = await handler();
      this.logger.stop();
      if (payload !== null) {
        this.stdout.write(`${payload}\n`);
      }
    } catch (error) {
      this.exitCode = 1;
      if (error instanceof NotFoundError) {
        this.logger.error(error.message);
      } else {
        this.logger.error(`Command failed: ${formatError(error)}`);
      }
      this.logger.stop();
    }
  }
}
