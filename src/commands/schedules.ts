import { Command } from 'commander';
import { OUTPUT_FLAGS, outputDescription, parseChoice, parseLimit, parsePositiveInteger, UsageError } from '../config/cliOptions';
import { readScheduleInput, ScheduleFlags, ScheduleInputMode } from '../models/scheduleInput';
import { SchedulesService, ScheduleScope } from '../services/schedulesService';
import type { CommandContext } from './context';

const SCHEDULE_SCOPES: readonly ScheduleScope[] = ['active', 'inactive'];

type ScheduleListOptions = {
  output?: string;
  state?: string;
  limit?: string;
  includeLastPipeline?: boolean;
};

type ScheduleShowOptions = {
  output?: string;
};

type SchedulePipelinesOptions = {
  output?: string;
  limit?: string;
};

type ScheduleWriteOptions = {
  output?: string;
  description?: string;
  ref?: string;
  cron?: string;
  cronTimezone?: string;
  active?: boolean;
  inactive?: boolean;
};

function scheduleFlags(options: ScheduleWriteOptions): ScheduleFlags {
  if (options.active && options.inactive) {
    throw new UsageError('--active and --inactive cannot be used together.');
  }
  return {
    description: options.description,
    ref: options.ref,
    cron: options.cron,
    cronTimezone: options.cronTimezone,
    active: options.active ? true : options.inactive ? false : undefined,
  };
}

function addAttributeOptions(command: Command): Command {
  return command
    .option(OUTPUT_FLAGS, outputDescription('detail', 'json'))
    .option('--description <text>', 'Schedule description (overrides JSON)')
    .option('--ref <ref>', 'Branch or tag to run (overrides JSON)')
    .option('--cron <expression>', 'Cron expression (overrides JSON)')
    .option('--cron-timezone <zone>', 'Cron timezone (overrides JSON)')
    .option('--active', 'Activate the schedule (overrides JSON)')
    .option('--inactive', 'Deactivate the schedule (overrides JSON)');
}

async function readInput(context: CommandContext, options: ScheduleWriteOptions, mode: ScheduleInputMode) {
  const flags = scheduleFlags(options);
  return readScheduleInput(await context.input(), flags, mode);
}

export function registerSchedulesCommand(program: Command, context: CommandContext): Command {
  const schedules = program
    .command('pipeline-schedules')
    .alias('ps')
    .description('List, inspect, run, create and update pipeline schedules of --project');

  schedules
    .command('list')
    .description('List pipeline schedules sorted by description')
    .option(OUTPUT_FLAGS, outputDescription('table', 'csv'))
    .option('--state <state>', `Schedule state: ${SCHEDULE_SCOPES.join(', ')}`)
    .option('--limit <count>', 'Maximum number of schedules to fetch')
    .option('--include-last-pipeline', "Resolve each schedule's most recent pipeline")
    .action(async (options: ScheduleListOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'schedules', { interactive: 'table', piped: 'csv' });
        const limit = parseLimit(options.limit);
        const project = context.project(command);
        const service = new SchedulesService(context.client(command), context.logger);
        const result = await service.list(
          project,
          { scope: parseChoice(options.state, SCHEDULE_SCOPES, '--state') },
          limit,
          { includeLastPipeline: options.includeLastPipeline },
        );
        return context.present(command, 'schedules', output, result, 'pipeline schedules');
      }),
    );

  schedules
    .command('show')
    .description('Show one pipeline schedule with its variables')
    .argument('<id>', 'Schedule ID')
    .option(OUTPUT_FLAGS, outputDescription('detail', 'json'))
    .action(async (rawId: string, options: ScheduleShowOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'schedules', { interactive: 'detail', piped: 'json' });
        const scheduleId = parsePositiveInteger(rawId, 'Schedule ID');
        const project = context.project(command);
        const service = new SchedulesService(context.client(command), context.logger);
        const schedule = await service.show(project, scheduleId);
        return context.present(command, 'schedules', output, [schedule], 'pipeline schedules');
      }),
    );

  schedules
    .command('pipelines')
    .description('List the pipelines a schedule has started')
    .argument('<id>', 'Schedule ID')
    .option(OUTPUT_FLAGS, outputDescription('table', 'csv'))
    .option('--limit <count>', 'Maximum number of pipelines to fetch')
    .action(async (rawId: string, options: SchedulePipelinesOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'pipelines', { interactive: 'table', piped: 'csv' });
        const scheduleId = parsePositiveInteger(rawId, 'Schedule ID');
        const limit = parseLimit(options.limit);
        const project = context.project(command);
        const service = new SchedulesService(context.client(command), context.logger);
        const pipelines = await service.pipelines(project, scheduleId, limit);
        return context.present(command, 'pipelines', output, pipelines, 'pipelines');
      }),
    );

  schedules
    .command('trigger')
    .description('Run a pipeline schedule now')
    .argument('<id>', 'Schedule ID')
    .option(OUTPUT_FLAGS, outputDescription('detail', 'json'))
    .action(async (rawId: string, options: ScheduleShowOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'schedules', { interactive: 'detail', piped: 'json' });
        const scheduleId = parsePositiveInteger(rawId, 'Schedule ID');
        const project = context.project(command);
        const service = new SchedulesService(context.client(command), context.logger);
        const schedule = await service.trigger(project, scheduleId);
        return context.present(command, 'schedules', output, [schedule], 'pipeline schedules');
      }),
    );

  addAttributeOptions(
    schedules
      .command('create')
      .description('Create a pipeline schedule from JSON on stdin; flags override its fields'),
  ).action(async (options: ScheduleWriteOptions, command: Command) =>
    context.execute(async () => {
      const output = context.output(options.output, 'schedules', { interactive: 'detail', piped: 'json' });
      const project = context.project(command);
      const input = await readInput(context, options, 'create');
      const service = new SchedulesService(context.client(command), context.logger);
      const schedule = await service.create(project, input);
      return context.present(command, 'schedules', output, [schedule], 'pipeline schedules');
    }),
  );

  addAttributeOptions(
    schedules
      .command('update')
      .description('Update a pipeline schedule from JSON on stdin; flags override its fields')
      .argument('<id>', 'Schedule ID'),
  ).action(async (rawId: string, options: ScheduleWriteOptions, command: Command) =>
    context.execute(async () => {
      const output = context.output(options.output, 'schedules', { interactive: 'detail', piped: 'json' });
      const scheduleId = parsePositiveInteger(rawId, 'Schedule ID');
      const project = context.project(command);
      const input = await readInput(context, options, 'update');
      const service = new SchedulesService(context.client(command), context.logger);
      const schedule = await service.update(project, scheduleId, input);
      return context.present(command, 'schedules', output, [schedule], 'pipeline schedules');
    }),
  );

  return schedules;
}
