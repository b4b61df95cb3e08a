import { Command } from 'commander';
import { OUTPUT_FLAGS, outputDescription, parseChoice, parseLimit, parsePositiveInteger } from '../config/cliOptions';
import { PIPELINE_STATUSES } from '../models/pipeline';
import { PipelinesService } from '../services/pipelinesService';
import type { CommandContext } from './context';

type PipelineListOptions = {
  output?: string;
  status?: string;
  source?: string;
  ref?: string;
  limit?: string;
};

type PipelineShowOptions = {
  output?: string;
};

type PipelineJobsOptions = {
  output?: string;
  scope?: string;
  limit?: string;
};

export function registerPipelinesCommand(program: Command, context: CommandContext): Command {
  const pipelines = program.command('pipelines').alias('p').description('List and inspect CI pipelines of --project');

  pipelines
    .command('list')
    .description('List pipelines, newest first')
    .option(OUTPUT_FLAGS, outputDescription('table', 'csv'))
    .option('--status <status>', `Pipeline status: ${PIPELINE_STATUSES.join(', ')}`)
    .option('--source <source>', 'Pipeline source, e.g. push, schedule, merge_request_event')
    .option('--ref <ref>', 'Branch or tag')
    .option('--limit <count>', 'Maximum number of pipelines to fetch')
    .action(async (options: PipelineListOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'pipelines', { interactive: 'table', piped: 'csv' });
        const limit = parseLimit(options.limit);
        const project = context.project(command);
        const service = new PipelinesService(context.client(command), context.logger);
        const result = await service.list(
          project,
          {
            status: parseChoice(options.status, PIPELINE_STATUSES, '--status'),
            source: options.source,
            ref: options.ref,
          },
          limit,
        );
        return context.present(command, 'pipelines', output, result, 'pipelines');
      }),
    );

  pipelines
    .command('show')
    .description('Show one pipeline')
    .argument('<id>', 'Pipeline ID')
    .option(OUTPUT_FLAGS, outputDescription('detail', 'json'))
    .action(async (rawId: string, options: PipelineShowOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'pipelines', { interactive: 'detail', piped: 'json' });
        const pipelineId = parsePositiveInteger(rawId, 'Pipeline ID');
        const project = context.project(command);
        const service = new PipelinesService(context.client(command), context.logger);
        const pipeline = await service.show(project, pipelineId);
        return context.present(command, 'pipelines', output, [pipeline], 'pipelines');
      }),
    );

  pipelines
    .command('jobs')
    .description('List the jobs of a pipeline')
    .argument('<pipeline-id>', 'Pipeline ID')
    .option(OUTPUT_FLAGS, outputDescription('table', 'csv'))
    .option('--scope <status>', 'Only jobs with this status')
    .option('--limit <count>', 'Maximum number of jobs to fetch')
    .action(async (rawId: string, options: PipelineJobsOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'jobs', { interactive: 'table', piped: 'csv' });
        const pipelineId = parsePositiveInteger(rawId, 'Pipeline ID');
        const limit = parseLimit(options.limit);
        const project = context.project(command);
        const service = new PipelinesService(context.client(command), context.logger);
        const jobs = await service.jobs(
          project,
          pipelineId,
          { scope: parseChoice(options.scope, PIPELINE_STATUSES, '--scope') },
          limit,
        );
        return context.present(command, 'jobs', output, jobs, 'jobs');
      }),
    );

  return pipelines;
}
