import { Command } from 'commander';
import { OUTPUT_FLAGS, outputDescription, parseChoice, parseLimit, parsePositiveInteger } from '../config/cliOptions';
import { PIPELINE_STATUSES } from '../models/pipeline';
import { MergeRequestsService, MergeRequestStateFilter } from '../services/mergeRequestsService';
import type { CommandContext } from './context';

const STATE_FILTERS: readonly MergeRequestStateFilter[] = ['opened', 'merged', 'closed', 'all'];

type MergeRequestListOptions = {
  output?: string;
  state?: string;
  search?: string;
  author?: string;
  drafts: boolean;
  pipelineStatus?: string;
  limit?: string;
  triggerPipeline?: boolean;
};

type MergeRequestShowOptions = {
  output?: string;
};

export function registerMergeRequestsCommand(program: Command, context: CommandContext): Command {
  const mergeRequests = program.command('mergerequests').alias('mr').description('List and inspect merge requests');

  mergeRequests
    .command('list')
    .description('List merge requests of --project, or across all projects when none is given')
    .option(OUTPUT_FLAGS, outputDescription('table', 'csv'))
    .option('--state <state>', `Merge request state: ${STATE_FILTERS.join(', ')}`, 'opened')
    .option('--search <query>', 'Only merge requests whose title or description matches the query')
    .option('--author <username>', 'Only merge requests opened by this user')
    .option('--no-drafts', 'Exclude draft merge requests')
    .option('--pipeline-status <status>', 'Only merge requests whose latest pipeline has this status')
    .option('--limit <count>', 'Maximum number of merge requests to fetch')
    .option('--trigger-pipeline', "Start a new pipeline for each listed merge request's source branch")
    .action(async (options: MergeRequestListOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'mergeRequests', { interactive: 'table', piped: 'csv' });
        const limit = parseLimit(options.limit);
        const project = context.optionalProject(command);
        const service = new MergeRequestsService(context.client(command), context.logger);
        const result = await service.list(
          {
            project,
            state: parseChoice(options.state, STATE_FILTERS, '--state'),
            search: options.search,
            author: options.author,
            excludeDrafts: options.drafts === false,
            pipelineStatus: parseChoice(options.pipelineStatus, PIPELINE_STATUSES, '--pipeline-status'),
          },
          limit,
        );
        const payload = context.present(command, 'mergeRequests', output, result, 'merge requests');

        if (options.triggerPipeline && result.length > 0) {
          const triggered = await service.triggerPipelines(result, project);
          const failed = triggered.filter(outcome => outcome.pipelineId === null).length;
          if (failed > 0) {
            context.logger.error(`${failed} of ${triggered.length} pipelines could not be triggered.`);
            context.fail();
          }
        }
        return payload;
      }),
    );

  mergeRequests
    .command('show')
    .description('Show one merge request with its latest pipeline status')
    .argument('<project-path>', 'Full path of the project')
    .argument('<iid>', 'Merge request IID within the project')
    .option(OUTPUT_FLAGS, outputDescription('detail', 'json'))
    .action(async (projectPath: string, rawIid: string, options: MergeRequestShowOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'mergeRequests', { interactive: 'detail', piped: 'json' });
        const iid = parsePositiveInteger(rawIid, 'Merge request IID');
        const service = new MergeRequestsService(context.client(command), context.logger);
        const mergeRequest = await service.show(projectPath, iid);
        return context.present(command, 'mergeRequests', output, [mergeRequest], 'merge requests');
      }),
    );

  return mergeRequests;
}
