import { Command } from 'commander';
import { OUTPUT_FLAGS, outputDescription, parseLimit } from '../config/cliOptions';
import { ProjectsService } from '../services/projectsService';
import type { CommandContext } from './context';

type ProjectListOptions = {
  output?: string;
  group?: string;
  search?: string;
  limit?: string;
};

type ProjectShowOptions = {
  output?: string;
};

export function registerProjectsCommand(program: Command, context: CommandContext): Command {
  const projects = program.command('projects').alias('proj').description('List and inspect projects');

  projects
    .command('list')
    .description('List projects visible to the token')
    .option(OUTPUT_FLAGS, outputDescription('table', 'csv'))
    .option('--group <group-path>', 'Only projects of this group')
    .option('--search <query>', 'Only projects whose name or path matches the query')
    .option('--limit <count>', 'Maximum number of projects to fetch')
    .action(async (options: ProjectListOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'projects', { interactive: 'table', piped: 'csv' });
        const limit = parseLimit(options.limit);
        const service = new ProjectsService(context.client(command), context.logger);
        const result = await service.list({ group: options.group, search: options.search }, limit);
        return context.present(command, 'projects', output, result, 'projects');
      }),
    );

  projects
    .command('show')
    .description('Show one project')
    .argument('<project-path>', 'Full path of the project, e.g. platform/api')
    .option(OUTPUT_FLAGS, outputDescription('detail', 'json'))
    .action(async (projectPath: string, options: ProjectShowOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'projects', { interactive: 'detail', piped: 'json' });
        const service = new ProjectsService(context.client(command), context.logger);
        const project = await service.show(projectPath);
        return context.present(command, 'projects', output, [project], 'projects');
      }),
    );

  return projects;
}
