import { Command } from 'commander';
import { OUTPUT_FLAGS, outputDescription, parseLimit } from '../config/cliOptions';
import { GroupsService } from '../services/groupsService';
import type { CommandContext } from './context';

type GroupListOptions = {
  output?: string;
  search?: string;
  limit?: string;
  includeMembers?: boolean;
  activeMembersOnly?: boolean;
  summary?: boolean;
};

type GroupShowOptions = {
  output?: string;
  includeMembers?: boolean;
  activeMembersOnly?: boolean;
};

type GroupMembersOptions = {
  output?: string;
  activeOnly?: boolean;
};

export function registerGroupsCommand(program: Command, context: CommandContext): Command {
  const groups = program.command('groups').alias('g').description('List and inspect groups');

  groups
    .command('list')
    .description('List groups as a parent/child tree')
    .option(OUTPUT_FLAGS, outputDescription('tree', 'csv'))
    .option('--search <query>', 'Only groups whose name or path matches the query')
    .option('--limit <count>', 'Maximum number of groups to fetch')
    .option('--include-members', 'Fetch the members of every group (one extra request per group)')
    .option('--active-members-only', 'With --include-members, keep only active users')
    .option('--summary', 'Log group and member totals')
    .action(async (options: GroupListOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'groups', { interactive: 'tree', piped: 'csv' });
        const limit = parseLimit(options.limit);
        const service = new GroupsService(context.client(command), context.logger);
        const forest = await service.listTree({ search: options.search }, limit, {
          includeMembers: options.includeMembers,
          activeOnly: options.activeMembersOnly,
        });

        if (options.summary) {
          const summary = service.summarize(forest);
          context.logger.info(`Total groups: ${summary.groups}, total members: ${summary.members}`);
        }

        return context.present(command, 'groups', output, forest, 'groups');
      }),
    );

  groups
    .command('show')
    .description('Show a group and all of its subgroups')
    .argument('<group-path>', 'Full path of the group, e.g. platform/backend')
    .option(OUTPUT_FLAGS, outputDescription('tree', 'json'))
    .option('--include-members', 'Fetch the members of the group and its subgroups')
    .option('--active-members-only', 'With --include-members, keep only active users')
    .action(async (groupPath: string, options: GroupShowOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'groups', { interactive: 'tree', piped: 'json' });
        const service = new GroupsService(context.client(command), context.logger);
        const forest = await service.show(groupPath, {
          includeMembers: options.includeMembers,
          activeOnly: options.activeMembersOnly,
        });
        return context.present(command, 'groups', output, forest, 'groups');
      }),
    );

  groups
    .command('members')
    .description('List the members of a group')
    .argument('<group-path>', 'Full path of the group')
    .option(OUTPUT_FLAGS, outputDescription('table', 'csv'))
    .option('--active-only', 'Keep only active users')
    .action(async (groupPath: string, options: GroupMembersOptions, command: Command) =>
      context.execute(async () => {
        const output = context.output(options.output, 'members', { interactive: 'table', piped: 'csv' });
        const service = new GroupsService(context.client(command), context.logger);
        const rows = await service.membersOf(groupPath, { activeOnly: options.activeOnly });
        return context.present(command, 'members', output, rows, 'members');
      }),
    );

  return groups;
}
