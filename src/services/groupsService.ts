import { buildForest, countForest, flattenForest, TreeNode } from '../core/forest';
import { rethrowAsNotFound } from '../gitlab/errors';
import { encodePath, GitlabClient } from '../gitlab/gitlabClient';
import { Group, GroupMember, parseGroup, parseGroupMember } from '../models/group';
import type { MemberRow } from '../formatters/types';
import type LoggerService from './logger';
import { fetchAllPages } from './pagedFetch';

export interface GroupFilters {
  search?: string;
}

/**
 * @property includeMembers - Fetch the members of every group in the result.
 * @property activeOnly - Keep only members whose user account is active.
 */
export interface MemberOptions {
  includeMembers?: boolean;
  activeOnly?: boolean;
}

export interface GroupSummary {
  groups: number;
  members: number;
}

/**
 * Lists groups and assembles them into a parent/child forest.
 */
export class GroupsService {
  constructor(
    private readonly gitlabClient: GitlabClient,
    private readonly logger: LoggerService,
    private readonly pageSize?: number,
  ) {}

  /**
   * Fetches every group visible to the token, in API order.
   */
  async list(filters: GroupFilters = {}, limit?: number): Promise<Group[]> {
    return fetchAllPages(this.gitlabClient, this.logger, {
      path: 'groups',
      entity: 'group',
      label: 'Fetching groups',
      parse: parseGroup,
      filters: { all_available: true, search: filters.search },
      limit,
      pageSize: this.pageSize,
    });
  }

  buildTree(groups: readonly Group[]): TreeNode<Group>[] {
    return buildForest(groups);
  }

  async listTree(filters: GroupFilters = {}, limit?: number, memberOptions: MemberOptions = {}): Promise<TreeNode<Group>[]> {
    const groups = await this.list(filters, limit);
    return this.buildTree(await this.withMembers(groups, memberOptions));
  }

  /**
   * Resolves a group by full path and returns it as the root of a forest holding its descendants.
   *
   * @throws NotFoundError when the path does not resolve.
   */
  async show(fullPath: string, memberOptions: MemberOptions = {}): Promise<TreeNode<Group>[]> {
    const group = await this.resolve(fullPath);
    const descendants = await fetchAllPages(this.gitlabClient, this.logger, {
      path: `groups/${group.id}/descendant_groups`,
      entity: 'group',
      label: `Fetching subgroups of ${group.fullPath}`,
      parse: parseGroup,
      filters: { all_available: true },
      pageSize: this.pageSize,
    });

    return this.buildTree(await this.withMembers([group, ...descendants], memberOptions));
  }

  async members(groupId: number, options: { activeOnly?: boolean } = {}): Promise<GroupMember[]> {
    const members = await fetchAllPages(this.gitlabClient, this.logger, {
      path: `groups/${groupId}/members`,
      entity: 'group member',
      label: `Fetching members of group ${groupId}`,
      parse: parseGroupMember,
      pageSize: this.pageSize,
    });

    return options.activeOnly ? members.filter(member => member.state === 'active') : members;
  }

  /**
   * Members of the group at `fullPath`, each tagged with that path.
   *
   * @throws NotFoundError when the path does not resolve.
   */
  async membersOf(fullPath: string, options: { activeOnly?: boolean } = {}): Promise<MemberRow[]> {
    const group = await this.resolve(fullPath);
    const members = await this.members(group.id, options);
    return members.map(member => ({ groupPath: group.fullPath, member }));
  }

  summarize(forest: readonly TreeNode<Group>[]): GroupSummary {
    const members = flattenForest(forest).reduce((total, entry) => total + (entry.node.item.members?.length ?? 0), 0);
    return { groups: countForest(forest), members };
  }

  private async resolve(fullPath: string): Promise<Group> {
    try {
      return await this.gitlabClient.fetchOne({
        path: `groups/${encodePath(fullPath)}`,
        entity: 'group',
        parse: parseGroup,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Group', fullPath);
    }
  }

  private async withMembers(groups: readonly Group[], options: MemberOptions): Promise<Group[]> {
    if (!options.includeMembers) {
      return [...groups];
    }

    const enriched: Group[] = [];
    for (const group of groups) {
      enriched.push({ ...group, members: await this.members(group.id, { activeOnly: options.activeOnly }) });
    }
    return enriched;
  }
}
