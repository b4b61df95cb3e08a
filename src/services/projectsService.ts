import { rethrowAsNotFound } from '../gitlab/errors';
import { encodePath, GitlabClient } from '../gitlab/gitlabClient';
import { parseGroup } from '../models/group';
import { parseProject, Project } from '../models/project';
import type LoggerService from './logger';
import { fetchAllPages } from './pagedFetch';

/**
 * @property group - Full path of a group whose projects are listed instead of all visible projects.
 */
export interface ProjectFilters {
  group?: string;
  search?: string;
}

export class ProjectsService {
  constructor(
    private readonly gitlabClient: GitlabClient,
    private readonly logger: LoggerService,
    private readonly pageSize?: number,
  ) {}

  /**
   * @throws NotFoundError when `filters.group` does not resolve.
   */
  async list(filters: ProjectFilters = {}, limit?: number): Promise<Project[]> {
    let path = 'projects';

    if (filters.group) {
      const groupPath = filters.group;
      const group = await this.gitlabClient
        .fetchOne({ path: `groups/${encodePath(groupPath)}`, entity: 'group', parse: parseGroup })
        .catch((error: unknown) => rethrowAsNotFound(error, 'Group', groupPath));
      path = `groups/${group.id}/projects`;
    }

    return fetchAllPages(this.gitlabClient, this.logger, {
      path,
      entity: 'project',
      label: 'Fetching projects',
      parse: parseProject,
      filters: { search: filters.search },
      limit,
      pageSize: this.pageSize,
    });
  }

  /**
   * @throws NotFoundError when the path does not resolve.
   */
  async show(projectPath: string): Promise<Project> {
    try {
      return await this.gitlabClient.fetchOne({
        path: `projects/${encodePath(projectPath)}`,
        entity: 'project',
        parse: parseProject,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Project', projectPath);
    }
  }
}
