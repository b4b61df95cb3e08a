import { rethrowAsNotFound } from '../gitlab/errors';
import { encodePath, GitlabClient } from '../gitlab/gitlabClient';
import { Job, parseJob, parsePipeline, Pipeline, PipelineStatus } from '../models/pipeline';
import type LoggerService from './logger';
import { fetchAllPages } from './pagedFetch';

export interface PipelineFilters {
  status?: PipelineStatus;
  source?: string;
  ref?: string;
}

/**
 * @property scope - Restrict jobs to one status, e.g. `failed`.
 */
export interface JobFilters {
  scope?: PipelineStatus;
}

export class PipelinesService {
  constructor(
    private readonly gitlabClient: GitlabClient,
    private readonly logger: LoggerService,
    private readonly pageSize?: number,
  ) {}

  async list(projectPath: string, filters: PipelineFilters = {}, limit?: number): Promise<Pipeline[]> {
    return fetchAllPages(this.gitlabClient, this.logger, {
      path: `projects/${encodePath(projectPath)}/pipelines`,
      entity: 'pipeline',
      label: 'Fetching pipelines',
      parse: parsePipeline,
      filters: { status: filters.status, source: filters.source, ref: filters.ref },
      limit,
      pageSize: this.pageSize,
    });
  }

  /**
   * @throws NotFoundError when the project or pipeline does not resolve.
   */
  async show(projectPath: string, pipelineId: number): Promise<Pipeline> {
    try {
      return await this.gitlabClient.fetchOne({
        path: `projects/${encodePath(projectPath)}/pipelines/${pipelineId}`,
        entity: 'pipeline',
        parse: parsePipeline,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Pipeline', pipelineId);
    }
  }

  /**
   * @throws NotFoundError when the project or pipeline does not resolve.
   */
  async jobs(projectPath: string, pipelineId: number, filters: JobFilters = {}, limit?: number): Promise<Job[]> {
    try {
      return await fetchAllPages(this.gitlabClient, this.logger, {
        path: `projects/${encodePath(projectPath)}/pipelines/${pipelineId}/jobs`,
        entity: 'job',
        label: `Fetching jobs of pipeline #${pipelineId}`,
        parse: parseJob,
        filters: { scope: filters.scope },
        limit,
        pageSize: this.pageSize,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Pipeline', pipelineId);
    }
  }
}
