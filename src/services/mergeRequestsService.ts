import { filterByLatestStatus, latestPipelineStatus } from '../core/statusFilter';
import { NotFoundError, ResponseFormatError, rethrowAsNotFound, TransportError } from '../gitlab/errors';
import { encodePath, GitlabClient } from '../gitlab/gitlabClient';
import { MergeRequest, parseMergeRequest } from '../models/mergeRequest';
import { parsePipeline, Pipeline, PipelineStatus } from '../models/pipeline';
import type LoggerService from './logger';
import { fetchAllPages } from './pagedFetch';

export type MergeRequestStateFilter = 'opened' | 'merged' | 'closed' | 'all';

/**
 * @property project - Project path; merge requests across all projects are listed when absent.
 * @property pipelineStatus - Keep only merge requests whose latest pipeline has this status.
 */
export interface MergeRequestFilters {
  project?: string;
  state?: MergeRequestStateFilter;
  search?: string;
  author?: string;
  excludeDrafts?: boolean;
  pipelineStatus?: PipelineStatus;
}

type ProjectRef = string | number;

/**
 * Outcome of starting a pipeline for one merge request; `pipelineId` is null when nothing was started.
 */
export interface PipelineTriggerResult {
  iid: number;
  pipelineId: number | null;
}

function projectSegment(project: ProjectRef): string {
  return typeof project === 'number' ? String(project) : encodePath(project);
}

export class MergeRequestsService {
  constructor(
    private readonly gitlabClient: GitlabClient,
    private readonly logger: LoggerService,
    private readonly pageSize?: number,
  ) {}

  /**
   * Lists merge requests. With a pipeline status filter every fetched merge request is annotated
   * with its latest pipeline status first; `limit` bounds the fetch, not the filtered result.
   */
  async list(filters: MergeRequestFilters = {}, limit?: number): Promise<MergeRequest[]> {
    const mergeRequests = await fetchAllPages(this.gitlabClient, this.logger, {
      path: filters.project ? `projects/${encodePath(filters.project)}/merge_requests` : 'merge_requests',
      entity: 'merge request',
      label: 'Fetching merge requests',
      parse: parseMergeRequest,
      filters: {
        state: filters.state ?? 'opened',
        search: filters.search,
        author_username: filters.author,
        wip: filters.excludeDrafts ? 'no' : undefined,
      },
      limit,
      pageSize: this.pageSize,
    });

    if (!filters.pipelineStatus) {
      return mergeRequests;
    }

    const annotated: MergeRequest[] = [];
    for (const mergeRequest of mergeRequests) {
      annotated.push(await this.annotate(mergeRequest, mergeRequest.projectId ?? filters.project));
    }
    return filterByLatestStatus(annotated, filters.pipelineStatus);
  }

  /**
   * @throws NotFoundError when the project or merge request does not resolve.
   */
  async show(projectPath: string, iid: number): Promise<MergeRequest> {
    let mergeRequest: MergeRequest;
    try {
      mergeRequest = await this.gitlabClient.fetchOne({
        path: `projects/${encodePath(projectPath)}/merge_requests/${iid}`,
        entity: 'merge request',
        parse: parseMergeRequest,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Merge request', `${projectPath}!${iid}`);
    }

    return this.annotate(mergeRequest, projectPath);
  }

  async pipelines(project: ProjectRef, iid: number): Promise<Pipeline[]> {
    return fetchAllPages(this.gitlabClient, this.logger, {
      path: `projects/${projectSegment(project)}/merge_requests/${iid}/pipelines`,
      entity: 'pipeline',
      label: `Fetching pipelines of !${iid}`,
      parse: parsePipeline,
      pageSize: this.pageSize,
    });
  }

  /**
   * Starts a merge request pipeline for the source branch.
   *
   * @throws NotFoundError when the project or merge request does not resolve.
   */
  async triggerPipeline(project: ProjectRef, iid: number): Promise<Pipeline> {
    try {
      return await this.gitlabClient.post({
        path: `projects/${projectSegment(project)}/merge_requests/${iid}/pipelines`,
        entity: 'pipeline',
        parse: parsePipeline,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Merge request', `${project}!${iid}`);
    }
  }

  /**
   * Starts one pipeline per merge request, in order. A merge request that fails is logged and the
   * rest still run; merge requests without a project id fall back to `fallbackProject`.
   */
  async triggerPipelines(mergeRequests: MergeRequest[], fallbackProject?: string): Promise<PipelineTriggerResult[]> {
    const results: PipelineTriggerResult[] = [];
    for (const mergeRequest of mergeRequests) {
      const project = mergeRequest.projectId ?? fallbackProject;
      if (project === undefined) {
        this.logger.warn(`Skipping !${mergeRequest.iid}: no project id available`);
        results.push({ iid: mergeRequest.iid, pipelineId: null });
        continue;
      }

      this.logger.info(`Triggering pipeline for !${mergeRequest.iid} (${project}:${mergeRequest.sourceBranch})`);
      try {
        const pipeline = await this.triggerPipeline(project, mergeRequest.iid);
        this.logger.info(`Pipeline #${pipeline.id} triggered for !${mergeRequest.iid}`);
        results.push({ iid: mergeRequest.iid, pipelineId: pipeline.id });
      } catch (error) {
        if (!(error instanceof TransportError || error instanceof ResponseFormatError || error instanceof NotFoundError)) {
          throw error;
        }
        this.logger.error(`Failed to trigger pipeline for !${mergeRequest.iid}: ${error.message}`);
        results.push({ iid: mergeRequest.iid, pipelineId: null });
      }
    }
    return results;
  }

  private async annotate(mergeRequest: MergeRequest, project: ProjectRef | undefined): Promise<MergeRequest> {
    if (project === undefined) {
      return mergeRequest;
    }

    const pipelines = await this.pipelines(project, mergeRequest.iid);
    return { ...mergeRequest, latestPipelineStatus: latestPipelineStatus(pipelines) };
  }
}
