import { latestPipeline } from '../core/statusFilter';
import { rethrowAsNotFound } from '../gitlab/errors';
import { encodePath, GitlabClient } from '../gitlab/gitlabClient';
import type { GitlabMessagePayload } from '../gitlab/types';
import { PayloadReader } from '../models/payloadReader';
import { parsePipeline, Pipeline } from '../models/pipeline';
import { parseSchedule, parseScheduleVariable, Schedule } from '../models/schedule';
import { ScheduleInput, scheduleAttributes } from '../models/scheduleInput';
import type LoggerService from './logger';
import { fetchAllPages } from './pagedFetch';

export type ScheduleScope = 'active' | 'inactive';

export interface ScheduleFilters {
  scope?: ScheduleScope;
}

/**
 * @property includeLastPipeline - Resolve each schedule's most recent pipeline from its pipeline list.
 */
export interface ScheduleListOptions {
  includeLastPipeline?: boolean;
}

const RECENT_PIPELINES_WINDOW = 20;

function compareByDescription(left: Schedule, right: Schedule): number {
  const a = left.description.toLowerCase();
  const b = right.description.toLowerCase();
  if (a !== b) {
    return a < b ? -1 : 1;
  }
  return left.id - right.id;
}

function parseTriggerResponse(raw: unknown): string {
  return new PayloadReader<GitlabMessagePayload>('pipeline schedule trigger', raw).stringOr('message', '');
}

export class SchedulesService {
  constructor(
    private readonly gitlabClient: GitlabClient,
    private readonly logger: LoggerService,
    private readonly pageSize?: number,
  ) {}

  /**
   * Lists schedules sorted by description, case-insensitively, with ties broken by id.
   */
  async list(
    projectPath: string,
    filters: ScheduleFilters = {},
    limit?: number,
    options: ScheduleListOptions = {},
  ): Promise<Schedule[]> {
    const schedules = await fetchAllPages(this.gitlabClient, this.logger, {
      path: `projects/${encodePath(projectPath)}/pipeline_schedules`,
      entity: 'pipeline schedule',
      label: 'Fetching pipeline schedules',
      parse: parseSchedule,
      filters: { scope: filters.scope },
      limit,
      pageSize: this.pageSize,
    });

    const resolved: Schedule[] = [];
    for (const schedule of schedules) {
      resolved.push(options.includeLastPipeline ? await this.withLastPipeline(projectPath, schedule) : schedule);
    }

    return resolved.sort(compareByDescription);
  }

  /**
   * @throws NotFoundError when the project or schedule does not resolve.
   */
  async show(projectPath: string, scheduleId: number): Promise<Schedule> {
    try {
      return await this.gitlabClient.fetchOne({
        path: `projects/${encodePath(projectPath)}/pipeline_schedules/${scheduleId}`,
        entity: 'pipeline schedule',
        parse: parseSchedule,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Pipeline schedule', scheduleId);
    }
  }

  /**
   * @throws NotFoundError when the project or schedule does not resolve.
   */
  async pipelines(projectPath: string, scheduleId: number, limit?: number): Promise<Pipeline[]> {
    try {
      return await fetchAllPages(this.gitlabClient, this.logger, {
        path: `projects/${encodePath(projectPath)}/pipeline_schedules/${scheduleId}/pipelines`,
        entity: 'pipeline',
        label: `Fetching pipelines of schedule #${scheduleId}`,
        parse: parsePipeline,
        filters: { sort: 'desc' },
        limit,
        pageSize: this.pageSize,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Pipeline schedule', scheduleId);
    }
  }

  /**
   * Runs the schedule now and returns its refreshed state.
   *
   * @throws NotFoundError when the project or schedule does not resolve.
   */
  async trigger(projectPath: string, scheduleId: number): Promise<Schedule> {
    let message: string;
    try {
      message = await this.gitlabClient.post({
        path: `projects/${encodePath(projectPath)}/pipeline_schedules/${scheduleId}/play`,
        entity: 'pipeline schedule trigger',
        parse: parseTriggerResponse,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Pipeline schedule', scheduleId);
    }

    this.logger.info(`Triggered pipeline schedule #${scheduleId}${message ? ` (${message})` : ''}`);
    return this.show(projectPath, scheduleId);
  }

  /**
   * Creates a schedule, then adds its variables one by one. Returns the schedule as stored.
   *
   * @throws NotFoundError when the project does not resolve.
   */
  async create(projectPath: string, input: ScheduleInput): Promise<Schedule> {
    const basePath = `projects/${encodePath(projectPath)}/pipeline_schedules`;
    let created: Schedule;
    try {
      created = await this.gitlabClient.post({
        path: basePath,
        entity: 'pipeline schedule',
        body: scheduleAttributes(input),
        parse: parseSchedule,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Project', projectPath);
    }
    this.logger.info(`Created pipeline schedule #${created.id} (${created.description})`);

    const variables = input.variables ?? [];
    for (const variable of variables) {
      await this.gitlabClient.post({
        path: `${basePath}/${created.id}/variables`,
        entity: 'pipeline schedule variable',
        body: {
          key: variable.key,
          value: variable.value,
          variable_type: variable.variable_type ?? 'env_var',
          ...(variable.raw !== undefined ? { raw: variable.raw } : {}),
        },
        parse: parseScheduleVariable,
      });
      this.logger.debug(`Added variable ${variable.key} to schedule #${created.id}`);
    }

    return variables.length > 0 ? this.show(projectPath, created.id) : created;
  }

  /**
   * Changes the given attributes of a schedule and returns it as stored.
   *
   * @throws NotFoundError when the project or schedule does not resolve.
   */
  async update(projectPath: string, scheduleId: number, input: ScheduleInput): Promise<Schedule> {
    let updated: Schedule;
    try {
      updated = await this.gitlabClient.put({
        path: `projects/${encodePath(projectPath)}/pipeline_schedules/${scheduleId}`,
        entity: 'pipeline schedule',
        body: scheduleAttributes(input),
        parse: parseSchedule,
      });
    } catch (error) {
      return rethrowAsNotFound(error, 'Pipeline schedule', scheduleId);
    }

    this.logger.info(`Updated pipeline schedule #${scheduleId}`);
    return updated;
  }

  private async withLastPipeline(projectPath: string, schedule: Schedule): Promise<Schedule> {
    const recent = await this.pipelines(projectPath, schedule.id, RECENT_PIPELINES_WINDOW);
    const latest = latestPipeline(recent);
    if (!latest) {
      this.logger.debug(`No pipelines found for schedule ${schedule.id}`);
      return schedule;
    }

    return {
      ...schedule,
      lastPipeline: { id: latest.id, sha: latest.sha, ref: latest.ref, status: latest.status },
    };
  }
}
