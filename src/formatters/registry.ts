import { flattenForest } from '../core/forest';
import {
  GROUP_COLUMNS,
  JOB_COLUMNS,
  MEMBER_COLUMNS,
  MERGE_REQUEST_COLUMNS,
  PIPELINE_COLUMNS,
  PROJECT_COLUMNS,
  SCHEDULE_COLUMNS,
} from './columns';
import { renderCsv } from './csv';
import {
  renderMergeRequestDetails,
  renderPipelineDetails,
  renderProjectDetails,
  renderScheduleDetails,
} from './detail';
import {
  renderGroupsJson,
  renderJobsJson,
  renderMembersJson,
  renderMergeRequestsJson,
  renderPipelinesJson,
  renderProjectsJson,
  renderSchedulesJson,
} from './json';
import { renderMarkdown } from './markdown';
import { renderGroupTable, renderTable } from './table';
import { renderGroupTree } from './tree';
import type { EntityKind, EntityPayloads, OutputKind, RenderContext, Renderer } from './types';

/**
 * Raised when an (output kind, entity kind) pair has no renderer.
 */
export class UnsupportedFormatError extends Error {
  constructor(
    public readonly output: string,
    public readonly entity: EntityKind,
    public readonly supported: readonly OutputKind[],
  ) {
    super(`Output format '${output}' is not supported for ${entity}. Supported formats: ${supported.join(', ')}.`);
    this.name = 'UnsupportedFormatError';
  }
}

type RendererTable = {
  [E in EntityKind]: Partial<Record<OutputKind, Renderer<EntityPayloads[E]>>>;
};

const RENDERERS: RendererTable = {
  groups: {
    table: (forest, context) => renderGroupTable(GROUP_COLUMNS, flattenForest(forest), context),
    tree: renderGroupTree,
    json: renderGroupsJson,
    csv: forest => renderCsv(GROUP_COLUMNS, flattenForest(forest)),
    markdown: forest => renderMarkdown(GROUP_COLUMNS, flattenForest(forest)),
  },
  projects: {
    table: (projects, context) => renderTable(PROJECT_COLUMNS, projects, context),
    detail: renderProjectDetails,
    json: renderProjectsJson,
    csv: projects => renderCsv(PROJECT_COLUMNS, projects),
    markdown: projects => renderMarkdown(PROJECT_COLUMNS, projects),
  },
  mergeRequests: {
    table: (mergeRequests, context) => renderTable(MERGE_REQUEST_COLUMNS, mergeRequests, context),
    detail: renderMergeRequestDetails,
    json: renderMergeRequestsJson,
    csv: mergeRequests => renderCsv(MERGE_REQUEST_COLUMNS, mergeRequests),
    markdown: mergeRequests => renderMarkdown(MERGE_REQUEST_COLUMNS, mergeRequests),
  },
  pipelines: {
    table: (pipelines, context) => renderTable(PIPELINE_COLUMNS, pipelines, context),
    detail: renderPipelineDetails,
    json: renderPipelinesJson,
    csv: pipelines => renderCsv(PIPELINE_COLUMNS, pipelines),
    markdown: pipelines => renderMarkdown(PIPELINE_COLUMNS, pipelines),
  },
  jobs: {
    table: (jobs, context) => renderTable(JOB_COLUMNS, jobs, context),
    json: renderJobsJson,
    csv: jobs => renderCsv(JOB_COLUMNS, jobs),
    markdown: jobs => renderMarkdown(JOB_COLUMNS, jobs),
  },
  schedules: {
    table: (schedules, context) => renderTable(SCHEDULE_COLUMNS, schedules, context),
    detail: renderScheduleDetails,
    json: renderSchedulesJson,
    csv: schedules => renderCsv(SCHEDULE_COLUMNS, schedules),
    markdown: schedules => renderMarkdown(SCHEDULE_COLUMNS, schedules),
  },
  members: {
    table: (rows, context) => renderTable(MEMBER_COLUMNS, rows, context),
    json: renderMembersJson,
    csv: rows => renderCsv(MEMBER_COLUMNS, rows),
    markdown: rows => renderMarkdown(MEMBER_COLUMNS, rows),
  },
};

const OUTPUT_ORDER: readonly OutputKind[] = ['table', 'tree', 'detail', 'json', 'csv', 'markdown'];

/**
 * Lists the output kinds an entity kind can be rendered as, in a stable order.
 */
export function supportedOutputs(entity: EntityKind): OutputKind[] {
  const renderers = RENDERERS[entity];
  return OUTPUT_ORDER.filter(output => renderers[output] !== undefined);
}

/**
 * Fails before any data is fetched when the pair has no renderer.
 */
export function assertSupported(entity: EntityKind, output: OutputKind): void {
  if (RENDERERS[entity][output] === undefined) {
    throw new UnsupportedFormatError(output, entity, supportedOutputs(entity));
  }
}

/**
 * Renders `data` through the renderer registered for the pair. There is no fallback: an
 * unregistered pair throws {@link UnsupportedFormatError}.
 */
export function render<E extends EntityKind>(
  entity: E,
  output: OutputKind,
  data: EntityPayloads[E],
  context: RenderContext,
): string {
  const renderers: Partial<Record<OutputKind, Renderer<EntityPayloads[E]>>> = RENDERERS[entity];
  const renderer = renderers[output];
  if (!renderer) {
    throw new UnsupportedFormatError(output, entity, supportedOutputs(entity));
  }
  return renderer(data, context);
}
