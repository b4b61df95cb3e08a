import type { GitlabJobPayload, GitlabPipelinePayload } from '../gitlab/types';
import { PayloadReader } from './payloadReader';

export const PIPELINE_STATUSES = [
  'created',
  'waiting_for_resource',
  'preparing',
  'pending',
  'running',
  'success',
  'failed',
  'canceling',
  'canceled',
  'skipped',
  'manual',
  'scheduled',
] as const;

export type PipelineStatus = (typeof PIPELINE_STATUSES)[number];

export function isPipelineStatus(value: string): value is PipelineStatus {
  return PIPELINE_STATUSES.some(status => status === value);
}

export interface Pipeline {
  id: number;
  iid: number | null;
  projectId: number | null;
  status: PipelineStatus;
  source: string | null;
  ref: string;
  sha: string;
  webUrl: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  startedAt: string | null;
  finishedAt: string | null;
  duration: number | null;
}

/**
 * A single CI job. Jobs share the pipeline status vocabulary.
 */
export interface Job {
  id: number;
  pipelineId: number | null;
  name: string;
  stage: string;
  status: PipelineStatus;
  ref: string;
  createdAt: string | null;
  startedAt: string | null;
  finishedAt: string | null;
  duration: number | null;
  webUrl: string | null;
}

export function parsePipeline(raw: unknown): Pipeline {
  const reader = new PayloadReader<GitlabPipelinePayload>('pipeline', raw);
  return {
    id: reader.number('id'),
    iid: reader.optionalNumber('iid'),
    projectId: reader.optionalNumber('project_id'),
    status: reader.oneOf('status', PIPELINE_STATUSES),
    source: reader.optionalString('source'),
    ref: reader.stringOr('ref', ''),
    sha: reader.stringOr('sha', ''),
    webUrl: reader.optionalString('web_url'),
    createdAt: reader.optionalString('created_at'),
    updatedAt: reader.optionalString('updated_at'),
    startedAt: reader.optionalString('started_at'),
    finishedAt: reader.optionalString('finished_at'),
    duration: reader.optionalNumber('duration'),
  };
}

export function parseJob(raw: unknown): Job {
  const reader = new PayloadReader<GitlabJobPayload>('job', raw);
  return {
    id: reader.number('id'),
    pipelineId: reader.nested('pipeline')?.optionalNumber('id') ?? null,
    name: reader.string('name'),
    stage: reader.stringOr('stage', ''),
    status: reader.oneOf('status', PIPELINE_STATUSES),
    ref: reader.stringOr('ref', ''),
    createdAt: reader.optionalString('created_at'),
    startedAt: reader.optionalString('started_at'),
    finishedAt: reader.optionalString('finished_at'),
    duration: reader.optionalNumber('duration'),
    webUrl: reader.optionalString('web_url'),
  };
}
