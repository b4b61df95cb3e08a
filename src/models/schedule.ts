import type { GitlabSchedulePayload, GitlabScheduleVariablePayload } from '../gitlab/types';
import { PayloadReader } from './payloadReader';
import { PIPELINE_STATUSES, PipelineStatus } from './pipeline';

export interface ScheduleVariable {
  key: string;
  variableType: string;
  value: string;
  raw: boolean;
}

export interface ScheduleLastPipeline {
  id: number;
  sha: string;
  ref: string;
  status: PipelineStatus;
}

export interface Schedule {
  id: number;
  description: string;
  ref: string;
  cron: string;
  cronTimezone: string;
  nextRunAt: string | null;
  active: boolean;
  createdAt: string | null;
  updatedAt: string | null;
  owner: string | null;
  lastPipeline: ScheduleLastPipeline | null;
  variables: ScheduleVariable[];
}

export function parseScheduleVariable(raw: unknown): ScheduleVariable {
  const reader = new PayloadReader<GitlabScheduleVariablePayload>('pipeline schedule variable', raw);
  return {
    key: reader.string('key'),
    variableType: reader.stringOr('variable_type', 'env_var'),
    value: reader.stringOr('value', ''),
    raw: reader.boolean('raw'),
  };
}

export function parseSchedule(raw: unknown): Schedule {
  const reader = new PayloadReader<GitlabSchedulePayload>('pipeline schedule', raw);
  const lastPipeline = reader.nested('last_pipeline');

  return {
    id: reader.number('id'),
    description: reader.stringOr('description', ''),
    ref: reader.stringOr('ref', ''),
    cron: reader.string('cron'),
    cronTimezone: reader.stringOr('cron_timezone', 'UTC'),
    nextRunAt: reader.optionalString('next_run_at'),
    active: reader.boolean('active'),
    createdAt: reader.optionalString('created_at'),
    updatedAt: reader.optionalString('updated_at'),
    owner: reader.nested('owner')?.optionalString('username') ?? null,
    lastPipeline: lastPipeline
      ? {
          id: lastPipeline.number('id'),
          sha: lastPipeline.stringOr('sha', ''),
          ref: lastPipeline.stringOr('ref', ''),
          status: lastPipeline.oneOf('status', PIPELINE_STATUSES),
        }
      : null,
    variables: reader.list('variables').map(parseScheduleVariable),
  };
}
