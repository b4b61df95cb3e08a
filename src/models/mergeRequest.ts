import type { GitlabMergeRequestPayload } from '../gitlab/types';
import { PayloadReader } from './payloadReader';
import type { PipelineStatus } from './pipeline';

export const MERGE_REQUEST_STATES = ['opened', 'merged', 'closed', 'locked'] as const;
export type MergeRequestState = (typeof MERGE_REQUEST_STATES)[number];

/**
 * A merge request snapshot. `latestPipelineStatus` is filled in only when pipelines were resolved
 * for it; `null` otherwise, and also when the merge request has no pipelines at all.
 */
export interface MergeRequest {
  id: number;
  iid: number;
  projectId: number | null;
  title: string;
  description: string | null;
  state: MergeRequestState;
  author: string;
  sourceBranch: string;
  targetBranch: string;
  webUrl: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  mergedAt: string | null;
  draft: boolean;
  latestPipelineStatus: PipelineStatus | null;
}

export function parseMergeRequest(raw: unknown): MergeRequest {
  const reader = new PayloadReader<GitlabMergeRequestPayload>('merge request', raw);
  return {
    id: reader.number('id'),
    iid: reader.number('iid'),
    projectId: reader.optionalNumber('project_id'),
    title: reader.string('title'),
    description: reader.optionalString('description') || null,
    state: reader.oneOf('state', MERGE_REQUEST_STATES),
    author: reader.nested('author')?.optionalString('username') ?? 'unknown',
    sourceBranch: reader.stringOr('source_branch', ''),
    targetBranch: reader.stringOr('target_branch', ''),
    webUrl: reader.optionalString('web_url'),
    createdAt: reader.optionalString('created_at'),
    updatedAt: reader.optionalString('updated_at'),
    mergedAt: reader.optionalString('merged_at'),
    draft: reader.boolean('draft') || reader.boolean('work_in_progress'),
    latestPipelineStatus: null,
  };
}
