import type { TreeNode } from '../core/forest';
import type { Group, GroupMember } from '../models/group';
import type { MergeRequest } from '../models/mergeRequest';
import type { Job, Pipeline } from '../models/pipeline';
import type { Project } from '../models/project';
import type { Schedule } from '../models/schedule';

export const OUTPUT_KINDS = ['table', 'tree', 'detail', 'json', 'csv', 'markdown'] as const;

export type OutputKind = (typeof OUTPUT_KINDS)[number];

/**
 * A member listed together with the group it was fetched for.
 */
export interface MemberRow {
  groupPath: string;
  member: GroupMember;
}

/**
 * What each entity kind hands to its renderers. Groups always travel as a forest; a flat listing is
 * a forest of roots.
 */
export interface EntityPayloads {
  groups: TreeNode<Group>[];
  projects: Project[];
  mergeRequests: MergeRequest[];
  pipelines: Pipeline[];
  jobs: Job[];
  schedules: Schedule[];
  members: MemberRow[];
}

export type EntityKind = keyof EntityPayloads;

/**
 * @property color - Emit ANSI colours in terminal renderers. Never auto-detected here.
 */
export interface RenderContext {
  color: boolean;
}

export type Renderer<T> = (data: T, context: RenderContext) => string;

export type CellValue = string | number | boolean | null;

/**
 * @property status - Marks a column whose values are coloured by status in tables.
 */
export interface Column<T> {
  header: string;
  value: (row: T) => CellValue;
  status?: boolean;
}
