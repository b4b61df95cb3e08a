import type { FlatTreeEntry } from '../core/forest';
import type { Group } from '../models/group';
import type { MergeRequest } from '../models/mergeRequest';
import type { Job, Pipeline } from '../models/pipeline';
import type { Project } from '../models/project';
import type { Schedule } from '../models/schedule';
import type { CellValue, Column, MemberRow } from './types';

const SHORT_SHA_LENGTH = 8;

/**
 * Converts a cell value into its text form. Absent values become an empty string so every row keeps
 * the header's shape.
 */
export function cellText(value: CellValue): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'boolean') {
    return value ? 'Yes' : 'No';
  }
  return String(value);
}

/**
 * Formats a duration in seconds as `1h 2m 3s`, dropping leading zero units.
 */
export function formatDuration(seconds: number | null): string | null {
  if (seconds === null) {
    return null;
  }

  const total = Math.round(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const rest = total % 60;

  if (hours > 0) {
    return `${hours}h ${minutes}m ${rest}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${rest}s`;
  }
  return `${rest}s`;
}

export const GROUP_COLUMNS: Column<FlatTreeEntry<Group>>[] = [
  { header: 'ID', value: entry => entry.node.item.id },
  { header: 'Full Path', value: entry => entry.node.item.fullPath },
  { header: 'Name', value: entry => entry.node.item.name },
  { header: 'Parent ID', value: entry => entry.node.item.parentId },
  { header: 'Members', value: entry => entry.node.item.members?.length ?? null },
];

export const MEMBER_COLUMNS: Column<MemberRow>[] = [
  { header: 'Group', value: row => row.groupPath },
  { header: 'Username', value: row => row.member.username },
  { header: 'Name', value: row => row.member.name },
  { header: 'Role', value: row => row.member.accessLevelDescription },
  { header: 'User Status', value: row => row.member.state, status: true },
  { header: 'Membership Status', value: row => row.member.membershipState, status: true },
];

export const PROJECT_COLUMNS: Column<Project>[] = [
  { header: 'ID', value: project => project.id },
  { header: 'Path', value: project => project.pathWithNamespace },
  { header: 'Visibility', value: project => project.visibility },
  { header: 'Default Branch', value: project => project.defaultBranch },
  { header: 'Stars', value: project => project.starCount },
  { header: 'Forks', value: project => project.forksCount },
  { header: 'Description', value: project => project.description },
  { header: 'URL', value: project => project.webUrl },
];

export const MERGE_REQUEST_COLUMNS: Column<MergeRequest>[] = [
  { header: 'IID', value: mr => mr.iid },
  { header: 'Project ID', value: mr => mr.projectId },
  { header: 'Title', value: mr => mr.title },
  { header: 'Author', value: mr => mr.author },
  { header: 'State', value: mr => mr.state, status: true },
  { header: 'Source Branch', value: mr => mr.sourceBranch },
  { header: 'Target Branch', value: mr => mr.targetBranch },
  { header: 'Draft', value: mr => mr.draft },
  { header: 'Pipeline', value: mr => mr.latestPipelineStatus, status: true },
  { header: 'URL', value: mr => mr.webUrl },
];

export const PIPELINE_COLUMNS: Column<Pipeline>[] = [
  { header: 'ID', value: pipeline => pipeline.id },
  { header: 'Status', value: pipeline => pipeline.status, status: true },
  { header: 'Source', value: pipeline => pipeline.source },
  { header: 'Ref', value: pipeline => pipeline.ref },
  { header: 'SHA', value: pipeline => pipeline.sha.slice(0, SHORT_SHA_LENGTH) },
  { header: 'Duration', value: pipeline => formatDuration(pipeline.duration) },
  { header: 'Created', value: pipeline => pipeline.createdAt },
  { header: 'Started', value: pipeline => pipeline.startedAt },
  { header: 'Finished', value: pipeline => pipeline.finishedAt },
  { header: 'URL', value: pipeline => pipeline.webUrl },
];

export const JOB_COLUMNS: Column<Job>[] = [
  { header: 'ID', value: job => job.id },
  { header: 'Name', value: job => job.name },
  { header: 'Stage', value: job => job.stage },
  { header: 'Status', value: job => job.status, status: true },
  { header: 'Pipeline ID', value: job => job.pipelineId },
  { header: 'Duration', value: job => formatDuration(job.duration) },
  { header: 'Started', value: job => job.startedAt },
  { header: 'Finished', value: job => job.finishedAt },
  { header: 'URL', value: job => job.webUrl },
];

export const SCHEDULE_COLUMNS: Column<Schedule>[] = [
  { header: 'ID', value: schedule => schedule.id },
  { header: 'Description', value: schedule => schedule.description },
  { header: 'Ref', value: schedule => schedule.ref },
  { header: 'Cron', value: schedule => schedule.cron },
  { header: 'Timezone', value: schedule => schedule.cronTimezone },
  { header: 'Next Run', value: schedule => schedule.nextRunAt },
  { header: 'Active', value: schedule => schedule.active },
  { header: 'Owner', value: schedule => schedule.owner },
  { header: 'Last Pipeline', value: schedule => schedule.lastPipeline?.id ?? null },
  { header: 'Last Status', value: schedule => schedule.lastPipeline?.status ?? null, status: true },
];

/**
 * Projects rows through a column set as plain text. Every row has exactly `columns.length` cells.
 */
export function toTextRows<T>(columns: readonly Column<T>[], rows: readonly T[]): string[][] {
  return rows.map(row => columns.map(column => cellText(column.value(row))));
}
