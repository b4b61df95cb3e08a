import type { TreeNode } from '../core/forest';
import type { Group, GroupMember } from '../models/group';
import type { MergeRequest } from '../models/mergeRequest';
import type { Job, Pipeline } from '../models/pipeline';
import type { Project } from '../models/project';
import type { Schedule } from '../models/schedule';
import type { MemberRow } from './types';

/**
 * JSON documents use GitLab's snake_case field names. Each object is built field by field so key
 * order never depends on how a model happened to be constructed.
 */

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
type JsonObject = { [key: string]: JsonValue };

function stringify(value: JsonValue): string {
  return JSON.stringify(value, null, 2);
}

function memberObject(member: GroupMember): JsonObject {
  return {
    id: member.id,
    username: member.username,
    name: member.name,
    access_level: member.accessLevel,
    access_level_description: member.accessLevelDescription,
    state: member.state,
    membership_state: member.membershipState,
  };
}

function groupObject(node: TreeNode<Group>): JsonObject {
  const group = node.item;
  return {
    id: group.id,
    name: group.name,
    full_path: group.fullPath,
    parent_id: group.parentId,
    members: group.members ? group.members.map(memberObject) : null,
    subgroups: node.children.map(groupObject),
  };
}

function projectObject(project: Project): JsonObject {
  return {
    id: project.id,
    name: project.name,
    path: project.path,
    path_with_namespace: project.pathWithNamespace,
    description: project.description,
    visibility: project.visibility,
    default_branch: project.defaultBranch,
    web_url: project.webUrl,
    namespace: project.namespacePath,
    star_count: project.starCount,
    forks_count: project.forksCount,
  };
}

function mergeRequestObject(mr: MergeRequest): JsonObject {
  return {
    id: mr.id,
    iid: mr.iid,
    project_id: mr.projectId,
    title: mr.title,
    description: mr.description,
    state: mr.state,
    author: mr.author,
    source_branch: mr.sourceBranch,
    target_branch: mr.targetBranch,
    web_url: mr.webUrl,
    created_at: mr.createdAt,
    updated_at: mr.updatedAt,
    merged_at: mr.mergedAt,
    draft: mr.draft,
    latest_pipeline_status: mr.latestPipelineStatus,
  };
}

function pipelineObject(pipeline: Pipeline): JsonObject {
  return {
    id: pipeline.id,
    iid: pipeline.iid,
    project_id: pipeline.projectId,
    status: pipeline.status,
    source: pipeline.source,
    ref: pipeline.ref,
    sha: pipeline.sha,
    web_url: pipeline.webUrl,
    created_at: pipeline.createdAt,
    updated_at: pipeline.updatedAt,
    started_at: pipeline.startedAt,
    finished_at: pipeline.finishedAt,
    duration: pipeline.duration,
  };
}

function jobObject(job: Job): JsonObject {
  return {
    id: job.id,
    pipeline_id: job.pipelineId,
    name: job.name,
    stage: job.stage,
    status: job.status,
    ref: job.ref,
    created_at: job.createdAt,
    started_at: job.startedAt,
    finished_at: job.finishedAt,
    duration: job.duration,
    web_url: job.webUrl,
  };
}

function scheduleObject(schedule: Schedule): JsonObject {
  return {
    id: schedule.id,
    description: schedule.description,
    ref: schedule.ref,
    cron: schedule.cron,
    cron_timezone: schedule.cronTimezone,
    next_run_at: schedule.nextRunAt,
    active: schedule.active,
    created_at: schedule.createdAt,
    updated_at: schedule.updatedAt,
    owner: schedule.owner,
    last_pipeline: schedule.lastPipeline
      ? {
          id: schedule.lastPipeline.id,
          sha: schedule.lastPipeline.sha,
          ref: schedule.lastPipeline.ref,
          status: schedule.lastPipeline.status,
        }
      : null,
    variables: schedule.variables.map(variable => ({
      key: variable.key,
      variable_type: variable.variableType,
      value: variable.value,
      raw: variable.raw,
    })),
  };
}

export function renderGroupsJson(forest: readonly TreeNode<Group>[]): string {
  return stringify(forest.map(groupObject));
}

export function renderMembersJson(rows: readonly MemberRow[]): string {
  return stringify(rows.map(row => ({ group: row.groupPath, ...memberObject(row.member) })));
}

export function renderProjectsJson(projects: readonly Project[]): string {
  return stringify(projects.map(projectObject));
}

export function renderMergeRequestsJson(mergeRequests: readonly MergeRequest[]): string {
  return stringify(mergeRequests.map(mergeRequestObject));
}

export function renderPipelinesJson(pipelines: readonly Pipeline[]): string {
  return stringify(pipelines.map(pipelineObject));
}

export function renderJobsJson(jobs: readonly Job[]): string {
  return stringify(jobs.map(jobObject));
}

export function renderSchedulesJson(schedules: readonly Schedule[]): string {
  return stringify(schedules.map(scheduleObject));
}
