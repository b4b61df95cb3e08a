import type { Group, GroupMember } from '../models/group';
import type { MergeRequest } from '../models/mergeRequest';
import type { Job, Pipeline } from '../models/pipeline';
import type { Project } from '../models/project';
import type { Schedule } from '../models/schedule';

export function aGroup(overrides: Partial<Group> = {}): Group {
  return { id: 1, name: 'Acme', fullPath: 'acme', parentId: null, members: null, ...overrides };
}

export function aMember(overrides: Partial<GroupMember> = {}): GroupMember {
  return {
    id: 100,
    username: 'ada',
    name: 'Ada Lovelace',
    accessLevel: 50,
    accessLevelDescription: 'Owner',
    state: 'active',
    membershipState: 'active',
    ...overrides,
  };
}

export function aProject(overrides: Partial<Project> = {}): Project {
  return {
    id: 11,
    name: 'api',
    path: 'api',
    pathWithNamespace: 'acme/api',
    description: null,
    visibility: 'private',
    defaultBranch: 'main',
    webUrl: 'https://gitlab.example.com/acme/api',
    namespacePath: 'acme',
    starCount: 3,
    forksCount: 1,
    ...overrides,
  };
}

export function aMergeRequest(overrides: Partial<MergeRequest> = {}): MergeRequest {
  return {
    id: 500,
    iid: 5,
    projectId: 11,
    title: 'Add health check',
    description: null,
    state: 'opened',
    author: 'ada',
    sourceBranch: 'health',
    targetBranch: 'main',
    webUrl: null,
    createdAt: '2024-05-01T08:00:00Z',
    updatedAt: null,
    mergedAt: null,
    draft: false,
    latestPipelineStatus: null,
    ...overrides,
  };
}

export function aPipeline(overrides: Partial<Pipeline> = {}): Pipeline {
  return {
    id: 900,
    iid: 12,
    projectId: 11,
    status: 'success',
    source: 'push',
    ref: 'main',
    sha: '0123456789abcdef',
    webUrl: null,
    createdAt: '2024-05-01T08:00:00Z',
    updatedAt: null,
    startedAt: null,
    finishedAt: null,
    duration: 125,
    ...overrides,
  };
}

export function aJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 7000,
    pipelineId: 900,
    name: 'unit',
    stage: 'test',
    status: 'failed',
    ref: 'main',
    createdAt: null,
    startedAt: null,
    finishedAt: null,
    duration: 45,
    webUrl: null,
    ...overrides,
  };
}

export function aSchedule(overrides: Partial<Schedule> = {}): Schedule {
  return {
    id: 3,
    description: 'Nightly',
    ref: 'main',
    cron: '0 2 * * *',
    cronTimezone: 'UTC',
    nextRunAt: null,
    active: true,
    createdAt: null,
    updatedAt: null,
    owner: 'ops',
    lastPipeline: null,
    variables: [],
    ...overrides,
  };
}
