import { describeAccessLevel, parseGroup, parseGroupMember } from './group';
import { parseMergeRequest } from './mergeRequest';
import { parseJob, parsePipeline } from './pipeline';
import { parseProject } from './project';
import { parseSchedule } from './schedule';

describe('group parsers', () => {
  it('maps a group payload and leaves members unloaded', () => {
    expect(parseGroup({ id: 2, name: 'Platform', full_path: 'acme/platform', parent_id: 1 })).toEqual({
      id: 2,
      name: 'Platform',
      fullPath: 'acme/platform',
      parentId: 1,
      members: null,
    });
    expect(parseGroup({ id: 1, name: 'Acme', full_path: 'acme' }).parentId).toBeNull();
  });

  it('describes access levels and defaults member states', () => {
    expect(parseGroupMember({ id: 9, username: 'ada', name: 'Ada', access_level: 40 })).toEqual({
      id: 9,
      username: 'ada',
      name: 'Ada',
      accessLevel: 40,
      accessLevelDescription: 'Maintainer',
      state: 'active',
      membershipState: 'active',
    });
    expect(describeAccessLevel(15)).toBe('Unknown');
  });
});

describe('parseProject', () => {
  it('normalises an empty description and reads the namespace path', () => {
    const project = parseProject({
      id: 11,
      name: 'api',
      path: 'api',
      path_with_namespace: 'acme/api',
      description: '',
      visibility: 'internal',
      namespace: { full_path: 'acme' },
    });

    expect(project.description).toBeNull();
    expect(project.visibility).toBe('internal');
    expect(project.namespacePath).toBe('acme');
    expect(project.starCount).toBe(0);
  });

  it('rejects an unknown visibility', () => {
    expect(() => parseProject({ id: 1, name: 'x', path_with_namespace: 'a/x', visibility: 'secret' })).toThrow(
      'Unexpected response for project: field "visibility" must be one of private, internal, public (received "secret")',
    );
  });
});

describe('parseMergeRequest', () => {
  it('treats work_in_progress as draft and reads the author username', () => {
    const mr = parseMergeRequest({
      id: 300,
      iid: 3,
      project_id: 11,
      title: 'WIP: refactor',
      state: 'opened',
      author: { username: 'grace' },
      work_in_progress: true,
    });

    expect(mr.draft).toBe(true);
    expect(mr.author).toBe('grace');
    expect(mr.latestPipelineStatus).toBeNull();
  });

  it('falls back to an unknown author', () => {
    expect(parseMergeRequest({ id: 1, iid: 1, title: 't', state: 'merged' }).author).toBe('unknown');
  });
});

describe('pipeline parsers', () => {
  it('reads a pipeline', () => {
    const pipeline = parsePipeline({ id: 50, status: 'success', ref: 'main', sha: 'abc', duration: 61 });

    expect(pipeline).toMatchObject({ id: 50, status: 'success', ref: 'main', sha: 'abc', duration: 61, source: null });
  });

  it('takes the pipeline id from the nested pipeline of a job', () => {
    const job = parseJob({ id: 70, name: 'test', stage: 'test', status: 'failed', pipeline: { id: 50 } });

    expect(job.pipelineId).toBe(50);
    expect(job.status).toBe('failed');
  });
});

describe('parseSchedule', () => {
  it('reads owner, last pipeline and variables', () => {
    const schedule = parseSchedule({
      id: 4,
      description: 'Nightly',
      ref: 'main',
      cron: '0 2 * * *',
      active: true,
      owner: { username: 'ops' },
      last_pipeline: { id: 90, sha: 'def', ref: 'main', status: 'failed' },
      variables: [{ key: 'MODE', value: 'full' }],
    });

    expect(schedule.cronTimezone).toBe('UTC');
    expect(schedule.owner).toBe('ops');
    expect(schedule.lastPipeline).toEqual({ id: 90, sha: 'def', ref: 'main', status: 'failed' });
    expect(schedule.variables).toEqual([{ key: 'MODE', variableType: 'env_var', value: 'full', raw: false }]);
  });
});
