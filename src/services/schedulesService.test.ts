import { TransportError } from '../gitlab/errors';
import { GitlabClient } from '../gitlab/gitlabClient';
import { readScheduleInput } from '../models/scheduleInput';
import { FakeTransport, fakeClient } from '../testing/fakeTransport';
import LoggerService from './logger';
import { SchedulesService } from './schedulesService';

const rawSchedule = (id: number, description: string) => ({ id, description, ref: 'main', cron: '0 2 * * *', active: true });

describe('SchedulesService', () => {
  let transport: FakeTransport;
  let logger: LoggerService;
  let service: SchedulesService;

  beforeEach(() => {
    transport = new FakeTransport();
    logger = new LoggerService({ enableInk: false });
    service = new SchedulesService(fakeClient(transport), logger);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('sorts schedules by description case-insensitively and then by id', async () => {
    transport.onPages('projects/acme%2Fapi/pipeline_schedules', [
      [rawSchedule(1, 'beta'), rawSchedule(3, 'alpha'), rawSchedule(2, 'Alpha')],
    ]);

    const schedules = await service.list('acme/api', { scope: 'active' });

    expect(schedules.map(schedule => schedule.id)).toEqual([2, 3, 1]);
    expect(transport.callsTo('projects/acme%2Fapi/pipeline_schedules')[0].params).toMatchObject({ scope: 'active' });
  });

  it('resolves the last pipeline from the most recent runs', async () => {
    transport
      .onPages('projects/acme%2Fapi/pipeline_schedules', [[rawSchedule(1, 'nightly'), rawSchedule(2, 'weekly')]])
      .onPages('projects/acme%2Fapi/pipeline_schedules/1/pipelines', [
        [
          { id: 41, status: 'success', sha: 'aaa', ref: 'main', created_at: '2024-01-02T00:00:00Z' },
          { id: 40, status: 'failed', sha: 'bbb', ref: 'main', created_at: '2024-01-01T00:00:00Z' },
        ],
      ])
      .onPages('projects/acme%2Fapi/pipeline_schedules/2/pipelines', [[]]);

    const [nightly, weekly] = await service.list('acme/api', {}, undefined, { includeLastPipeline: true });

    expect(nightly.lastPipeline).toEqual({ id: 41, sha: 'aaa', ref: 'main', status: 'success' });
    expect(weekly.lastPipeline).toBeNull();
    expect(transport.callsTo('projects/acme%2Fapi/pipeline_schedules/1/pipelines')[0].params).toEqual({
      sort: 'desc',
      page: 1,
      per_page: 100,
    });
  });

  it('lists pipelines started by a schedule, newest first', async () => {
    transport.onPages('projects/acme%2Fapi/pipeline_schedules/1/pipelines', [[{ id: 41, status: 'success' }]]);

    await expect(service.pipelines('acme/api', 1)).resolves.toEqual([expect.objectContaining({ id: 41 })]);
  });

  it('triggers a schedule and returns its refreshed state', async () => {
    const info = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    transport
      .on('post', 'projects/acme%2Fapi/pipeline_schedules/3/play', () => ({ message: '201 Created' }))
      .onJson('projects/acme%2Fapi/pipeline_schedules/3', rawSchedule(3, 'nightly'));

    const schedule = await service.trigger('acme/api', 3);

    expect(schedule.id).toBe(3);
    expect(info).toHaveBeenCalledWith('Triggered pipeline schedule #3 (201 Created)');
  });

  it('reports triggering an unknown schedule as not found', async () => {
    transport.onStatus('post', 'projects/acme%2Fapi/pipeline_schedules/8/play', 404);

    await expect(service.trigger('acme/api', 8)).rejects.toThrow("Pipeline schedule '8' not found.");
  });

  it('sends a trigger once when the API answers with a retryable error', async () => {
    const retrying = new GitlabClient('https://gitlab.example.com', 'test-token', { transport, maxRetries: 2, retryDelayMs: 0 });
    transport.on('post', 'projects/acme%2Fapi/pipeline_schedules/5/play', () => {
      throw new TransportError('GitLab API request failed [POST play] (status 502)', {
        method: 'post',
        endpoint: 'play',
        statusCode: 502,
        retryable: true,
      });
    });

    await expect(new SchedulesService(retrying, logger).trigger('acme/api', 5)).rejects.toMatchObject({ statusCode: 502 });
    expect(transport.callsTo('projects/acme%2Fapi/pipeline_schedules/5/play')).toHaveLength(1);
  });

  it('creates a schedule and then its variables', async () => {
    const info = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const input = readScheduleInput(
      JSON.stringify({
        description: 'nightly',
        ref: 'main',
        cron: '0 2 * * *',
        variables: [{ key: 'DEPLOY', value: 'yes' }],
      }),
      {},
      'create',
    );
    transport
      .on('post', 'projects/acme%2Fapi/pipeline_schedules', () => rawSchedule(12, 'nightly'))
      .on('post', 'projects/acme%2Fapi/pipeline_schedules/12/variables', () => ({ key: 'DEPLOY', value: 'yes' }))
      .onJson('projects/acme%2Fapi/pipeline_schedules/12', {
        ...rawSchedule(12, 'nightly'),
        variables: [{ key: 'DEPLOY', value: 'yes', variable_type: 'env_var' }],
      });

    const schedule = await service.create('acme/api', input);

    expect(transport.callsTo('projects/acme%2Fapi/pipeline_schedules')[0].data).toEqual({
      description: 'nightly',
      ref: 'main',
      cron: '0 2 * * *',
    });
    expect(transport.callsTo('projects/acme%2Fapi/pipeline_schedules/12/variables')[0].data).toEqual({
      key: 'DEPLOY',
      value: 'yes',
      variable_type: 'env_var',
    });
    expect(schedule.variables).toEqual([{ key: 'DEPLOY', value: 'yes', variableType: 'env_var', raw: false }]);
    expect(info).toHaveBeenCalledWith('Created pipeline schedule #12 (nightly)');
  });

  it('returns the created schedule directly when there are no variables', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    transport.on('post', 'projects/acme%2Fapi/pipeline_schedules', () => rawSchedule(13, 'weekly'));

    const schedule = await service.create('acme/api', readScheduleInput('', { description: 'weekly', ref: 'main', cron: '0 3 * * 0' }, 'create'));

    expect(schedule.id).toBe(13);
    expect(transport.calls).toHaveLength(1);
  });

  it('reports creating a schedule in an unknown project as not found', async () => {
    transport.onStatus('post', 'projects/acme%2Fgone/pipeline_schedules', 404);

    await expect(
      service.create('acme/gone', readScheduleInput('', { description: 'x', ref: 'main', cron: '* * * * *' }, 'create')),
    ).rejects.toThrow("Project 'acme/gone' not found.");
  });

  it('updates only the given attributes with a PUT', async () => {
    const info = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    transport.on('put', 'projects/acme%2Fapi/pipeline_schedules/3', () => ({ ...rawSchedule(3, 'nightly'), active: false }));

    const schedule = await service.update('acme/api', 3, readScheduleInput('', { active: false }, 'update'));

    expect(schedule.active).toBe(false);
    expect(transport.callsTo('projects/acme%2Fapi/pipeline_schedules/3')[0]).toMatchObject({
      method: 'put',
      data: { active: false },
    });
    expect(info).toHaveBeenCalledWith('Updated pipeline schedule #3');
  });

  it('reports updating an unknown schedule as not found', async () => {
    transport.onStatus('put', 'projects/acme%2Fapi/pipeline_schedules/9', 404);

    await expect(service.update('acme/api', 9, readScheduleInput('{"cron":"0 1 * * *"}', {}, 'update'))).rejects.toThrow(
      "Pipeline schedule '9' not found.",
    );
  });
});
