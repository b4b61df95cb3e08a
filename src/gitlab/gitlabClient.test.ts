import MockAdapter from 'axios-mock-adapter';
import axios, { AxiosInstance } from 'axios';
import { ResponseFormatError, TransportError } from './errors';
import { encodePath, NewGitlabClient } from './gitlabClient';
import type { HttpTransport } from './httpTransport';
import { parseGroup } from '../models/group';
import { parseProject } from '../models/project';

let mock: MockAdapter;
let httpClient: AxiosInstance;

const BASE = 'https://gitlab.example.com/api/v4';

beforeEach(() => {
  httpClient = axios.create();
  mock = new MockAdapter(httpClient);
});

afterEach(() => {
  mock.restore();
});

test('fetchPage sends page, per_page, filters and the token header through the injected transport', async () => {
  const transport: HttpTransport = {
    request: jest.fn().mockResolvedValue({
      data: [{ id: 1, name: 'Platform', full_path: 'platform', parent_id: null }],
      headers: {},
      status: 200,
    }),
  };
  const client = NewGitlabClient('https://gitlab.example.com/', 'test-token', { transport });

  const groups = await client.fetchPage({
    path: 'groups',
    entity: 'group',
    page: 3,
    perPage: 100,
    params: { all_available: true },
    parse: parseGroup,
  });

  expect(client.Url).toBe('https://gitlab.example.com');
  expect(groups).toEqual([{ id: 1, name: 'Platform', fullPath: 'platform', parentId: null, members: null }]);
  expect(transport.request).toHaveBeenCalledWith({
    method: 'get',
    url: 'groups',
    headers: { 'Content-Type': 'application/json', 'PRIVATE-TOKEN': 'test-token' },
    data: undefined,
    params: { all_available: true, page: 3, per_page: 100 },
  });
});

test('requests are sent without PRIVATE-TOKEN when no token is configured', async () => {
  const client = NewGitlabClient('https://gitlab.example.com', undefined, { httpClient });
  mock.onGet(`${BASE}/projects/platform%2Fapi`).reply(config => {
    expect(config.headers?.['PRIVATE-TOKEN']).toBeUndefined();
    return [200, { id: 4, name: 'api', path_with_namespace: 'platform/api' }];
  });

  const project = await client.fetchOne({ path: `projects/${encodePath('platform/api')}`, entity: 'project', parse: parseProject });

  expect(project.pathWithNamespace).toBe('platform/api');
});

test('fetchPage rejects a non-array body with the entity and page', async () => {
  const client = NewGitlabClient('https://gitlab.example.com', 'test-token', { httpClient });
  mock.onGet(`${BASE}/groups`).reply(200, { message: 'not a list' });

  const failure = client.fetchPage({ path: 'groups', entity: 'group', page: 2, perPage: 100, parse: parseGroup });

  await expect(failure).rejects.toBeInstanceOf(ResponseFormatError);
  await expect(failure).rejects.toThrow('Unexpected response for group (page 2): expected a JSON array');
});

test('fetchPage attaches the page number to record parse failures', async () => {
  const client = NewGitlabClient('https://gitlab.example.com', 'test-token', { httpClient });
  mock.onGet(`${BASE}/groups`).reply(200, [{ id: 'seven', name: 'x', full_path: 'x' }]);

  await expect(
    client.fetchPage({ path: 'groups', entity: 'group', page: 4, perPage: 100, parse: parseGroup }),
  ).rejects.toThrow('Unexpected response for group (page 4): field "id" must be a number');
});

test('retries retryable failures and then succeeds', async () => {
  const client = NewGitlabClient('https://gitlab.example.com', 'test-token', { httpClient, maxRetries: 2, retryDelayMs: 0 });
  mock
    .onGet(`${BASE}/projects/9`)
    .replyOnce(503, { message: 'unavailable' })
    .onGet(`${BASE}/projects/9`)
    .replyOnce(200, { id: 9, name: 'svc', path_with_namespace: 'team/svc' });

  const project = await client.fetchOne({ path: 'projects/9', entity: 'project', parse: parseProject });

  expect(project.id).toBe(9);
  expect(mock.history.get).toHaveLength(2);
});

test('gives up after the configured number of retries', async () => {
  const client = NewGitlabClient('https://gitlab.example.com', 'test-token', { httpClient, maxRetries: 1, retryDelayMs: 0 });
  mock.onGet(`${BASE}/projects/9`).reply(502, 'bad gateway');

  await expect(client.fetchOne({ path: 'projects/9', entity: 'project', parse: parseProject })).rejects.toThrow(
    `GitLab API request failed [GET ${BASE}/projects/9] (status 502): bad gateway`,
  );
  expect(mock.history.get).toHaveLength(2);
});

test('does not retry a 404', async () => {
  const client = NewGitlabClient('https://gitlab.example.com', 'test-token', { httpClient, maxRetries: 3, retryDelayMs: 0 });
  mock.onGet(`${BASE}/groups/missing`).reply(404, { message: '404 Group Not Found' });

  const failure = client.fetchOne({ path: 'groups/missing', entity: 'group', parse: parseGroup });

  await expect(failure).rejects.toBeInstanceOf(TransportError);
  await expect(failure).rejects.toMatchObject({ statusCode: 404, retryable: false });
  expect(mock.history.get).toHaveLength(1);
});

test('reports each request to the debug callback', async () => {
  const debug = jest.fn();
  const client = NewGitlabClient('https://gitlab.example.com', 'test-token', { httpClient, debug });
  mock.onGet(`${BASE}/groups`).reply(200, []);

  await client.fetchPage({ path: 'groups', entity: 'group', page: 1, perPage: 100, params: { search: 'plat' }, parse: parseGroup });

  expect(debug).toHaveBeenCalledWith(`GET ${BASE}/groups {"search":"plat","page":1,"per_page":100}`);
});

test('post sends the body and parses the reply', async () => {
  const client = NewGitlabClient('https://gitlab.example.com', 'test-token', { httpClient });
  mock.onPost(`${BASE}/projects/3/pipeline_schedules/8/play`).reply(201, { message: '201 Created' });

  const message = await client.post({
    path: 'projects/3/pipeline_schedules/8/play',
    entity: 'pipeline schedule trigger',
    parse: raw => JSON.stringify(raw),
  });

  expect(message).toBe('{"message":"201 Created"}');
  expect(mock.history.post).toHaveLength(1);
});

test('post is sent once even when the failure is retryable', async () => {
  const client = NewGitlabClient('https://gitlab.example.com', 'test-token', { httpClient, maxRetries: 2, retryDelayMs: 0 });
  mock.onPost(`${BASE}/projects/acme%2Fapi/pipeline_schedules/5/play`).reply(502, 'bad gateway');

  const failure = client.post({
    path: `projects/${encodePath('acme/api')}/pipeline_schedules/5/play`,
    entity: 'pipeline schedule trigger',
    parse: raw => raw,
  });

  await expect(failure).rejects.toMatchObject({ statusCode: 502, retryable: true });
  expect(mock.history.post).toHaveLength(1);
});

test('put sends the body and is not retried', async () => {
  const client = NewGitlabClient('https://gitlab.example.com', 'test-token', { httpClient, maxRetries: 2, retryDelayMs: 0 });
  mock.onPut(`${BASE}/projects/3/pipeline_schedules/8`).replyOnce(503, 'unavailable');

  await expect(
    client.put({ path: 'projects/3/pipeline_schedules/8', entity: 'pipeline schedule', body: { active: false }, parse: raw => raw }),
  ).rejects.toMatchObject({ statusCode: 503 });
  expect(mock.history.put).toHaveLength(1);
  expect(mock.history.put[0].data).toBe('{"active":false}');
});

test('a CI job token is sent as JOB-TOKEN', async () => {
  const client = NewGitlabClient('https://gitlab.example.com', 'test-job-token', { httpClient, tokenHeader: 'JOB-TOKEN' });
  mock.onGet(`${BASE}/projects/9`).reply(config => {
    expect(config.headers?.['JOB-TOKEN']).toBe('test-job-token');
    expect(config.headers?.['PRIVATE-TOKEN']).toBeUndefined();
    return [200, { id: 9, name: 'svc', path_with_namespace: 'team/svc' }];
  });

  const project = await client.fetchOne({ path: 'projects/9', entity: 'project', parse: parseProject });

  expect(project.id).toBe(9);
});
