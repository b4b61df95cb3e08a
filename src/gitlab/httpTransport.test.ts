import axios from 'axios';
import MockAdapter from 'axios-mock-adapter';
import { AxiosHttpTransport } from './httpTransport';

describe('AxiosHttpTransport', () => {
  it('forwards query parameters and lower-cases response headers', async () => {
    const httpClient = axios.create({ baseURL: 'https://gitlab.example.com/api/v4' });
    const mock = new MockAdapter(httpClient);
    mock.onGet('https://gitlab.example.com/api/v4/groups').reply(config => {
      expect(config.params).toEqual({ all_available: true, page: 2, per_page: 50 });
      return [200, [{ id: 7 }], { 'X-Total-Pages': '4', Link: ['<a>; rel="next"', '<b>; rel="last"'] }];
    });

    const transport = new AxiosHttpTransport(httpClient);
    const response = await transport.request({
      method: 'get',
      url: 'groups',
      params: { all_available: true, page: 2, per_page: 50 },
    });

    expect(response).toEqual({
      data: [{ id: 7 }],
      headers: { 'x-total-pages': '4', link: '<a>; rel="next", <b>; rel="last"' },
      status: 200,
    });
    mock.restore();
  });

  it('sends the request body on POST', async () => {
    const httpClient = axios.create({ baseURL: 'https://gitlab.example.com/api/v4' });
    const mock = new MockAdapter(httpClient);
    mock.onPost('https://gitlab.example.com/api/v4/projects/1/pipeline_schedules/5/play').reply(config => {
      expect(JSON.parse(String(config.data))).toEqual({ note: 'manual' });
      return [201, { message: '201 Created' }];
    });

    const transport = new AxiosHttpTransport(httpClient);
    const response = await transport.request({
      method: 'post',
      url: 'projects/1/pipeline_schedules/5/play',
      data: { note: 'manual' },
    });

    expect(response.status).toBe(201);
    expect(response.data).toEqual({ message: '201 Created' });
    mock.restore();
  });
});
