import type { AxiosInstance, AxiosResponse, Method } from 'axios';

export type QueryParams = Record<string, string | number | boolean>;

export interface HttpRequestConfig {
  method: Method;
  url: string;
  data?: unknown;
  headers?: Record<string, string>;
  params?: QueryParams;
}

export interface HttpResponse<T = unknown> {
  data: T;
  headers: Record<string, string>;
  status: number;
}

/**
 * Minimal request surface the GitLab client depends on. Tests substitute their own implementation.
 */
export interface HttpTransport {
  request(config: HttpRequestConfig): Promise<HttpResponse>;
}

export class AxiosHttpTransport implements HttpTransport {
  constructor(private readonly client: AxiosInstance) {}

  async request(config: HttpRequestConfig): Promise<HttpResponse> {
    const response: AxiosResponse<unknown> = await this.client.request({
      method: config.method,
      url: config.url,
      data: config.data,
      headers: config.headers,
      params: config.params,
    });

    return {
      data: response.data,
      headers: normalizeHeaders(response.headers ?? {}),
      status: response.status,
    };
  }
}

function normalizeHeaders(headers: Record<string, unknown>): Record<string, string> {
  const normalized: Record<string, string> = {};
  Object.entries(headers).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      normalized[key.toLowerCase()] = value.join(', ');
    } else if (value !== undefined && value !== null) {
      normalized[key.toLowerCase()] = String(value);
    }
  });
  return normalized;
}
