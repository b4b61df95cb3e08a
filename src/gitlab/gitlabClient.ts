import axios, { AxiosInstance, Method } from 'axios';
import { ResponseFormatError, TransportError } from './errors';
import { AxiosHttpTransport, HttpRequestConfig, HttpResponse, HttpTransport, QueryParams } from './httpTransport';

/**
 * Optional overrides that influence how the GitLab API client behaves.
 *
 * @property timeoutMs - Request timeout in milliseconds.
 * @property maxRetries - Number of retry attempts for retryable responses.
 * @property retryDelayMs - Base delay between retries in milliseconds.
 * @property httpClient - Custom axios instance to use instead of the default when Axios transport is desired.
 * @property transport - Fully custom HTTP transport implementation for advanced scenarios or testing.
 * @property debug - Receives one line per outgoing request when verbose output is wanted.
 * @property tokenHeader - Header carrying the token; CI job tokens go in `JOB-TOKEN`.
 */
export interface GitlabClientOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  httpClient?: AxiosInstance;
  transport?: HttpTransport;
  debug?: (message: string) => void;
  tokenHeader?: TokenHeader;
}

export type TokenHeader = 'PRIVATE-TOKEN' | 'JOB-TOKEN';

/**
 * Describes a single page request against a list endpoint.
 *
 * @property path - Resource path relative to `/api/v4`, e.g. `groups/12/members`.
 * @property entity - Entity kind named in format errors.
 * @property page - 1-based page number.
 * @property perPage - Page size forwarded as `per_page`.
 * @property params - Additional filters forwarded as query parameters.
 * @property parse - Converts one raw record into its typed model.
 */
export interface PageRequest<T> {
  path: string;
  entity: string;
  page: number;
  perPage: number;
  params?: QueryParams;
  parse: (raw: unknown) => T;
}

export interface ResourceRequest<T> {
  path: string;
  entity: string;
  params?: QueryParams;
  parse: (raw: unknown) => T;
}

export interface WriteRequest<T> extends ResourceRequest<T> {
  body?: unknown;
}

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 500;

type RequestOverrides = Pick<HttpRequestConfig, 'headers' | 'params'>;

/**
 * Encodes a namespaced path (`group/sub/project`) for use as a single URL segment.
 */
export function encodePath(path: string): string {
  return encodeURIComponent(path);
}

/**
 * Thin wrapper around the GitLab REST API that injects authentication headers and
 * applies resilient retry logic suitable for CLI execution. It is the only place that
 * knows about HTTP; everything above it deals in typed records.
 */
export class GitlabClient {
  private readonly url: string;
  private readonly token?: string;
  private readonly transport: HttpTransport;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly baseUrl: string;
  private readonly debug?: (message: string) => void;
  private readonly tokenHeader: TokenHeader;

  /**
   * Creates a new API client bound to the provided GitLab instance and token.
   *
   * @param Url - Base GitLab URL, e.g. `https://gitlab.example.com`.
   * @param Token - Personal access token; anonymous requests are sent when omitted.
   * @param options - HTTP behaviour overrides such as retries, timeouts, or a custom axios instance.
   */
  constructor(Url: string, Token?: string, options: GitlabClientOptions = {}) {
    this.url = Url.replace(/\/+$/, '');
    this.token = Token;
    this.baseUrl = `${this.url}/api/v4`;
    this.debug = options.debug;
    this.tokenHeader = options.tokenHeader ?? 'PRIVATE-TOKEN';

    if (options.transport) {
      this.transport = options.transport;
    } else {
      const axiosInstance = options.httpClient ?? axios.create();
      axiosInstance.defaults.baseURL = this.baseUrl;
      axiosInstance.defaults.timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
      this.transport = new AxiosHttpTransport(axiosInstance);
    }

    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  get Url(): string {
    return this.url;
  }

  private async executeRequest(
    method: Method,
    endpoint: string,
    data?: unknown,
    config?: RequestOverrides,
  ): Promise<HttpResponse> {
    const fullEndpoint = `${this.baseUrl}/${endpoint}`;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      ...(this.token ? { [this.tokenHeader]: this.token } : {}),
      ...(config?.headers ?? {}),
    };

    const requestConfig: HttpRequestConfig = {
      method,
      url: endpoint,
      headers,
      data,
      params: config?.params,
    };

    if (this.debug) {
      const query = config?.params ? ` ${JSON.stringify(config.params)}` : '';
      this.debug(`${method.toUpperCase()} ${fullEndpoint}${query}`);
    }

    // Writes are sent once: a 502 does not prove the server did nothing.
    const maxAttempts = method === 'get' ? Math.max(1, this.maxRetries + 1) : 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.transport.request(requestConfig);
      } catch (error) {
        const apiError = TransportError.fromUnknown(error, method, fullEndpoint);
        if (attempt < maxAttempts && apiError.retryable) {
          await this.delay(this.retryDelayMs * attempt);
          continue;
        }
        throw apiError;
      }
    }

    /* istanbul ignore next -- safety net to satisfy exhaustive typing */
    throw new TransportError('GitLab API request exhausted retry attempts.', {
      method,
      endpoint: fullEndpoint,
      retryable: false,
    });
  }

  private async delay(ms: number) {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Fetches one page of a list endpoint. An empty array means the source is exhausted.
   *
   * @returns Promise resolving to the parsed records of the requested page, in API order.
   * @throws ResponseFormatError when the body is not an array or a record cannot be parsed.
   * @throws TransportError when the request fails.
   */
  async fetchPage<T>(request: PageRequest<T>): Promise<T[]> {
    const response = await this.executeRequest('get', request.path, undefined, {
      params: {
        ...(request.params ?? {}),
        page: request.page,
        per_page: request.perPage,
      },
    });

    if (!Array.isArray(response.data)) {
      throw new ResponseFormatError(request.entity, 'expected a JSON array', request.page);
    }

    try {
      return response.data.map(record => request.parse(record));
    } catch (error) {
      if (error instanceof ResponseFormatError) {
        throw error.withPage(request.page);
      }
      throw error;
    }
  }

  /**
   * Fetches a single resource.
   *
   * @throws ResponseFormatError when the body is not a JSON object the parser accepts.
   * @throws TransportError when the request fails (including 404).
   */
  async fetchOne<T>(request: ResourceRequest<T>): Promise<T> {
    const response = await this.executeRequest('get', request.path, undefined, {
      params: request.params,
    });
    return request.parse(response.data);
  }

  /**
   * Issues a POST and parses the created resource. Never retried.
   */
  async post<T>(request: WriteRequest<T>): Promise<T> {
    const response = await this.executeRequest('post', request.path, request.body, {
      params: request.params,
    });
    return request.parse(response.data);
  }

  async put<T>(request: WriteRequest<T>): Promise<T> {
    const response = await this.executeRequest('put', request.path, request.body, {
      params: request.params,
    });
    return request.parse(response.data);
  }
}

/**
 * Convenience factory that returns a {@link GitlabClient} with the provided settings.
 *
 * @param Url - Base GitLab URL.
 * @param Token - API token used for authentication.
 * @param options - Client configuration overrides.
 * @returns Instantiated {@link GitlabClient}.
 */
export function NewGitlabClient(Url: string, Token?: string, options?: GitlabClientOptions) {
  return new GitlabClient(Url, Token, options);
}
