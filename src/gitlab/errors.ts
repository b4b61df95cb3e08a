import { AxiosError, Method, isAxiosError } from 'axios';
import { isRecord } from '../utils/records';

export interface TransportErrorOptions {
  method: Method;
  endpoint: string;
  statusCode?: number;
  retryable: boolean;
  responseBody?: unknown;
  originalError?: unknown;
}

/**
 * Raised when the GitLab API could not be reached or answered with a non-success status.
 */
export class TransportError extends Error {
  readonly statusCode?: number;
  readonly method: Method;
  readonly endpoint: string;
  readonly retryable: boolean;
  readonly responseBody?: unknown;

  constructor(message: string, options: TransportErrorOptions) {
    super(message);
    this.name = 'TransportError';
    this.method = options.method;
    this.endpoint = options.endpoint;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable;
    this.responseBody = options.responseBody;

    if (options.originalError !== undefined) {
      Object.defineProperty(this, 'cause', {
        value: options.originalError,
        enumerable: false,
        writable: false,
        configurable: true,
      });
    }
  }

  get isNotFound(): boolean {
    return this.statusCode === 404;
  }

  static fromUnknown(error: unknown, method: Method, endpoint: string): TransportError {
    if (error instanceof TransportError) {
      return error;
    }

    if (isAxiosError(error)) {
      return TransportError.fromAxiosError(error, method, endpoint);
    }

    const reason = error instanceof Error ? `Unexpected error (${error.message})` : 'Unexpected error';
    return new TransportError(
      TransportError.buildMessage(method, endpoint, undefined, reason),
      {
        method,
        endpoint,
        retryable: false,
        originalError: error,
      },
    );
  }

  private static fromAxiosError(error: AxiosError, method: Method, endpoint: string): TransportError {
    const statusCode = error.response?.status;
    const retryable = TransportError.isRetryable(error, statusCode);
    const details = TransportError.extractDetails(error);

    return new TransportError(
      TransportError.buildMessage(method, endpoint, statusCode, details),
      {
        method,
        endpoint,
        statusCode,
        retryable,
        originalError: error,
        responseBody: error.response?.data,
      },
    );
  }

  private static buildMessage(method: Method, endpoint: string, statusCode?: number, details?: string): string {
    const statusPart = statusCode ? ` (status ${statusCode})` : '';
    const detailsPart = details ? `: ${details}` : '';
    return `GitLab API request failed [${method.toUpperCase()} ${endpoint}]${statusPart}${detailsPart}`;
  }

  private static isRetryable(error: AxiosError, statusCode?: number): boolean {
    if (statusCode && (statusCode === 429 || statusCode >= 500)) {
      return true;
    }

    // Network or timeout errors typically surface with these codes in Axios
    const retryableCodes = ['ECONNABORTED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN'];
    if (error.code && retryableCodes.includes(error.code)) {
      return true;
    }

    return false;
  }

  private static extractDetails(error: AxiosError): string | undefined {
    const data: unknown = error.response?.data;

    if (typeof data === 'string') {
      return data;
    }

    if (isRecord(data)) {
      const message = data.message;
      if (typeof message === 'string') {
        return message;
      }
      // Validation failures arrive as { message: { base: [...] } }
      if (isRecord(message) && Array.isArray(message.base)) {
        return message.base.map(String).join(' ');
      }
      if (typeof data.error === 'string') {
        return data.error;
      }
    }

    return error.message;
  }
}

/**
 * Raised when a response body cannot be interpreted as the structure a caller expects.
 *
 * @property resource - Entity kind or resource path whose payload was malformed.
 * @property page - Page number of the failing fetch, when the call was paginated.
 */
export class ResponseFormatError extends Error {
  readonly resource: string;
  readonly reason: string;
  readonly page?: number;

  constructor(resource: string, reason: string, page?: number) {
    const pagePart = page !== undefined ? ` (page ${page})` : '';
    super(`Unexpected response for ${resource}${pagePart}: ${reason}`);
    this.name = 'ResponseFormatError';
    this.resource = resource;
    this.reason = reason;
    this.page = page;
  }

  withPage(page: number): ResponseFormatError {
    return new ResponseFormatError(this.resource, this.reason, page);
  }
}

/**
 * Raised when a `show` lookup does not resolve to any record. Callers present it as a plain message.
 */
export class NotFoundError extends Error {
  readonly entity: string;
  readonly identifier: string;

  constructor(entity: string, identifier: string | number) {
    super(`${entity} '${identifier}' not found.`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.identifier = String(identifier);
  }
}

/**
 * Translates a 404 from the API into a {@link NotFoundError}; anything else is rethrown unchanged.
 */
export function rethrowAsNotFound(error: unknown, entity: string, identifier: string | number): never {
  if (error instanceof TransportError && error.isNotFound) {
    throw new NotFoundError(entity, identifier);
  }
  throw error;
}
