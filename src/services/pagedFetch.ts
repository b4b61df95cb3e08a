import { paginate } from '../core/paginator';
import type { GitlabClient } from '../gitlab/gitlabClient';
import type { QueryParams } from '../gitlab/httpTransport';
import type LoggerService from './logger';

export type QueryFilters = Record<string, string | number | boolean | undefined>;

/**
 * Drops unset filters so they never reach the query string.
 */
export function compactParams(filters: QueryFilters): QueryParams {
  const params: QueryParams = {};
  Object.entries(filters).forEach(([key, value]) => {
    if (value !== undefined && value !== '') {
      params[key] = value;
    }
  });
  return params;
}

/**
 * @property label - Progress label shown while pages arrive, e.g. `Fetching groups`.
 * @property pageSize - Only tests override the page size.
 */
export interface PagedFetchRequest<T> {
  path: string;
  entity: string;
  label: string;
  parse: (raw: unknown) => T;
  filters?: QueryFilters;
  limit?: number;
  pageSize?: number;
}

/**
 * Runs the paginator against one list endpoint and reports each page to the logger.
 */
export async function fetchAllPages<T>(
  client: GitlabClient,
  logger: LoggerService,
  request: PagedFetchRequest<T>,
): Promise<T[]> {
  const params = compactParams(request.filters ?? {});

  try {
    return await paginate(
      (page, perPage) =>
        client.fetchPage({
          path: request.path,
          entity: request.entity,
          page,
          perPage,
          params,
          parse: request.parse,
        }),
      {
        limit: request.limit,
        pageSize: request.pageSize,
        onPage: (page, fetched) => logger.recordPage(request.label, page, fetched, request.limit),
      },
    );
  } finally {
    logger.clearGlobalProgress();
  }
}
