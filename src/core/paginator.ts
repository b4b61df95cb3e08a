export const DEFAULT_PAGE_SIZE = 100;
const MAX_PAGE_SIZE = 100;

/**
 * Fetches one page of records. Page numbers start at 1; an empty result means the source is exhausted.
 */
export type PageFetcher<T> = (page: number, perPage: number) => Promise<T[]>;

/**
 * Controls a {@link paginate} run.
 *
 * @property limit - Maximum number of records to return; `undefined` fetches everything.
 * @property pageSize - Records requested per page (clamped to 1..100, default 100).
 * @property onPage - Called after each non-empty page with its number and the running total.
 */
export interface PaginateOptions {
  limit?: number;
  pageSize?: number;
  onPage?: (page: number, fetched: number) => void;
}

function resolvePageSize(pageSize?: number): number {
  if (pageSize === undefined) {
    return DEFAULT_PAGE_SIZE;
  }

  const parsed = Math.floor(pageSize);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return DEFAULT_PAGE_SIZE;
  }

  return Math.min(MAX_PAGE_SIZE, parsed);
}

/**
 * Requests pages in increasing order until the source runs dry or `limit` records are collected,
 * then returns exactly `min(limit, available)` records in source order.
 *
 * A short page (fewer records than requested) also ends the run, since GitLab only returns one
 * at the end of a collection. A failing fetch rejects the whole call; nothing partial is returned.
 */
export async function paginate<T>(fetchPage: PageFetcher<T>, options: PaginateOptions = {}): Promise<T[]> {
  const { limit, onPage } = options;
  const pageSize = resolvePageSize(options.pageSize);

  if (limit !== undefined && limit <= 0) {
    return [];
  }

  const records: T[] = [];
  let page = 1;

  while (true) {
    const batch = await fetchPage(page, pageSize);
    if (batch.length === 0) {
      break;
    }

    records.push(...batch);
    if (onPage) {
      onPage(page, records.length);
    }

    if (limit !== undefined && records.length >= limit) {
      return records.slice(0, limit);
    }

    if (batch.length < pageSize) {
      break;
    }
    page++;
  }

  return records;
}
