import type { MergeRequest } from '../models/mergeRequest';
import type { PipelineStatus } from '../models/pipeline';

/**
 * Anything carrying a status and a creation timestamp: pipelines, or the trimmed
 * pipeline references some endpoints embed.
 */
export interface TimestampedRun {
  status: PipelineStatus;
  createdAt: string | null;
}

function timestampOf(run: TimestampedRun): number {
  if (!run.createdAt) {
    return Number.NEGATIVE_INFINITY;
  }
  const parsed = Date.parse(run.createdAt);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/**
 * Picks the most recently created run. API order is not trusted to be chronological, so every run
 * is compared by creation time; on equal timestamps the one later in the sequence wins. Runs
 * without a parsable timestamp rank below all dated ones.
 */
export function latestPipeline<T extends TimestampedRun>(runs: readonly T[]): T | null {
  let latest: T | null = null;
  let latestTime = Number.NEGATIVE_INFINITY;

  for (const run of runs) {
    const time = timestampOf(run);
    if (latest === null || time >= latestTime) {
      latest = run;
      latestTime = time;
    }
  }

  return latest;
}

export function latestPipelineStatus(runs: readonly TimestampedRun[]): PipelineStatus | null {
  return latestPipeline(runs)?.status ?? null;
}

/**
 * Keeps merge requests whose latest pipeline is in `status`. A merge request without pipelines
 * has no latest status and never matches.
 */
export function filterByLatestStatus(mergeRequests: readonly MergeRequest[], status: PipelineStatus): MergeRequest[] {
  return mergeRequests.filter(mergeRequest => mergeRequest.latestPipelineStatus === status);
}
