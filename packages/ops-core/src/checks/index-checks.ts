import { ALLOWED_CLUSTER_STATUSES, OPEN_OK_STATUSES } from '../constants';
import {
  clusterHealthSchema,
  countResponseSchema,
  searchResponseSchema,
  totalHits,
  type TermsBucket
} from '../schemas';
import { parseBody } from '../utils';
import { fail, pass, type CheckResult } from './check-result';

const allowedStatuses: readonly string[] = ALLOWED_CLUSTER_STATUSES;
const openStatuses: readonly number[] = OPEN_OK_STATUSES;

/**
 * Cluster (or index) health must be yellow or green
 */
export function checkClusterStatus(body: string): CheckResult {
  const parsed = parseBody(body, clusterHealthSchema);

  if (!parsed.ok) {
    return fail(`cluster health unreadable (${parsed.error})`);
  }

  const status = parsed.data.status;
  return allowedStatuses.includes(status)
    ? pass(`cluster status is ${status}`)
    : fail(`cluster status is ${status}, expected ${allowedStatuses.join('/')}`);
}

/**
 * Document count must parse and reach the minimum
 */
export function checkDocCount(body: string, minimum: number): CheckResult & { count: number | null } {
  const parsed = parseBody(body, countResponseSchema);

  if (!parsed.ok) {
    return { ...fail(`could not parse count (${parsed.error})`), count: null };
  }

  const count = parsed.data.count;
  return count >= minimum
    ? { ...pass(`count looks sane (${count})`), count }
    : { ...fail(`count too low (${count} < ${minimum}), index missing?`), count };
}

/**
 * At least one hit for a search
 */
export function checkHasHits(body: string): CheckResult & { hits: number } {
  const parsed = parseBody(body, searchResponseSchema);

  if (!parsed.ok) {
    return { ...fail(`search response unreadable (${parsed.error})`), hits: 0 };
  }

  const hits = totalHits(parsed.data);
  return hits > 0 ? { ...pass(`${hits} hits`), hits } : { ...fail('0 hits'), hits };
}

/**
 * Number of hits returned in the page (not the total)
 */
export function pageHitCount(body: string): number | null {
  const parsed = parseBody(body, searchResponseSchema);
  return parsed.ok ? parsed.data.hits.hits.length : null;
}

export function checkOpenStatus(status: number): CheckResult {
  return openStatuses.includes(status)
    ? pass(`file proxy answered HTTP ${status}`)
    : fail(`file proxy answered HTTP ${status}, expected 200 or 206`);
}

/**
 * A terms aggregation is present and has at least one bucket
 */
export function checkAggregation(body: string, name: string): CheckResult & { buckets: TermsBucket[] } {
  const parsed = parseBody(body, searchResponseSchema);

  if (!parsed.ok) {
    return { ...fail(`search response unreadable (${parsed.error})`), buckets: [] };
  }

  const aggregation = parsed.data.aggregations?.[name];
  if (aggregation === undefined) {
    return { ...fail(`aggregation '${name}' missing`), buckets: [] };
  }

  const buckets = aggregation.buckets;
  return buckets.length > 0
    ? { ...pass(`aggregation '${name}' has ${buckets.length} buckets`), buckets }
    : { ...fail(`aggregation '${name}' has no buckets`), buckets };
}
