import { fail, pass, type CheckResult } from './check-result';

/**
 * Endpoint answered with the documented status; 0 means no answer at all
 */
export function checkHttpStatus(label: string, status: number, expected = 200): CheckResult {
  return status === expected
    ? pass(`${label}: HTTP ${status} (OK)`)
    : fail(`${label}: HTTP ${status} (expected ${expected})`);
}
