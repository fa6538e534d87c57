import { CheckFailedError, type CheckResult, type Printer, type ProbeResponse } from '@ragops/core';

/**
 * Print a passing check, or abort the command with its detail
 */
export function requireCheck(printer: Printer, result: CheckResult): void {
  if (!result.ok) {
    throw new CheckFailedError(result.detail);
  }
  printer.ok(result.detail);
}

/**
 * Abort unless the probe got the expected status
 */
export function requireStatus(response: ProbeResponse, what: string, expected = 200): void {
  if (response.status !== expected) {
    const reason = response.status === 0 ? (response.error ?? 'no response') : `HTTP ${response.status}`;
    throw new CheckFailedError(`${what} failed (${reason})`, { status: response.status });
  }
}
