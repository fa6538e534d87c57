import type { RunSummary, TestStatus } from '@ragops/core';

export interface TestOutcome {
  exitCode: number | null;
  timedOut: boolean;
}

export function outcomeStatus(outcome: TestOutcome): TestStatus {
  return outcome.exitCode === 0 && !outcome.timedOut ? 'passed' : 'failed';
}

/**
 * Counters for a finished (or partial) run.
 * A run passes only when nothing failed; an empty run passes.
 */
export function summarize(outcomes: readonly TestOutcome[]): RunSummary {
  const passed = outcomes.filter((outcome) => outcomeStatus(outcome) === 'passed').length;
  const failed = outcomes.length - passed;

  return {
    total: outcomes.length,
    passed,
    failed,
    status: failed === 0 ? 'passed' : 'failed'
  };
}
