import * as path from 'path';
import { createLogger, createPrinter, isoSeconds, type Printer, type RunSummary } from '@ragops/core';
import { outcomeStatus, summarize } from './aggregate';
import { commandFor, discoverTests } from './discovery';
import { runWithTimeout } from './process-supervisor';
import { ReportWriter } from './report-writer';

const logger = createLogger('suite-runner');

export interface SuiteRunOptions {
  dir: string;
  suite: string;
  timeoutSec: number;
  /** Directory for `<suite>_report.json`; no report when absent */
  reportDir?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  printer?: Printer;
  /** Live test output; defaults to stdout */
  echo?: (chunk: string) => void;
  now?: () => Date;
}

export interface TestRun {
  name: string;
  file: string;
  startTime: Date;
  endTime: Date;
  exitCode: number | null;
  timedOut: boolean;
  output: string;
}

export interface SuiteRunResult {
  tests: TestRun[];
  summary: RunSummary;
  reportPath: string | null;
}

/**
 * Run every numbered test of a suite, one process each, in order.
 * Tests share nothing; each gets the same deadline.
 */
export async function runSuite(options: SuiteRunOptions): Promise<SuiteRunResult> {
  const printer = options.printer ?? createPrinter();
  const echo = options.echo ?? ((chunk: string) => process.stdout.write(chunk));
  const now = options.now ?? (() => new Date());
  const cwd = options.cwd ?? process.cwd();
  const title = options.suite.toUpperCase();

  const discovered = await discoverTests(options.dir);
  const report = options.reportDir ? ReportWriter.forSuite(options.reportDir, options.suite, isoSeconds(now())) : null;

  logger.info({ suite: options.suite, dir: options.dir, tests: discovered.length }, 'Suite starting');

  printer.heading(`${title} TEST SUITE`);
  printer.line(`Running all tests in ${path.relative(cwd, options.dir) || '.'}`);
  printer.line();

  if (discovered.length === 0) {
    printer.warn(`No numbered tests found in ${options.dir}`);
  }

  await report?.start();

  const tests: TestRun[] = [];

  for (const test of discovered) {
    printer.rule();
    printer.line(`Running: ${test.name}`);
    printer.rule();

    const { command, args } = commandFor(test.file);
    const startTime = now();
    const result = await runWithTimeout(command, args, {
      timeoutMs: options.timeoutSec * 1000,
      cwd,
      env: options.env ?? process.env,
      onOutput: echo
    });
    const endTime = now();

    const run: TestRun = {
      name: test.name,
      file: path.relative(cwd, test.file),
      startTime,
      endTime,
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      output: result.output
    };
    tests.push(run);

    const status = outcomeStatus(run);
    if (run.timedOut) {
      printer.fail(`${run.name}: TIMEOUT (${options.timeoutSec}s)`);
    } else if (status === 'passed') {
      printer.ok(`${run.name}: PASSED`);
    } else {
      printer.fail(`${run.name}: FAILED`);
    }
    printer.line();

    logger.debug({ test: run.name, exitCode: run.exitCode, timedOut: run.timedOut, durationMs: result.durationMs }, 'Test finished');

    await report?.record(
      {
        name: run.name,
        file: run.file,
        start_time: isoSeconds(startTime),
        end_time: isoSeconds(endTime),
        exit_code: run.exitCode,
        status,
        timed_out: run.timedOut,
        output: run.output
      },
      summarize(tests)
    );
  }

  const summary = summarize(tests);
  await report?.finish(summary);

  printer.rule();
  printer.line(`${title} TEST SUITE SUMMARY`);
  printer.rule();
  printer.line(`Total tests: ${summary.total}`);
  printer.line(`Passed: ${summary.passed}`);
  printer.line(`Failed: ${summary.failed}`);
  if (report) {
    printer.line(`Report saved to: ${report.filePath}`);
  }
  printer.line();

  const label = `${options.suite.charAt(0).toUpperCase()}${options.suite.slice(1)} suite`;
  if (summary.failed === 0) {
    printer.line('🎉 ALL TESTS PASSED!');
    printer.ok(`${label}: SUCCESS`);
  } else {
    printer.line('💥 SOME TESTS FAILED!');
    printer.fail(`${label}: FAILURE`);
  }

  logger.info({ suite: options.suite, summary }, 'Suite finished');

  return { tests, summary, reportPath: report?.filePath ?? null };
}
