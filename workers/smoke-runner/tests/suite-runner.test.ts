import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { testReportSchema } from '@ragops/core';
import { capturePrinter } from '@ragops/test-utils';
import { runSuite, type SuiteRunResult } from '../src/runner/suite-runner';

const fixtures = path.join(__dirname, 'fixtures');

describe('runSuite', () => {
  let reportDir: string;
  let result: SuiteRunResult;
  let lines: string[];
  let echoed: string;

  beforeAll(async () => {
    reportDir = await fs.mkdtemp(path.join(os.tmpdir(), 'suite-run-'));
    const captured = capturePrinter();
    lines = captured.lines;
    echoed = '';

    result = await runSuite({
      dir: path.join(fixtures, 'mixed-suite'),
      suite: 'mixed',
      timeoutSec: 1,
      reportDir,
      cwd: fixtures,
      printer: captured.printer,
      echo: (chunk) => {
        echoed += chunk;
      }
    });
  });

  afterAll(async () => {
    await fs.rm(reportDir, { recursive: true, force: true });
  });

  it('should aggregate pass, failure and timeout', () => {
    expect(result.summary).toEqual({ total: 3, passed: 1, failed: 2, status: 'failed' });
    expect(result.tests.map((test) => [test.name, test.exitCode, test.timedOut])).toEqual([
      ['01_pass', 0, false],
      ['02_fail', 3, false],
      ['03_hang', null, true]
    ]);
  });

  it('should print one verdict line per test', () => {
    expect(lines).toContain('✅ 01_pass: PASSED');
    expect(lines).toContain('❌ 02_fail: FAILED');
    expect(lines).toContain('❌ 03_hang: TIMEOUT (1s)');
  });

  it('should print the summary block', () => {
    const summaryStart = lines.indexOf('MIXED TEST SUITE SUMMARY');

    expect(lines.slice(summaryStart + 2, summaryStart + 5)).toEqual(['Total tests: 3', 'Passed: 1', 'Failed: 2']);
    expect(lines.slice(-2)).toEqual(['💥 SOME TESTS FAILED!', '❌ Mixed suite: FAILURE']);
  });

  it('should echo test output live', () => {
    expect(echoed).toBe('checks ok\ncontract broken\nwaiting on a dead upstream\n');
  });

  it('should leave a final report behind', async () => {
    const report = testReportSchema.parse(
      JSON.parse(await fs.readFile(path.join(reportDir, 'mixed_report.json'), 'utf8'))
    );

    expect(result.reportPath).toBe(path.join(reportDir, 'mixed_report.json'));
    expect(report.suite).toBe('mixed');
    expect(report.summary).toEqual({ total: 3, passed: 1, failed: 2, status: 'failed' });
    expect(report.tests.map((test) => [test.file, test.status, test.exit_code, test.timed_out])).toEqual([
      [path.join('mixed-suite', '01_pass.mjs'), 'passed', 0, false],
      [path.join('mixed-suite', '02_fail.mjs'), 'failed', 3, false],
      [path.join('mixed-suite', '03_hang.mjs'), 'failed', null, true]
    ]);
    expect(report.tests[1].output).toBe('contract broken\n');
  });

  it('should succeed on a suite without failures and skip the report when not asked', async () => {
    const { printer, lines: passingLines } = capturePrinter();

    const passing = await runSuite({
      dir: path.join(fixtures, 'passing-suite'),
      suite: 'passing',
      timeoutSec: 10,
      cwd: fixtures,
      printer,
      echo: () => undefined
    });

    expect(passing.summary).toEqual({ total: 2, passed: 2, failed: 0, status: 'passed' });
    expect(passing.reportPath).toBeNull();
    expect(passingLines.slice(-2)).toEqual(['🎉 ALL TESTS PASSED!', '✅ Passing suite: SUCCESS']);
  });
});
