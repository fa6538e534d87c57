import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { testReportSchema } from '@ragops/core';
import { ReportWriter } from '../src/runner/report-writer';

describe('ReportWriter', () => {
  let reportDir: string;

  beforeEach(async () => {
    reportDir = await fs.mkdtemp(path.join(os.tmpdir(), 'suite-report-'));
  });

  afterEach(async () => {
    await fs.rm(reportDir, { recursive: true, force: true });
  });

  async function readReport(file: string) {
    return testReportSchema.parse(JSON.parse(await fs.readFile(file, 'utf8')));
  }

  it('should write a running report at start', async () => {
    const writer = ReportWriter.forSuite(path.join(reportDir, 'nested'), 'release', '2024-01-31T23:59:59+01:00');

    await writer.start();

    expect(writer.filePath).toBe(path.join(reportDir, 'nested', 'release_report.json'));
    expect(await readReport(writer.filePath)).toEqual({
      timestamp: '2024-01-31T23:59:59+01:00',
      suite: 'release',
      tests: [],
      summary: { total: 0, passed: 0, failed: 0, status: 'running' }
    });
  });

  it('should append each test and finish with the final status', async () => {
    const writer = ReportWriter.forSuite(reportDir, 'small', '2024-01-31T23:59:59+01:00');
    const record = {
      name: '01_health_endpoints',
      file: 'src/suites/small/01_health_endpoints.ts',
      start_time: '2024-01-31T23:59:59+01:00',
      end_time: '2024-02-01T00:00:01+01:00',
      exit_code: 1,
      status: 'failed' as const,
      timed_out: false,
      output: '❌ Web UI: HTTP 0 (expected 200)\n'
    };

    await writer.start();
    await writer.record(record, { total: 1, passed: 0, failed: 1, status: 'failed' });

    const partial = await readReport(writer.filePath);
    expect(partial.tests).toEqual([record]);
    expect(partial.summary).toEqual({ total: 1, passed: 0, failed: 1, status: 'running' });

    await writer.finish({ total: 1, passed: 0, failed: 1, status: 'failed' });

    const final = await readReport(writer.filePath);
    expect(final.summary.status).toBe('failed');
    expect(await fs.readdir(reportDir)).toEqual(['small_report.json']);
  });
});
