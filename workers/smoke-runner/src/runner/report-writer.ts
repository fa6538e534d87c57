import { promises as fs } from 'fs';
import * as path from 'path';
import { createLogger, testReportSchema, type RunSummary, type TestRecord, type TestReport } from '@ragops/core';

const logger = createLogger('report-writer');

/**
 * JSON run report, rewritten in full after every change so that a crashed
 * run still leaves a valid file behind.
 */
export class ReportWriter {
  private report: TestReport;

  constructor(
    readonly filePath: string,
    suite: string,
    timestamp: string
  ) {
    this.report = {
      timestamp,
      suite,
      tests: [],
      summary: { total: 0, passed: 0, failed: 0, status: 'running' }
    };
  }

  static forSuite(reportDir: string, suite: string, timestamp: string): ReportWriter {
    return new ReportWriter(path.join(reportDir, `${suite}_report.json`), suite, timestamp);
  }

  async start(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await this.flush();
  }

  async record(test: TestRecord, progress: RunSummary): Promise<void> {
    this.report = {
      ...this.report,
      tests: [...this.report.tests, test],
      summary: { ...progress, status: 'running' }
    };
    await this.flush();
  }

  async finish(summary: RunSummary): Promise<TestReport> {
    this.report = { ...this.report, summary };
    await this.flush();

    logger.info({ file: this.filePath, summary }, 'Report written');
    return this.report;
  }

  private async flush(): Promise<void> {
    const report = testReportSchema.parse(this.report);
    const temporary = `${this.filePath}.tmp`;

    await fs.writeFile(temporary, `${JSON.stringify(report, null, 2)}\n`);
    await fs.rename(temporary, this.filePath);
  }
}
