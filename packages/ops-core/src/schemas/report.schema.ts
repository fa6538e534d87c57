import { z } from 'zod';

export const testStatusSchema = z.enum(['passed', 'failed']);

export type TestStatus = z.infer<typeof testStatusSchema>;

/**
 * One executed test in a JSON run report
 */
export const testRecordSchema = z.object({
  name: z.string().min(1),
  file: z.string().min(1),
  start_time: z.string(),
  end_time: z.string(),
  exit_code: z.number().int().nullable(),
  status: testStatusSchema,
  timed_out: z.boolean(),
  output: z.string()
});

export type TestRecord = z.infer<typeof testRecordSchema>;

export const runSummarySchema = z.object({
  total: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  status: z.enum(['running', 'passed', 'failed'])
});

export type RunSummary = z.infer<typeof runSummarySchema>;

/**
 * Report file written once per suite run (rewritten as tests complete)
 */
export const testReportSchema = z.object({
  timestamp: z.string(),
  suite: z.string().min(1),
  tests: z.array(testRecordSchema),
  summary: runSummarySchema
});

export type TestReport = z.infer<typeof testReportSchema>;
