import * as path from 'path';
import { parseArgs } from 'util';
import { BaseError, ConfigError, createLogger, createPrinter, loadOpsConfig, type Printer } from '@ragops/core';
import { runSuite, type SuiteRunOptions } from './runner/suite-runner';

const logger = createLogger('smoke-runner');

export const BUILTIN_SUITES = ['small', 'release'] as const;

export const USAGE = `Usage: smoke-runner <small|release|DIR> [--timeout SEC] [--report]

  small      quick read-only checks, run after every change
  release    broader read-only matrix, writes a JSON report
  DIR        any directory of NN_name.{ts,js,mjs,cjs,sh} tests

Options:
  --timeout SEC   per-test deadline (default TEST_TIMEOUT_SEC, 30)
  --report        write <REPORT_DIR>/<suite>_report.json`;

export interface SuiteTarget {
  suite: string;
  dir: string;
  reportByDefault: boolean;
}

/**
 * Map a suite name or directory argument to where its tests live
 */
export function resolveSuite(target: string, suitesRoot = path.join(__dirname, 'suites')): SuiteTarget {
  const builtin = BUILTIN_SUITES.find((name) => name === target);

  if (builtin) {
    return { suite: builtin, dir: path.join(suitesRoot, builtin), reportByDefault: builtin === 'release' };
  }

  const dir = path.resolve(target);
  return { suite: path.basename(dir), dir, reportByDefault: false };
}

export function parseTimeout(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;

  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`--timeout must be a positive number of seconds, got '${value}'`);
  }
  return seconds;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      timeout: { type: 'string', short: 't' },
      report: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    }
  });
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  printer?: Printer;
  overrides?: Partial<Pick<SuiteRunOptions, 'cwd' | 'echo' | 'now'>>;
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const printer = options.printer ?? createPrinter();
  const env = options.env ?? process.env;

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    printer.line(error instanceof Error ? error.message : String(error));
    printer.line(USAGE);
    return 2;
  }

  if (parsed.values.help) {
    printer.line(USAGE);
    return 0;
  }

  const target = parsed.positionals[0];
  if (target === undefined) {
    printer.line(USAGE);
    return 2;
  }

  try {
    const config = loadOpsConfig(env);
    const suite = resolveSuite(target);
    const writeReport = parsed.values.report ?? suite.reportByDefault;

    const result = await runSuite({
      dir: suite.dir,
      suite: suite.suite,
      timeoutSec: parseTimeout(parsed.values.timeout, config.testTimeoutSec),
      reportDir: writeReport ? config.reportDir : undefined,
      env,
      printer,
      ...options.overrides
    });

    return result.summary.failed === 0 ? 0 : 1;
  } catch (error) {
    if (error instanceof BaseError) {
      logger.error({ error: error.toJSON() }, 'Suite run failed');
      printer.fail(`RUNNER FAIL: ${error.message}`);
      return error.exitCode;
    }

    logger.error({ error }, 'Unexpected failure');
    printer.fail('RUNNER FAIL: unexpected error, see log');
    return 1;
  }
}
