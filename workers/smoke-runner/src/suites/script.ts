import { config as loadEnv } from 'dotenv';
import {
  BaseError,
  createLogger,
  createPrinter,
  createStackClients,
  loadOpsConfig,
  type CheckResult,
  type OpsConfig,
  type Printer,
  type StackClients
} from '@ragops/core';

const logger = createLogger('smoke-script');

export interface ScriptContext {
  config: OpsConfig;
  clients: StackClients;
  printer: Printer;
  /**
   * Print and record one check. Failures do not stop the script;
   * they only decide its exit code: the `exitCode` of the first failed check, 1 if it has none.
   */
  expect(result: CheckResult, label?: string, exitCode?: number): boolean;
}

export type ScriptBody = (ctx: ScriptContext) => Promise<void>;

export interface ScriptOptions {
  env?: NodeJS.ProcessEnv;
  printer?: Printer;
}

/**
 * Run one numbered test in-process and resolve with its exit code.
 * The search index is reachable read-only: a mutating request aborts the test.
 */
export async function executeScript(title: string, body: ScriptBody, options: ScriptOptions = {}): Promise<number> {
  const printer = options.printer ?? createPrinter();
  let failures = 0;
  let checks = 0;
  let firstFailureCode: number | undefined;

  printer.heading(title);

  try {
    const config = loadOpsConfig(options.env ?? process.env);
    const clients = createStackClients(config, { readOnlyIndex: true });

    await body({
      config,
      clients,
      printer,
      expect(result, label, exitCode) {
        checks++;
        const detail = label ? `${label}: ${result.detail}` : result.detail;
        if (result.ok) {
          printer.ok(detail);
        } else {
          failures++;
          if (firstFailureCode === undefined) firstFailureCode = exitCode ?? 1;
          printer.fail(detail);
        }
        return result.ok;
      }
    });
  } catch (error) {
    if (error instanceof BaseError) {
      logger.error({ error: error.toJSON() }, 'Test aborted');
      printer.fail(`${title} ABORTED: ${error.message}`);
      return error.exitCode;
    }
    throw error;
  }

  printer.line();
  if (failures === 0) {
    printer.ok(`${title} PASSED (${checks} checks)`);
    return 0;
  }

  printer.fail(`${title} FAILED (${failures} of ${checks} checks failed)`);
  return firstFailureCode ?? 1;
}

/**
 * Entry point for a numbered test file
 */
export function runScript(title: string, body: ScriptBody): void {
  loadEnv();

  executeScript(title, body)
    .then((code) => process.exit(code))
    .catch((error) => {
      logger.fatal({ error }, 'Test crashed');
      process.exit(1);
    });
}
