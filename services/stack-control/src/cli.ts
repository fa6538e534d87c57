import { parseArgs } from 'util';
import { BaseError, createLogger, createPrinter, loadOpsConfig, type Printer } from '@ragops/core';
import { runBootGate } from './commands/boot-gate';
import { runStart } from './commands/start';
import { runStatus } from './commands/status';
import { runStop } from './commands/stop';
import { createStackContext, type StackContext, type StackContextOverrides } from './context';

const logger = createLogger('stack-control');

const FAIL_PREFIX = {
  start: 'START',
  'start-safe': 'START_SAFE',
  stop: 'STOP_SAFE',
  'stop-safe': 'STOP_SAFE',
  'boot-gate': 'BOOT-GATE',
  status: 'STATUS'
} as const;

export type StackCommand = keyof typeof FAIL_PREFIX;

export const USAGE = `Usage: stack-control <command>

Commands:
  start        validate compose config, bring the stack up, wait and sanity-check
  start-safe   as start, waiting for the docker daemon first
  stop         snapshot status, graceful stop, teardown, sync (alias: stop-safe)
  boot-gate    start if needed and fail on the first broken core contract
  status       read-only overview of containers and endpoints`;

export function isStackCommand(value: string): value is StackCommand {
  return Object.prototype.hasOwnProperty.call(FAIL_PREFIX, value);
}

/**
 * Run one command; resolves with the process exit code
 */
export async function executeCommand(command: StackCommand, ctx: StackContext): Promise<number> {
  switch (command) {
    case 'start':
      await runStart(ctx, { safe: false });
      return 0;
    case 'start-safe':
      await runStart(ctx, { safe: true });
      return 0;
    case 'stop':
    case 'stop-safe':
      await runStop(ctx);
      return 0;
    case 'boot-gate':
      await runBootGate(ctx);
      return 0;
    case 'status':
      return runStatus(ctx);
  }
}

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  printer?: Printer;
  overrides?: StackContextOverrides;
}

export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const printer = options.printer ?? createPrinter();

  let command: string | undefined;
  let help: boolean | undefined;

  try {
    const parsed = parseArgs({
      args: argv,
      allowPositionals: true,
      options: { help: { type: 'boolean', short: 'h' } }
    });
    command = parsed.positionals[0];
    help = parsed.values.help;
  } catch (error) {
    printer.line(error instanceof Error ? error.message : String(error));
    printer.line(USAGE);
    return 2;
  }

  if (help) {
    printer.line(USAGE);
    return 0;
  }

  if (command === undefined || !isStackCommand(command)) {
    printer.line(USAGE);
    return 2;
  }

  try {
    const config = loadOpsConfig(options.env ?? process.env);
    const ctx = createStackContext(config, { ...options.overrides, printer });
    return await executeCommand(command, ctx);
  } catch (error) {
    if (error instanceof BaseError) {
      logger.error({ error: error.toJSON() }, 'Command failed');
      printer.fail(`${FAIL_PREFIX[command]} FAIL: ${error.message}`);

      const hint = error.context?.hint;
      if (typeof hint === 'string') {
        printer.line(`Fix: ${hint}`);
      }
      return error.exitCode;
    }

    logger.error({ error }, 'Unexpected failure');
    printer.fail(`${FAIL_PREFIX[command]} FAIL: unexpected error, see log`);
    return 1;
  }
}
