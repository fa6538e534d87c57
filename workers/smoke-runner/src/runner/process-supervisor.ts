import { spawn } from 'child_process';
import { createLogger } from '@ragops/core';

const logger = createLogger('process-supervisor');

export interface SuperviseOptions {
  timeoutMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Receives stdout and stderr chunks as they arrive */
  onOutput?: (chunk: string) => void;
}

export interface SupervisedResult {
  /** null when the process was killed */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  output: string;
  durationMs: number;
}

function killGroup(pid: number): void {
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (error) {
    // ESRCH: the group is already gone
    logger.debug({ pid, error: error instanceof Error ? error.message : String(error) }, 'Process group not killed');
  }
}

/**
 * Run a command in its own process group with a hard wall-clock deadline.
 * On expiry the whole group gets SIGKILL, so children of the test die with it.
 * Stragglers left behind by a test that exited are killed the same way.
 */
export function runWithTimeout(command: string, args: string[], options: SuperviseOptions): Promise<SupervisedResult> {
  return new Promise((resolve) => {
    const startTime = Date.now();
    const chunks: string[] = [];
    let timedOut = false;

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    const collect = (data: Buffer) => {
      const text = data.toString();
      chunks.push(text);
      options.onOutput?.(text);
    };

    child.stdout.on('data', collect);
    child.stderr.on('data', collect);

    const timer = setTimeout(() => {
      timedOut = true;
      logger.warn({ command, args, timeoutMs: options.timeoutMs }, 'Test exceeded its deadline, killing');
      if (child.pid !== undefined) killGroup(child.pid);
    }, options.timeoutMs);

    child.on('exit', () => {
      clearTimeout(timer);
      if (child.pid !== undefined) killGroup(child.pid);
    });

    child.on('error', (error) => {
      clearTimeout(timer);
      logger.error({ command, error: error.message }, 'Test could not start');
      resolve({
        exitCode: 127,
        signal: null,
        timedOut: false,
        output: `${chunks.join('')}${error.message}\n`,
        durationMs: Date.now() - startTime
      });
    });

    child.on('close', (code, signal) => {
      resolve({
        exitCode: timedOut ? null : code,
        signal,
        timedOut,
        output: chunks.join(''),
        durationMs: Date.now() - startTime
      });
    });
  });
}
