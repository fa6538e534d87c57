import { spawn } from 'child_process';
import { createLogger } from '@ragops/core';

const logger = createLogger('command-runner');

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
}

/**
 * Seam between lifecycle logic and the external commands it drives
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

/**
 * Runs commands as child processes and collects their output.
 * A missing binary resolves with code 127, the way a shell reports it.
 */
export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    return new Promise((resolve) => {
      logger.debug({ command, args, cwd: options.cwd }, 'Running command');

      const child = spawn(command, args, { cwd: options.cwd, stdio: ['ignore', 'pipe', 'pipe'] });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data) => {
        stderr += data.toString();
      });

      child.on('error', (error) => {
        logger.debug({ command, error: error.message }, 'Command could not start');
        resolve({ code: 127, stdout, stderr: stderr || error.message });
      });

      child.on('close', (code) => {
        if (code !== 0) {
          logger.debug({ command, args, code, stderr }, 'Command exited non-zero');
        }
        resolve({ code: code ?? 1, stdout, stderr });
      });
    });
  }
}
