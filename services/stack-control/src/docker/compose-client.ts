import { CommandError, createLogger } from '@ragops/core';
import type { CommandResult, CommandRunner } from './command-runner';

const logger = createLogger('compose-client');

export interface ComposeOptions {
  composeFile: string;
  cwd: string;
}

/**
 * docker / docker compose operations for one compose project
 */
export class ComposeClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: ComposeOptions
  ) {}

  /**
   * True when the docker daemon answers `docker info`
   */
  async daemonReachable(): Promise<boolean> {
    const result = await this.runner.run('docker', ['info'], { cwd: this.options.cwd });
    return result.code === 0;
  }

  async validateConfig(): Promise<void> {
    await this.composeOrThrow(['config', '--quiet'], 'docker compose config invalid');
  }

  async up(): Promise<void> {
    await this.composeOrThrow(['up', '-d'], 'docker compose up -d failed');
  }

  ps(): Promise<CommandResult> {
    return this.compose(['ps']);
  }

  dockerPs(format?: string): Promise<CommandResult> {
    const args = format ? ['ps', '--format', format] : ['ps'];
    return this.runner.run('docker', args, { cwd: this.options.cwd });
  }

  stop(graceSec: number): Promise<CommandResult> {
    return this.compose(['stop', '-t', String(graceSec)]);
  }

  down(): Promise<CommandResult> {
    return this.compose(['down']);
  }

  /**
   * Container id of a service, or null when it is not running
   */
  async containerId(service: string): Promise<string | null> {
    const result = await this.compose(['ps', '-q', service]);
    const id = result.stdout.trim();
    return result.code === 0 && id !== '' ? id : null;
  }

  /**
   * Shell command inside a running service, without a TTY
   */
  exec(service: string, script: string): Promise<CommandResult> {
    return this.compose(['exec', '-T', service, 'sh', '-lc', script]);
  }

  /**
   * Flush filesystem buffers on the host
   */
  sync(): Promise<CommandResult> {
    return this.runner.run('sync', [], { cwd: this.options.cwd });
  }

  private compose(args: string[]): Promise<CommandResult> {
    return this.runner.run('docker', ['compose', '-f', this.options.composeFile, ...args], {
      cwd: this.options.cwd
    });
  }

  private async composeOrThrow(args: string[], message: string): Promise<CommandResult> {
    const result = await this.compose(args);

    if (result.code !== 0) {
      logger.error({ args, code: result.code, stderr: result.stderr }, message);
      throw new CommandError(message, { args, code: result.code, stderr: result.stderr.trim() });
    }

    return result;
  }
}
