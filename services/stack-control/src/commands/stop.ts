import { promises as fs } from 'fs';
import * as path from 'path';
import { createLogger, formatRunStamp } from '@ragops/core';
import type { StackContext } from '../context';
import type { CommandResult } from '../docker/command-runner';

const logger = createLogger('stop-command');

function transcript(result: CommandResult): string {
  return `${result.stdout}${result.stderr}`;
}

/**
 * Graceful shutdown: snapshot status, stop with a grace period, tear down, sync.
 * An unreachable docker daemon means nothing is running, which is success.
 * Failures of stop and down are reported but never fatal.
 */
export async function runStop(ctx: StackContext): Promise<void> {
  const { config, compose, printer } = ctx;

  printer.heading('STOP_SAFE: stack graceful shutdown');
  printer.line(`Project: ${config.composeDir}`);

  if (!(await compose.daemonReachable())) {
    printer.line('INFO: Docker daemon not reachable. Nothing to stop.');
    printer.heading('STOP_SAFE OK');
    logger.info('Docker unreachable, nothing to stop');
    return;
  }

  const logDir = path.join(config.shutdownLogDir, formatRunStamp(ctx.now()));
  await fs.mkdir(logDir, { recursive: true });

  printer.line(`Saving pre-shutdown status to ${logDir} ...`);
  await fs.writeFile(path.join(logDir, 'compose_ps.txt'), transcript(await compose.ps()));
  await fs.writeFile(path.join(logDir, 'docker_ps.txt'), transcript(await compose.dockerPs()));

  printer.line(`Requesting graceful stop (docker compose stop -t ${config.stopGraceSec})...`);
  const stopped = await compose.stop(config.stopGraceSec);
  if (stopped.code !== 0) {
    logger.warn({ code: stopped.code, stderr: stopped.stderr }, 'docker compose stop failed');
    printer.warn(`docker compose stop exited ${stopped.code}, continuing`);
  }

  printer.line('Stopping stack (docker compose down)...');
  const down = await compose.down();
  if (down.code !== 0) {
    logger.warn({ code: down.code, stderr: down.stderr }, 'docker compose down failed');
    printer.warn(`docker compose down exited ${down.code}, continuing`);
  }

  printer.line('Syncing filesystem buffers...');
  const synced = await compose.sync();
  if (synced.code !== 0) {
    logger.warn({ code: synced.code, stderr: synced.stderr }, 'sync failed');
    printer.warn(`sync exited ${synced.code}`);
  }

  printer.line();
  printer.heading('STOP_SAFE OK');
  printer.line('Safe to reboot/shutdown the host now.');

  logger.info({ logDir }, 'Stack stopped');
}
