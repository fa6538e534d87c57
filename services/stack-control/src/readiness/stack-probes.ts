import {
  AGENT_SERVICE,
  AGENT_VECTOR_STORE_FILE,
  CheckFailedError,
  DOCKER_WAIT_SLEEP_SEC,
  ReadinessError
} from '@ragops/core';
import type { StackContext } from '../context';
import { pollUntil, waitForHttp, type WaitOutcome, type WaitTarget } from './http-waiter';

export interface WaitBudget {
  tries: number;
  sleepSec: number;
}

/**
 * waitForHttp with the context's probe and clock, announcing the wait
 */
export async function waitForTarget(ctx: StackContext, target: WaitTarget, budget: WaitBudget): Promise<WaitOutcome> {
  ctx.printer.line(`-> Waiting for ${target.name}: ${target.url}`);

  const outcome = await waitForHttp(ctx.clients.probe, target, {
    tries: budget.tries,
    sleepMs: budget.sleepSec * 1000,
    sleep: ctx.sleep
  });

  ctx.printer.ok(`${target.name} is HTTP ${outcome.status} (${target.url})`);
  return outcome;
}

/**
 * Wait for `docker info` to succeed, one try per second
 */
export async function waitForDocker(ctx: StackContext, tries: number): Promise<void> {
  ctx.printer.line('Checking Docker daemon readiness...');

  if (await ctx.compose.daemonReachable()) {
    ctx.printer.ok('Docker is ready.');
    return;
  }

  ctx.printer.line(`Docker not ready yet. Waiting up to ${tries}s...`);

  const result = await pollUntil(
    () => ctx.compose.daemonReachable(),
    (reachable) => reachable,
    { tries, sleepMs: DOCKER_WAIT_SLEEP_SEC * 1000, sleep: ctx.sleep }
  );

  if (!result.ok) {
    throw new ReadinessError('Docker daemon not reachable.', {
      attempts: result.attempts,
      hint: 'sudo systemctl enable --now docker && sudo usermod -aG docker $USER (then relogin)'
    });
  }

  ctx.printer.ok('Docker is ready.');
}

/**
 * The vector store's backing file must exist inside the agent container.
 * When not required, a missing file is only reported.
 */
export async function checkVectorStore(ctx: StackContext, required: boolean): Promise<void> {
  const containerId = await ctx.compose.containerId(AGENT_SERVICE);

  if (containerId === null) {
    throw new CheckFailedError(`${AGENT_SERVICE} container not found`, { service: AGENT_SERVICE });
  }

  const listing = await ctx.compose.exec(AGENT_SERVICE, `ls -lh ${AGENT_VECTOR_STORE_FILE}`);
  const output = listing.stdout.trim();
  if (output) ctx.printer.line(output);

  if (listing.code === 0) {
    ctx.printer.ok(`Vector store present in container (${AGENT_VECTOR_STORE_FILE})`);
    return;
  }

  if (required) {
    throw new CheckFailedError('Vector store file not found inside agent container', {
      file: AGENT_VECTOR_STORE_FILE,
      stderr: listing.stderr.trim()
    });
  }

  ctx.printer.warn(`Vector store file not found inside agent container (${AGENT_VECTOR_STORE_FILE})`);
}
