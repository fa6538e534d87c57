import { ProbeClient, ReadinessError, createLogger, sleep as defaultSleep } from '@ragops/core';

const logger = createLogger('http-waiter');

export interface PollOptions {
  tries: number;
  sleepMs: number;
  sleep?: (ms: number) => Promise<void>;
  onAttempt?: (attempt: number) => void;
}

export interface PollResult<T> {
  ok: boolean;
  value: T;
  attempts: number;
  sleptMs: number;
}

/**
 * Fixed-interval polling.
 * Sleeps after every unsuccessful try, the last one included, so a budget of
 * `tries` that never succeeds has slept exactly `tries * sleepMs`.
 */
export async function pollUntil<T>(
  attempt: () => Promise<T>,
  done: (value: T) => boolean,
  options: PollOptions
): Promise<PollResult<T>> {
  const sleep = options.sleep ?? defaultSleep;
  let sleptMs = 0;
  let value = await attempt();
  let attempts = 1;

  options.onAttempt?.(attempts);

  while (!done(value)) {
    await sleep(options.sleepMs);
    sleptMs += options.sleepMs;

    if (attempts >= options.tries) {
      return { ok: false, value, attempts, sleptMs };
    }

    value = await attempt();
    attempts++;
    options.onAttempt?.(attempts);
  }

  return { ok: true, value, attempts, sleptMs };
}

export interface WaitTarget {
  name: string;
  url: string;
  expectStatus?: number;
}

export interface WaitOutcome {
  attempts: number;
  status: number;
  sleptMs: number;
}

/**
 * Poll a URL until it answers with the expected status (200 by default).
 * Throws ReadinessError once the budget is spent.
 */
export async function waitForHttp(
  probe: ProbeClient,
  target: WaitTarget,
  options: PollOptions
): Promise<WaitOutcome> {
  const expected = target.expectStatus ?? 200;

  const result = await pollUntil(
    () => probe.status(target.url),
    (status) => status === expected,
    options
  );

  logger.debug({ target: target.name, url: target.url, ...result }, 'Readiness poll finished');

  if (!result.ok) {
    throw new ReadinessError(`${target.name} not ready at ${target.url} (last HTTP ${result.value})`, {
      url: target.url,
      expected,
      lastStatus: result.value,
      attempts: result.attempts
    });
  }

  return { attempts: result.attempts, status: result.value, sleptMs: result.sleptMs };
}
