import {
  ACK_PROMPT,
  BOOT_GATE_WAIT_SLEEP_SEC,
  BOOT_GATE_WAIT_TRIES,
  CheckFailedError,
  checkAcknowledgement,
  checkClusterStatus,
  checkDocCount,
  checkSseFraming,
  createLogger
} from '@ragops/core';
import type { StackContext } from '../context';
import { checkVectorStore, waitForTarget } from '../readiness/stack-probes';
import { requireCheck, requireStatus } from './require-check';

const logger = createLogger('boot-gate');

const budget = { tries: BOOT_GATE_WAIT_TRIES, sleepSec: BOOT_GATE_WAIT_SLEEP_SEC };

/**
 * Start the stack if needed and fail fast on the first broken core contract:
 * index ready and populated, chat routed to the model, SSE framing intact,
 * vector store mounted.
 */
export async function runBootGate(ctx: StackContext): Promise<void> {
  const { config, clients, compose, printer } = ctx;

  logger.info({ esUrl: config.esUrl, agentUrl: config.agentUrl }, 'Boot gate starting');

  printer.heading('BOOT-GATE: start stack (if needed)');
  await compose.validateConfig();
  await compose.up();

  printer.heading('Wait: ES ready (HTTP 200)');
  await waitForTarget(ctx, { name: 'Elasticsearch', url: `${config.esUrl}/` }, budget);

  printer.heading('Check: ES cluster health (yellow/green)');
  const health = await clients.es.clusterHealth();
  requireStatus(health, 'ES health endpoint');
  requireCheck(printer, checkClusterStatus(health.body));

  printer.heading(`Check: ES index count (${config.indexName})`);
  const count = await clients.es.count();
  requireStatus(count, 'ES count endpoint');
  printer.line(count.body.trim());
  requireCheck(printer, checkDocCount(count.body, config.minDocCount));

  printer.heading('Wait: Agent API /health');
  await waitForTarget(ctx, { name: 'Agent API', url: clients.agent.url('/health') }, budget);

  printer.heading('Check: Agent non-stream chat should return OK');
  const answer = await clients.agent.chat(ACK_PROMPT, { timeoutMs: config.chatMaxTimeMs });
  requireStatus(answer, 'Agent non-stream call');
  printer.line(answer.body.slice(0, 800));
  requireCheck(printer, checkAcknowledgement(answer.body, config.matchMode));

  printer.heading('Check: Agent SSE streaming emits data: and [DONE]');
  const stream = await clients.agent.chatStream(ACK_PROMPT, { timeoutMs: config.streamMaxTimeMs });
  if (stream.timedOut || stream.status === 0) {
    throw new CheckFailedError(`Streaming request timed out / failed (${stream.error ?? 'no response'})`, {
      status: stream.status,
      timedOut: stream.timedOut
    });
  }
  requireStatus(stream, 'Agent streaming call');
  printer.line(stream.body.split('\n').slice(0, 20).join('\n'));
  requireCheck(printer, checkSseFraming(stream.body));

  printer.heading('Check: vector store presence (file exists)');
  await checkVectorStore(ctx, true);

  printer.line();
  printer.line('🎉 BOOT-GATE PASS: stack is up and core contracts hold.');

  logger.info('Boot gate passed');
}
