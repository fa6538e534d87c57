import {
  chatHaystack,
  checkClusterStatus,
  checkContains,
  checkDocCount,
  createLogger,
  exactPhrasePrompt
} from '@ragops/core';
import type { StackContext } from '../context';
import { checkVectorStore, waitForDocker, waitForTarget } from '../readiness/stack-probes';
import { requireCheck, requireStatus } from './require-check';

const logger = createLogger('start-command');

export interface StartOptions {
  /** Wait for the docker daemon first and inspect the vector store */
  safe: boolean;
}

/**
 * Bring the stack up and verify it answers its basic contracts.
 * Throws on the first failure; nothing is rolled back.
 */
export async function runStart(ctx: StackContext, options: StartOptions): Promise<void> {
  const { config, clients, compose, printer } = ctx;
  const label = options.safe ? 'START_SAFE' : 'START';
  const budget = { tries: config.waitTries, sleepSec: config.waitSleepSec };

  logger.info({ composeFile: config.composeFile, safe: options.safe }, 'Starting stack');

  printer.heading(`${label}: stack boot & sanity`);
  printer.line(`Project: ${config.composeDir}`);

  if (options.safe) {
    await waitForDocker(ctx, config.dockerWaitTries);
  }

  await compose.validateConfig();
  printer.ok('docker compose config valid');

  printer.line('Bringing stack up...');
  await compose.up();

  printer.line();
  printer.line('Waiting for services (with timeouts)...');
  await waitForTarget(ctx, { name: 'Elasticsearch', url: `${config.esUrl}/` }, budget);

  printer.line();
  printer.heading('Sanity: Elasticsearch cluster health');
  const health = await clients.es.clusterHealth();
  requireStatus(health, 'ES health endpoint');
  requireCheck(printer, checkClusterStatus(health.body));

  printer.line();
  printer.heading(`Sanity: Elasticsearch count (${config.indexName})`);
  const count = await clients.es.count();
  requireStatus(count, 'ES count endpoint');
  printer.line(count.body.trim());
  requireCheck(printer, checkDocCount(count.body, config.minDocCount));

  printer.line();
  await waitForTarget(ctx, { name: 'Agent API', url: clients.agent.url('/health') }, budget);

  if (options.safe) {
    printer.line();
    printer.heading('Sanity: vector store presence (inside agent container)');
    await checkVectorStore(ctx, false);
  }

  printer.line();
  printer.heading('Sanity: Agent API non-stream (exact phrase)');
  const answer = await clients.agent.chat(exactPhrasePrompt(config.goldenPhrase), {
    timeoutMs: config.chatMaxTimeMs
  });
  requireStatus(answer, 'Agent non-stream call');
  printer.line(answer.body.slice(0, 1500));
  requireCheck(printer, checkContains(chatHaystack(answer.body, config.matchMode), config.goldenFile, 'exact phrase'));

  printer.line();
  printer.heading(`${label} OK`);
  printer.line('Stack is up and passed basic sanity checks.');

  logger.info({ safe: options.safe }, 'Stack started');
}
