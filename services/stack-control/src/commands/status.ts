import { checkDocCount, createLogger } from '@ragops/core';
import type { StackContext } from '../context';

const logger = createLogger('status-command');

const DOCKER_PS_FORMAT = 'table {{.Names}}\t{{.Status}}\t{{.Ports}}';

/**
 * Read-only overview of containers and service endpoints.
 * Unreachable services are reported, not fatal; returns 1 only when docker itself is down.
 */
export async function runStatus(ctx: StackContext): Promise<number> {
  const { config, clients, compose, printer } = ctx;

  printer.heading('Stack status');

  printer.line();
  printer.heading('Docker services');
  const containers = await compose.dockerPs(DOCKER_PS_FORMAT);
  if (containers.code !== 0) {
    printer.fail('Docker daemon not reachable');
    logger.warn({ code: containers.code, stderr: containers.stderr }, 'docker ps failed');
    return 1;
  }
  printer.line(containers.stdout.trimEnd());

  printer.line();
  printer.heading('Service health');

  const targets = [
    { name: 'Elasticsearch', url: `${config.esUrl}/` },
    { name: 'Agent API', url: clients.agent.url('/health') },
    { name: 'LLM server', url: `${config.ollamaUrl}/api/tags` },
    { name: 'Web UI', url: `${config.webuiUrl}/` }
  ];

  for (const target of targets) {
    const response = await clients.probe.get(target.url);
    if (response.status === 200) {
      printer.ok(`${target.name} responding (${target.url}, ${response.durationMs}ms)`);
    } else {
      const reason = response.status === 0 ? 'unreachable' : `HTTP ${response.status}`;
      printer.fail(`${target.name} not responding (${target.url}, ${reason})`);
    }
  }

  printer.line();
  printer.heading('LLM models');
  const models = await clients.llm.modelNames();
  if (models.length === 0) {
    printer.warn('No models listed');
  }
  for (const model of models) {
    printer.line(`- ${model}`);
  }

  printer.line();
  printer.heading('Agent health');
  const health = await clients.agent.health();
  printer.line(health.status === 200 ? health.body.trim() : 'unavailable');

  printer.line();
  printer.heading(`Index ${config.indexName}`);
  const count = await clients.es.count();
  const documents = count.status === 200 ? checkDocCount(count.body, 0).count : null;
  printer.line(documents === null ? 'unavailable' : `${documents} documents`);

  return 0;
}
