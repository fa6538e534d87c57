import { checkHttpStatus } from '@ragops/core';
import type { ScriptContext } from '../suites/script';

/**
 * Every service answers its documented health or root endpoint with 200.
 * A failure exits with the service's code: 10 ES, 11 agent, 12 web UI, 13 LLM server.
 */
export async function probeHealthEndpoints(ctx: ScriptContext): Promise<void> {
  const { config, clients, printer } = ctx;

  const endpoints = [
    { label: 'Agent API', url: clients.agent.url('/health'), exitCode: 11 },
    { label: 'Agent Models', url: clients.agent.url('/v1/models'), exitCode: 11 },
    { label: 'LLM server', url: `${config.ollamaUrl}/api/tags`, exitCode: 13 },
    { label: 'Elasticsearch', url: `${config.esUrl}/`, exitCode: 10 },
    { label: 'Web UI', url: `${config.webuiUrl}/`, exitCode: 12 }
  ];

  for (const endpoint of endpoints) {
    printer.line(`Checking ${endpoint.label}: ${endpoint.url}`);
    ctx.expect(checkHttpStatus(endpoint.label, await clients.probe.status(endpoint.url)), undefined, endpoint.exitCode);
  }
}
