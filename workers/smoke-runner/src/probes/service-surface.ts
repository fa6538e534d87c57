import { checkHttpStatus } from '@ragops/core';
import type { ScriptContext } from '../suites/script';

const HEADER_LINES = 20;

/**
 * Response headers of each service, plus the agent's public surface:
 * OpenAPI served, debug stream disabled.
 */
export async function probeServiceSurface(ctx: ScriptContext): Promise<void> {
  const { config, clients, printer } = ctx;

  const services = [
    { name: 'ES', url: `${config.esUrl}/` },
    { name: 'WEBUI', url: `${config.webuiUrl}/` },
    { name: 'AGENT', url: clients.agent.url('/health') },
    { name: 'OLLAMA', url: `${config.ollamaUrl}/api/tags` }
  ];

  for (const service of services) {
    const response = await clients.probe.get(service.url);
    printer.line(`${service.name}=${response.status}`);

    const headers = Object.entries(response.headers)
      .slice(0, HEADER_LINES)
      .map(([name, value]) => `  ${name}: ${value}`);
    for (const header of headers) printer.line(header);
  }

  printer.line();
  const openapi = await clients.agent.openapi();
  ctx.expect(checkHttpStatus('Agent OpenAPI', openapi.status));
  printer.line(openapi.body.slice(0, 1600));

  const debug = await clients.probe.status(clients.agent.url('/debug/sse'));
  ctx.expect(checkHttpStatus('Agent debug stream', debug, 404));
}
