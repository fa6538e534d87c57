import { checkClusterStatus, checkDocCount } from '@ragops/core';
import type { ScriptContext } from '../suites/script';

export async function probeIndexHealth(ctx: ScriptContext): Promise<void> {
  const { config, clients, printer } = ctx;

  const cluster = await clients.es.clusterHealth();
  printer.line(cluster.body.slice(0, 1200));
  ctx.expect(checkClusterStatus(cluster.body), 'cluster');

  const index = await clients.es.clusterHealth(config.indexName);
  printer.line(index.body.slice(0, 1200));
  ctx.expect(checkClusterStatus(index.body), `index ${config.indexName}`);

  const count = await clients.es.count();
  printer.line(count.body.slice(0, 600));
  ctx.expect(checkDocCount(count.body, config.minDocCount), 'count');
}
