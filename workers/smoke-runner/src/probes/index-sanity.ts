import { LITERAL_SEARCH_TERM, checkClusterStatus, checkDocCount, checkHasHits } from '@ragops/core';
import type { ScriptContext } from '../suites/script';

export async function probeIndexSanity(ctx: ScriptContext): Promise<void> {
  const { config, clients } = ctx;

  const health = await clients.es.clusterHealth();
  ctx.expect(checkClusterStatus(health.body), 'ES health');

  // 21: no count in the body, 22: count below the minimum
  const count = await clients.es.count();
  const counted = checkDocCount(count.body, config.minDocCount);
  ctx.expect(counted, `ES count (${config.indexName})`, counted.count === null ? 21 : 22);

  const search = await clients.es.search({ size: 0, query: { match: { content: LITERAL_SEARCH_TERM } } });
  ctx.expect(checkHasHits(search.body), `ES search '${LITERAL_SEARCH_TERM}'`);
}
