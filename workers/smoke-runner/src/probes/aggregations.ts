import { AGGREGATION_BUCKETS, checkAggregation, checkHttpStatus } from '@ragops/core';
import type { ScriptContext } from '../suites/script';

const AGGREGATIONS = {
  ext: 'file.extension.keyword',
  mime: 'file.content_type.keyword'
} as const;

/**
 * File-type distribution by extension and MIME type
 */
export async function probeAggregations(ctx: ScriptContext): Promise<void> {
  const { clients, printer } = ctx;

  const aggs = Object.fromEntries(
    Object.entries(AGGREGATIONS).map(([name, field]) => [name, { terms: { field, size: AGGREGATION_BUCKETS } }])
  );

  const response = await clients.es.search({ size: 0, aggs });
  ctx.expect(checkHttpStatus('ES aggregations', response.status));

  for (const name of Object.keys(AGGREGATIONS)) {
    const result = checkAggregation(response.body, name);
    ctx.expect(result);

    for (const bucket of result.buckets) {
      printer.line(`  ${bucket.key}: ${bucket.doc_count}`);
    }
  }
}
