import {
  EMPTY_CONTENT_EXAMPLES,
  checkEmptyContentBudget,
  checkHttpStatus,
  estimateEmptyContent,
  fail,
  formatEmptyContent,
  parseBody,
  searchResponseSchema
} from '@ragops/core';
import type { ScriptContext } from '../suites/script';

/**
 * Estimate how many indexed documents carry no extracted text
 */
export async function probeContentQuality(ctx: ScriptContext): Promise<void> {
  const { config, clients, printer } = ctx;

  const response = await clients.es.search({
    size: config.releaseSampleSize,
    _source: ['file.filename', 'file.extension', 'file.url', 'path.real', 'content'],
    query: { match_all: {} }
  });
  ctx.expect(checkHttpStatus('ES sample', response.status));

  const parsed = parseBody(response.body, searchResponseSchema);
  if (!parsed.ok) {
    ctx.expect(fail(`sample unreadable (${parsed.error})`));
    return;
  }

  const estimate = estimateEmptyContent(parsed.data.hits.hits, EMPTY_CONTENT_EXAMPLES);
  printer.line(formatEmptyContent(estimate));

  if (estimate.examples.length > 0) {
    printer.line('empty_examples:');
    for (const example of estimate.examples) printer.line(` - ${example}`);
  }

  ctx.expect(checkEmptyContentBudget(estimate, config.releaseMaxEmptyPct));
}
