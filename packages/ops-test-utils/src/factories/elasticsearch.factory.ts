/**
 * Canned search-index responses
 */

export interface HitSeed {
  filename?: string;
  real?: string;
  content?: string | null;
}

export function buildClusterHealth(status: string): string {
  return JSON.stringify({
    cluster_name: 'docker-cluster',
    status,
    timed_out: false,
    number_of_nodes: 1
  });
}

export function buildCount(count: number): string {
  return JSON.stringify({ count, _shards: { total: 1, successful: 1, skipped: 0, failed: 0 } });
}

export function buildSearchResponse(
  seeds: HitSeed[],
  options: { total?: number; aggregations?: Record<string, { buckets: Array<{ key: string; doc_count: number }> }> } = {}
): string {
  const hits = seeds.map((seed, index) => {
    const source: Record<string, unknown> = {};
    if (seed.filename !== undefined) source.file = { filename: seed.filename };
    if (seed.real !== undefined) source.path = { real: seed.real };
    if (seed.content !== undefined) source.content = seed.content;

    return { _index: 'rag_files_v1', _id: `doc-${index + 1}`, _score: 1, _source: source };
  });

  return JSON.stringify({
    took: 3,
    timed_out: false,
    hits: {
      total: { value: options.total ?? hits.length, relation: 'eq' },
      max_score: hits.length ? 1 : null,
      hits
    },
    ...(options.aggregations ? { aggregations: options.aggregations } : {})
  });
}
