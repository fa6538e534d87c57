import { z } from 'zod';

/**
 * GET /_cluster/health and /_cluster/health/{index}
 */
export const clusterHealthSchema = z
  .object({
    cluster_name: z.string().optional(),
    status: z.string(),
    number_of_nodes: z.number().int().optional()
  })
  .passthrough();

export type ClusterHealth = z.infer<typeof clusterHealthSchema>;

/**
 * GET /{index}/_count
 */
export const countResponseSchema = z
  .object({
    count: z.number().int().nonnegative()
  })
  .passthrough();

export type CountResponse = z.infer<typeof countResponseSchema>;

export const searchHitSchema = z
  .object({
    _index: z.string().optional(),
    _id: z.string().optional(),
    _score: z.number().nullable().optional(),
    _source: z.record(z.unknown()).optional()
  })
  .passthrough();

export type SearchHit = z.infer<typeof searchHitSchema>;

export const termsBucketSchema = z
  .object({
    key: z.union([z.string(), z.number()]),
    doc_count: z.number().int().nonnegative()
  })
  .passthrough();

export type TermsBucket = z.infer<typeof termsBucketSchema>;

/**
 * POST /{index}/_search
 */
export const searchResponseSchema = z
  .object({
    hits: z.object({
      total: z
        .union([
          z.number().int(),
          z.object({ value: z.number().int(), relation: z.string().optional() })
        ])
        .optional(),
      hits: z.array(searchHitSchema)
    }),
    aggregations: z
      .record(z.object({ buckets: z.array(termsBucketSchema) }).passthrough())
      .optional()
  })
  .passthrough();

export type SearchResponse = z.infer<typeof searchResponseSchema>;

/**
 * Total hit count, whichever shape the cluster reports it in
 */
export function totalHits(response: SearchResponse): number {
  const total = response.hits.total;
  if (total === undefined) return response.hits.hits.length;
  return typeof total === 'number' ? total : total.value;
}
