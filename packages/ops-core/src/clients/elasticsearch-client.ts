import { ProbeClient, type ProbeResponse, type RequestOptions } from './probe-client';

/**
 * Read-only view of the search index
 */
export class ElasticsearchClient {
  constructor(
    private readonly probe: ProbeClient,
    private readonly baseUrl: string,
    readonly indexName: string
  ) {}

  root(options?: RequestOptions): Promise<ProbeResponse> {
    return this.probe.get(`${this.baseUrl}/`, options);
  }

  /**
   * Cluster health, or the health of a single index when one is named
   */
  clusterHealth(index?: string, options?: RequestOptions): Promise<ProbeResponse> {
    const suffix = index ? `/${encodeURIComponent(index)}` : '';
    return this.probe.get(`${this.baseUrl}/_cluster/health${suffix}`, options);
  }

  count(options?: RequestOptions): Promise<ProbeResponse> {
    return this.probe.get(`${this.indexUrl()}/_count`, options);
  }

  search(body: Record<string, unknown>, options?: RequestOptions): Promise<ProbeResponse> {
    return this.probe.postJson(`${this.indexUrl()}/_search`, body, options);
  }

  /**
   * match_phrase over the content field
   */
  searchPhrase(phrase: string, size: number, options?: RequestOptions): Promise<ProbeResponse> {
    return this.search(
      {
        size,
        _source: ['file.filename', 'path.real'],
        query: { match_phrase: { content: phrase } }
      },
      options
    );
  }

  private indexUrl(): string {
    return `${this.baseUrl}/${encodeURIComponent(this.indexName)}`;
  }
}
