import { modelTagsSchema } from '../schemas';
import { parseBody } from '../utils';
import { ProbeClient, type ProbeResponse, type RequestOptions } from './probe-client';

/**
 * Client for the LLM inference server
 */
export class LlmClient {
  constructor(
    private readonly probe: ProbeClient,
    private readonly baseUrl: string
  ) {}

  tags(options?: RequestOptions): Promise<ProbeResponse> {
    return this.probe.get(`${this.baseUrl}/api/tags`, options);
  }

  /**
   * Installed model names; empty when the server is down or answers garbage
   */
  async modelNames(options?: RequestOptions): Promise<string[]> {
    const response = await this.tags(options);
    if (response.status !== 200) return [];

    const parsed = parseBody(response.body, modelTagsSchema);
    return parsed.ok ? parsed.data.models.map((model) => model.name) : [];
  }
}
