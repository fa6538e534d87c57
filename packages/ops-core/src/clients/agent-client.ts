import { chatCompletionRequestSchema, type ChatCompletionRequest } from '../schemas';
import {
  ProbeClient,
  type ProbeResponse,
  type RequestOptions,
  type StreamResponse
} from './probe-client';

/**
 * Client for the agent service's OpenAI-compatible surface
 */
export class AgentClient {
  constructor(
    private readonly probe: ProbeClient,
    private readonly baseUrl: string,
    private readonly model: string
  ) {}

  health(options?: RequestOptions): Promise<ProbeResponse> {
    return this.probe.get(`${this.baseUrl}/health`, options);
  }

  models(options?: RequestOptions): Promise<ProbeResponse> {
    return this.probe.get(`${this.baseUrl}/v1/models`, options);
  }

  openapi(options?: RequestOptions): Promise<ProbeResponse> {
    return this.probe.get(`${this.baseUrl}/openapi.json`, options);
  }

  /**
   * Single-turn, non-streaming completion
   */
  chat(prompt: string, options?: RequestOptions): Promise<ProbeResponse> {
    return this.probe.postJson(`${this.baseUrl}/v1/chat/completions`, this.buildRequest(prompt, false), options);
  }

  /**
   * Single-turn completion over server-sent events
   */
  chatStream(prompt: string, options?: RequestOptions): Promise<StreamResponse> {
    return this.probe.stream(`${this.baseUrl}/v1/chat/completions`, this.buildRequest(prompt, true), options);
  }

  /**
   * File proxy; `path` is an absolute path on the agent host
   */
  open(path: string, options?: RequestOptions): Promise<ProbeResponse> {
    return this.probe.get(this.openUrl(path), options);
  }

  openUrl(path: string): string {
    return `${this.baseUrl}/open?path=${encodeURIComponent(path)}`;
  }

  url(pathname: string): string {
    return `${this.baseUrl}${pathname}`;
  }

  /**
   * Throws a ZodError for an empty model or prompt
   */
  buildRequest(prompt: string, stream: boolean): ChatCompletionRequest {
    return chatCompletionRequestSchema.parse({
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      stream
    });
  }
}
