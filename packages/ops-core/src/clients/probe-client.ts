import axios, { AxiosHeaders, type AxiosInstance, type Method } from 'axios';
import { promises as fs } from 'fs';
import * as path from 'path';
import type { Readable } from 'stream';
import { ReadOnlyViolationError } from '../errors';
import { createLogger } from '../logger';

const logger = createLogger('probe-client');

export interface ProbeResponse {
  /** HTTP status, or 0 when no response arrived (refused, reset, timed out) */
  status: number;
  body: string;
  headers: Record<string, string>;
  durationMs: number;
  error?: string;
}

export interface StreamResponse extends ProbeResponse {
  firstByteMs: number | null;
  timedOut: boolean;
}

export interface ProbeClientOptions {
  timeoutMs: number;
  outputDir?: string;
  /** Base URLs whose hosts only accept GET, HEAD and POST to _search/_count */
  readOnlyUrls?: string[];
}

export interface RequestOptions {
  timeoutMs?: number;
  /** File name under outputDir to keep the body in */
  saveAs?: string;
}

/**
 * True for requests that cannot change index state
 */
export function isReadOnlyRequest(method: string, pathname: string): boolean {
  const verb = method.toUpperCase();

  if (verb === 'GET' || verb === 'HEAD') {
    return true;
  }

  return verb === 'POST' && /\/_(search|count)$/.test(pathname.replace(/\/+$/, ''));
}

function flattenHeaders(headers: unknown): Record<string, string> {
  const source = headers instanceof AxiosHeaders ? headers.toJSON() : headers;
  const flat: Record<string, string> = {};

  if (source === null || typeof source !== 'object') {
    return flat;
  }

  for (const [name, value] of Object.entries(source)) {
    if (value === undefined || value === null) continue;
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }

  return flat;
}

/**
 * Bounded-time HTTP client for health and contract probes.
 * Never throws on HTTP status; transport failures come back as status 0.
 */
export class ProbeClient {
  private readonly http: AxiosInstance;
  private readonly readOnlyHosts: Set<string>;

  constructor(private readonly options: ProbeClientOptions) {
    this.http = axios.create({
      timeout: options.timeoutMs,
      maxRedirects: 0,
      validateStatus: () => true,
      transformResponse: [(data) => data]
    });

    this.readOnlyHosts = new Set((options.readOnlyUrls ?? []).map((url) => new URL(url).host));
  }

  /**
   * Status code only; 0 when the service is unreachable
   */
  async status(url: string, options: RequestOptions = {}): Promise<number> {
    const response = await this.request('GET', url, undefined, options);
    return response.status;
  }

  get(url: string, options: RequestOptions = {}): Promise<ProbeResponse> {
    return this.request('GET', url, undefined, options);
  }

  head(url: string, options: RequestOptions = {}): Promise<ProbeResponse> {
    return this.request('HEAD', url, undefined, options);
  }

  postJson(url: string, body: unknown, options: RequestOptions = {}): Promise<ProbeResponse> {
    return this.request('POST', url, body, options);
  }

  /**
   * POST and read the response as a stream, recording time to first byte.
   * The whole exchange is bounded by the timeout; on expiry the partial body is returned.
   */
  async stream(url: string, body: unknown, options: RequestOptions = {}): Promise<StreamResponse> {
    this.guard('POST', url);

    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const startTime = Date.now();
    const chunks: Buffer[] = [];

    let status = 0;
    let headers: Record<string, string> = {};
    let firstByteMs: number | null = null;

    try {
      const response = await this.http.request<Readable>({
        method: 'POST',
        url,
        data: body,
        headers: { 'Content-Type': 'application/json', Accept: 'text/event-stream' },
        responseType: 'stream',
        timeout: 0,
        signal: controller.signal
      });

      status = response.status;
      headers = flattenHeaders(response.headers);

      await new Promise<void>((resolve, reject) => {
        const onAbort = () => reject(new Error(`stream exceeded ${timeoutMs}ms`));

        if (controller.signal.aborted) {
          onAbort();
          return;
        }
        controller.signal.addEventListener('abort', onAbort, { once: true });

        response.data.on('data', (chunk: Buffer | string) => {
          if (firstByteMs === null) {
            firstByteMs = Date.now() - startTime;
          }
          chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
        });
        response.data.on('end', () => resolve());
        response.data.on('error', reject);
      });

      const result: StreamResponse = {
        status,
        headers,
        body: Buffer.concat(chunks).toString('utf8'),
        durationMs: Date.now() - startTime,
        firstByteMs,
        timedOut: false
      };

      await this.save(result.body, options.saveAs);
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const timedOut = controller.signal.aborted;

      logger.warn({ url, status, timedOut, error: message }, 'Stream probe did not complete');

      return {
        status,
        headers,
        body: Buffer.concat(chunks).toString('utf8'),
        durationMs: Date.now() - startTime,
        firstByteMs,
        timedOut,
        error: message
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private async request(
    method: Method,
    url: string,
    data: unknown,
    options: RequestOptions
  ): Promise<ProbeResponse> {
    this.guard(method, url);

    const startTime = Date.now();

    try {
      const response = await this.http.request<unknown>({
        method,
        url,
        data,
        headers: data === undefined ? undefined : { 'Content-Type': 'application/json' },
        responseType: 'text',
        timeout: options.timeoutMs ?? this.options.timeoutMs
      });

      const body = typeof response.data === 'string' ? response.data : '';
      const durationMs = Date.now() - startTime;

      logger.debug({ method, url, status: response.status, durationMs }, 'Probe complete');

      await this.save(body, options.saveAs);

      return {
        status: response.status,
        body,
        headers: flattenHeaders(response.headers),
        durationMs
      };
    } catch (error) {
      const durationMs = Date.now() - startTime;

      if (axios.isAxiosError(error)) {
        logger.debug({ method, url, code: error.code, durationMs }, 'Probe unreachable');
        return { status: 0, body: '', headers: {}, durationMs, error: error.code ?? error.message };
      }

      throw error;
    }
  }

  private guard(method: string, url: string): void {
    if (this.readOnlyHosts.size === 0) return;

    const target = new URL(url);

    if (this.readOnlyHosts.has(target.host) && !isReadOnlyRequest(method, target.pathname)) {
      throw new ReadOnlyViolationError(method.toUpperCase(), url);
    }
  }

  private async save(body: string, saveAs?: string): Promise<void> {
    if (!saveAs || !this.options.outputDir) return;

    const target = path.join(this.options.outputDir, saveAs);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, body);
  }
}
