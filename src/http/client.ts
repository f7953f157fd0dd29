import fetch, { Response } from 'node-fetch';
import { NetworkClient, NetworkClientOptions, ProbeResponse, ResponseBody } from './types.js';
import { HttpStatusError, RangeNotHonouredError, TimeoutError } from './errors.js';
import { logger, ScopedLogger } from '../utils/logger.js';

const log = (): ScopedLogger => logger().child('http');

async function* bodyChunks(stream: NodeJS.ReadableStream, release: () => void): AsyncGenerator<Uint8Array> {
  try {
    for await (const chunk of stream) {
      yield typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    }
  } finally {
    release();
  }
}

/** An open response plus the hook that detaches it from the caller's signal. */
interface PendingResponse {
  response: Response;
  release: () => void;
}

function collectHeaders(response: Response): Record<string, string> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name.toLowerCase()] = value;
  });
  return headers;
}

export class NodeFetchClient implements NetworkClient {
  private readonly timeout: number;
  private readonly headers: Record<string, string>;

  constructor(options: NetworkClientOptions = {}) {
    this.timeout = options.timeout ?? 30000;
    this.headers = { ...options.headers };
  }

  async probe(url: string, signal?: AbortSignal): Promise<ProbeResponse> {
    log().debug('Probing', { url });

    const { response, release } = await this.request(url, { method: 'HEAD' }, signal);
    release();
    return {
      status: response.status,
      statusText: response.statusText,
      headers: collectHeaders(response),
    };
  }

  async fetchAll(url: string, signal?: AbortSignal): Promise<ResponseBody> {
    log().debug('Fetching full content', { url });

    const pending = await this.request(url, { method: 'GET' }, signal);
    const { response } = pending;
    if (!response.ok) {
      pending.release();
      response.body?.resume();
      throw new HttpStatusError(response.status, response.statusText, url);
    }
    return this.toBody(pending, url);
  }

  async fetchRange(url: string, start: number, end: number, signal?: AbortSignal): Promise<ResponseBody> {
    log().debug('Fetching range', { url, start, end });

    const pending = await this.request(
      url,
      { method: 'GET', headers: { Range: `bytes=${start}-${end}` } },
      signal
    );
    const { response } = pending;
    if (response.status !== 206) {
      pending.release();
      // Drain so the socket is released
      response.body?.resume();
      if (!response.ok) {
        throw new HttpStatusError(response.status, response.statusText, url);
      }
      throw new RangeNotHonouredError(response.status, start, end);
    }
    return this.toBody(pending, url);
  }

  private toBody({ response, release }: PendingResponse, url: string): ResponseBody {
    if (!response.body) {
      release();
      throw new Error(`No response body for ${url}`);
    }
    return { status: response.status, body: bodyChunks(response.body, release) };
  }

  /**
   * Issues a request that is aborted when the caller's signal fires or when
   * no response headers arrive within the configured timeout. The caller's
   * signal stays attached until `release` is called.
   */
  private async request(
    url: string,
    init: { method: 'GET' | 'HEAD'; headers?: Record<string, string> },
    signal?: AbortSignal
  ): Promise<PendingResponse> {
    const controller = new AbortController();
    let timedOut = false;

    const forwardAbort = (): void => controller.abort();
    const release = (): void => signal?.removeEventListener('abort', forwardAbort);
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);

    try {
      const response = await fetch(url, {
        method: init.method,
        headers: { ...this.headers, ...init.headers },
        signal: controller.signal,
      });
      return { response, release };
    } catch (error) {
      release();
      if (timedOut) {
        throw new TimeoutError(this.timeout);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export function createNetworkClient(options?: NetworkClientOptions): NetworkClient {
  return new NodeFetchClient(options);
}
