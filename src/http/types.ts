/**
 * Metadata returned by a probe. Header names are lower-case.
 */
export interface ProbeResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
}

export interface ResponseBody {
  status: number;
  body: AsyncIterable<Uint8Array>;
}

/**
 * The three requests the download engine needs from the network.
 * Implementations hold no state shared between calls.
 */
export interface NetworkClient {
  /** Metadata-only request (HEAD). Resolves for any status. */
  probe(url: string, signal?: AbortSignal): Promise<ProbeResponse>;
  /** Full-content GET. Rejects on a non-2xx status. */
  fetchAll(url: string, signal?: AbortSignal): Promise<ResponseBody>;
  /** GET restricted to the inclusive span `start`..`end`. Rejects unless the server answers 206. */
  fetchRange(url: string, start: number, end: number, signal?: AbortSignal): Promise<ResponseBody>;
}

export interface NetworkClientOptions {
  timeout?: number;
  headers?: Record<string, string>;
}
