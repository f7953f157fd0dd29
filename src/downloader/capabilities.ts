import { NetworkClient, ProbeResponse } from '../http/types.js';
import { ProbeStatusError } from '../http/errors.js';
import { ServerCapabilities } from './types.js';
import { logger } from '../utils/logger.js';

export function parseContentLength(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  const length = Number(value.trim());
  return Number.isSafeInteger(length) ? length : undefined;
}

export function parseAcceptRanges(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return value.split(',').some((token) => token.trim().toLowerCase() === 'bytes');
}

/**
 * Decodes a base64 Content-MD5 value. Values that are not base64 are ignored;
 * a well-formed value of the wrong length is kept so it fails verification.
 */
export function parseContentMd5(value: string | undefined): Uint8Array | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(trimmed)) {
    logger().warn('Ignoring malformed Content-MD5 header', { value });
    return undefined;
  }
  return new Uint8Array(Buffer.from(trimmed, 'base64'));
}

export function toCapabilities(response: ProbeResponse): ServerCapabilities {
  return {
    httpStatus: response.status,
    declaredContentLength: parseContentLength(response.headers['content-length']),
    supportsRangeRequests: parseAcceptRanges(response.headers['accept-ranges']),
    declaredContentHash: parseContentMd5(response.headers['content-md5']),
  };
}

/**
 * Issues the metadata request for `url`. Throws {@link ProbeStatusError}
 * when the server does not answer 200.
 */
export async function probeCapabilities(
  client: NetworkClient,
  url: string,
  signal?: AbortSignal
): Promise<ServerCapabilities> {
  const response = await client.probe(url, signal);

  if (response.status !== 200) {
    throw new ProbeStatusError(response.status, response.statusText, url);
  }

  const capabilities = toCapabilities(response);
  logger().debug('Server capabilities', {
    url,
    contentLength: capabilities.declaredContentLength,
    ranges: capabilities.supportsRangeRequests,
    hasHash: capabilities.declaredContentHash !== undefined,
  });
  return capabilities;
}
