import { ByteRange, ServerCapabilities, TransferPlan, TransferSegment } from './types.js';

export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Consecutive inclusive ranges of at most `chunkSize` bytes covering
 * `0..totalLength - 1`. The last range is clipped to the resource.
 */
export function* planRanges(totalLength: number, chunkSize: number): Generator<ByteRange> {
  assertPositiveInteger('chunkSize', chunkSize);

  let start = 0;
  while (start < totalLength) {
    const end = Math.min(start + chunkSize - 1, totalLength - 1);
    yield { start, end };
    start = end + 1;
  }
}

function* rangedSegments(totalLength: number, chunkSize: number): Generator<TransferSegment> {
  for (const range of planRanges(totalLength, chunkSize)) {
    yield { range };
  }
}

/**
 * Chunked transfer needs both range support and a known, non-zero length;
 * the range loop cannot terminate without one.
 */
export function selectStrategy(capabilities: ServerCapabilities, chunkSize: number): TransferPlan {
  assertPositiveInteger('chunkSize', chunkSize);
  const length = capabilities.declaredContentLength;

  if (capabilities.supportsRangeRequests && length !== undefined && length > 0) {
    return {
      strategy: 'chunked',
      segments: { [Symbol.iterator]: () => rangedSegments(length, chunkSize) },
    };
  }

  return { strategy: 'full', segments: [{ range: null }] };
}
