import { createWriteStream, WriteStream } from 'fs';
import { once } from 'events';
import { finished } from 'stream/promises';
import { dirname } from 'path';
import { NetworkClient, ResponseBody } from '../http/types.js';
import { ensureDir, discardFile } from '../utils/filesystem.js';
import { logger, ScopedLogger } from '../utils/logger.js';
import { ContentHasher, verifyIntegrity } from './integrity.js';
import { createProgress, ProgressEmitter } from './progress.js';
import { TruncatedTransferError } from './errors.js';
import { ServerCapabilities, TransferOutcome, TransferPlan, TransferRequest, TransferSegment } from './types.js';

const log = (): ScopedLogger => logger().child('transfer');

/**
 * Re-slices a response body into buffers of exactly `bufferSize` bytes; only
 * the final buffer may be shorter. Each yielded buffer is freshly allocated.
 */
export async function* fixedBuffers(
  body: AsyncIterable<Uint8Array>,
  bufferSize: number
): AsyncGenerator<Buffer> {
  let pending = Buffer.allocUnsafe(bufferSize);
  let filled = 0;

  for await (const chunk of body) {
    let offset = 0;
    while (offset < chunk.length) {
      const count = Math.min(bufferSize - filled, chunk.length - offset);
      pending.set(chunk.subarray(offset, offset + count), filled);
      filled += count;
      offset += count;

      if (filled === bufferSize) {
        yield pending;
        pending = Buffer.allocUnsafe(bufferSize);
        filled = 0;
      }
    }
  }

  if (filled > 0) {
    yield pending.subarray(0, filled);
  }
}

/**
 * Exclusive writer for one attempt's destination file, truncated on open.
 */
class DestinationWriter {
  private constructor(private readonly stream: WriteStream) {}

  static async open(filePath: string): Promise<DestinationWriter> {
    await ensureDir(dirname(filePath));
    const stream = createWriteStream(filePath, { flags: 'w' });
    await once(stream, 'open');
    // Failures surface through write callbacks and finished()
    stream.on('error', (error) => log().debug('Destination stream error', { filePath, error }));
    return new DestinationWriter(stream);
  }

  write(buffer: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(buffer, (error) => (error ? reject(error) : resolve()));
    });
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }

  async abandon(): Promise<void> {
    if (this.stream.closed) {
      return;
    }
    const closed = once(this.stream, 'close');
    this.stream.destroy();
    try {
      await closed;
    } catch (error) {
      log().debug('Destination stream closed with error', { error });
    }
  }
}

export interface TransferContext {
  client: NetworkClient;
  request: TransferRequest;
  capabilities: ServerCapabilities;
  plan: TransferPlan;
  bufferSize: number;
  progress: ProgressEmitter;
  attempt: number;
  retainPartialOnCancel: boolean;
  signal?: AbortSignal;
}

function openSegment(ctx: TransferContext, segment: TransferSegment): Promise<ResponseBody> {
  const { client, request, signal } = ctx;
  return segment.range
    ? client.fetchRange(request.url, segment.range.start, segment.range.end, signal)
    : client.fetchAll(request.url, signal);
}

/**
 * Streams every segment of the plan, in order, into the destination file
 * while hashing and reporting progress per buffer.
 *
 * Cancellation is observed before each segment request and before each
 * buffer is written, so it takes effect within one buffer's I/O. When the
 * client honours the signal an in-flight request is aborted as well.
 * Transport errors delete the destination and yield `transient-failure`.
 */
export async function runTransfer(ctx: TransferContext): Promise<TransferOutcome> {
  const { request, capabilities, plan, bufferSize, progress, attempt, signal } = ctx;
  const { url, destinationPath } = request;
  const totalBytes = capabilities.declaredContentLength;
  const hasher = new ContentHasher();
  let bytesWritten = 0;
  let writer: DestinationWriter | null = null;

  const cancel = async (): Promise<TransferOutcome> => {
    await writer?.abandon();
    writer = null;
    const partialFileRetained = ctx.retainPartialOnCancel;
    if (!partialFileRetained) {
      await discardFile(destinationPath);
    }
    log().info('Transfer cancelled', { url, attempt, bytesWritten, partialFileRetained });
    return { kind: 'cancelled', bytesWritten, partialFileRetained };
  };

  try {
    writer = await DestinationWriter.open(destinationPath);

    for (const segment of plan.segments) {
      if (signal?.aborted) {
        return await cancel();
      }

      const response = await openSegment(ctx, segment);
      const note = segment.range ? `bytes ${segment.range.start}-${segment.range.end}` : undefined;
      let segmentBytes = 0;

      for await (const buffer of fixedBuffers(response.body, bufferSize)) {
        if (signal?.aborted) {
          return await cancel();
        }
        await writer.write(buffer);
        hasher.update(buffer);
        bytesWritten += buffer.length;
        segmentBytes += buffer.length;
        progress.emit(createProgress(attempt, bytesWritten, totalBytes, note));
      }

      if (segment.range) {
        const expected = segment.range.end - segment.range.start + 1;
        if (segmentBytes !== expected) {
          throw new TruncatedTransferError(expected, segmentBytes, note ?? url);
        }
      }
    }

    if (totalBytes !== undefined && bytesWritten !== totalBytes) {
      throw new TruncatedTransferError(totalBytes, bytesWritten, url);
    }

    await writer.close();
    writer = null;
  } catch (error) {
    if (signal?.aborted) {
      return cancel();
    }
    await writer?.abandon();
    log().error('Transfer failed', { url, attempt, bytesWritten, error });
    await discardFile(destinationPath);
    return {
      kind: 'transient-failure',
      reason: 'transport',
      message: error instanceof Error ? error.message : String(error),
    };
  }

  return verifyIntegrity({
    computedHash: hasher.digest(),
    capabilities,
    destinationPath,
    bytesWritten,
    strategy: plan.strategy,
  });
}
