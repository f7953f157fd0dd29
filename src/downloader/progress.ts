import { ProgressSink, TransferProgress } from './types.js';
import { logger } from '../utils/logger.js';

export function createProgress(
  attempt: number,
  bytesTransferred: number,
  totalBytes?: number,
  statusNote?: string
): TransferProgress {
  return {
    attempt,
    totalBytes,
    bytesTransferred,
    percentComplete: totalBytes !== undefined && totalBytes > 0 ? bytesTransferred / totalBytes : undefined,
    statusNote,
  };
}

/**
 * Delivers progress to a caller-supplied sink. A sink that throws is logged
 * and otherwise ignored; it never fails the transfer.
 */
export class ProgressEmitter {
  private sinkFailed = false;

  constructor(private readonly sink?: ProgressSink) {}

  emit(progress: TransferProgress): void {
    if (!this.sink) {
      return;
    }
    try {
      this.sink(progress);
    } catch (error) {
      if (!this.sinkFailed) {
        logger().warn('Progress handler threw; further errors from it are suppressed', { error });
        this.sinkFailed = true;
      }
    }
  }
}

/**
 * Unbounded queue that turns pushed progress values into an async iterable.
 * Only one consumer is supported.
 */
export class ProgressChannel implements AsyncIterable<TransferProgress> {
  private readonly buffered: TransferProgress[] = [];
  private waiting: ((result: IteratorResult<TransferProgress>) => void) | null = null;
  private closed = false;

  readonly push: ProgressSink = (progress) => {
    if (this.closed) {
      return;
    }
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: progress, done: false });
      return;
    }
    this.buffered.push(progress);
  };

  close(): void {
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<TransferProgress>> {
    const value = this.buffered.shift();
    if (value !== undefined) {
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<TransferProgress> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        this.buffered.length = 0;
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
