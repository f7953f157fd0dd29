export interface TransferRequest {
  readonly url: string;
  readonly destinationPath: string;
}

export interface ServerCapabilities {
  readonly httpStatus: number;
  readonly declaredContentLength?: number;
  readonly supportsRangeRequests: boolean;
  /** Raw digest bytes decoded from Content-MD5 */
  readonly declaredContentHash?: Uint8Array;
}

/** Inclusive byte offsets into the remote resource. */
export interface ByteRange {
  readonly start: number;
  readonly end: number;
}

export interface TransferProgress {
  totalBytes?: number;
  bytesTransferred: number;
  /** Fraction in [0, 1]; undefined when the total is unknown or zero */
  percentComplete?: number;
  statusNote?: string;
  /** 1-based attempt number; byte counts restart with each attempt */
  attempt: number;
}

export type ProgressSink = (progress: TransferProgress) => void;

export type TransferStrategy = 'chunked' | 'full';

/** One network read: a byte range, or `null` for an unranged GET. */
export interface TransferSegment {
  readonly range: ByteRange | null;
}

export interface TransferPlan {
  readonly strategy: TransferStrategy;
  readonly segments: Iterable<TransferSegment>;
}

export type TransferOutcome =
  | {
      kind: 'success';
      filePath: string;
      bytesWritten: number;
      strategy: TransferStrategy;
      hash: string;
    }
  | {
      kind: 'integrity-failure';
      expectedHash: string;
      actualHash: string;
    }
  | {
      kind: 'transient-failure';
      reason: 'probe' | 'transport';
      message: string;
      status?: number;
    }
  | {
      kind: 'cancelled';
      bytesWritten: number;
      partialFileRetained: boolean;
    };

export interface DownloadReport {
  outcome: TransferOutcome;
  attempts: number;
}

export interface DownloaderSettings {
  bufferSize: number;
  chunkSize: number;
  retainPartialOnCancel: boolean;
  retry: RetrySettings;
}

export interface RetrySettings {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
