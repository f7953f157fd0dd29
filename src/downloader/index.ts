export { FileDownloader, createFileDownloader } from './file-downloader.js';
export type { FileDownloaderOverrides, ProgressStream } from './file-downloader.js';
export { probeCapabilities, toCapabilities, parseAcceptRanges, parseContentLength, parseContentMd5 } from './capabilities.js';
export { planRanges, selectStrategy } from './strategy.js';
export { runTransfer, fixedBuffers } from './transfer.js';
export type { TransferContext } from './transfer.js';
export { verifyIntegrity, ContentHasher, digestsEqual, toHex } from './integrity.js';
export { createProgress, ProgressChannel, ProgressEmitter } from './progress.js';
export {
  runWithRetry,
  createRetryPolicy,
  exponentialBackoff,
  retryUnlessDeterministic,
  abortableSleep,
} from './retry.js';
export type { BackoffFn, RetryPolicy, RetryPredicate, RetryResult, SleepFn } from './retry.js';
export { TruncatedTransferError } from './errors.js';
export type * from './types.js';
