import { NetworkClient } from '../http/types.js';
import { ProbeStatusError } from '../http/errors.js';
import { createNetworkClient } from '../http/client.js';
import { ConfigManager } from '../config/index.js';
import { logger, ScopedLogger } from '../utils/logger.js';
import { probeCapabilities } from './capabilities.js';
import { assertPositiveInteger, selectStrategy } from './strategy.js';
import { runTransfer } from './transfer.js';
import { ProgressChannel, ProgressEmitter } from './progress.js';
import { createRetryPolicy, RetryPolicy, runWithRetry } from './retry.js';
import {
  DownloaderSettings,
  DownloadReport,
  ProgressSink,
  ServerCapabilities,
  TransferOutcome,
  TransferProgress,
  TransferRequest,
} from './types.js';

const log = (): ScopedLogger => logger().child('downloader');

function cancelledBeforeStart(): TransferOutcome {
  return { kind: 'cancelled', bytesWritten: 0, partialFileRetained: false };
}

export interface ProgressStream {
  progress: AsyncIterable<TransferProgress>;
  done: Promise<DownloadReport>;
}

/**
 * Downloads one remote file per call: probe, pick chunked or full transfer,
 * stream to disk while hashing, verify, and retry the whole attempt on
 * failure. Network and I/O errors are reported through the outcome, never
 * thrown.
 */
export class FileDownloader {
  private readonly policy: RetryPolicy;

  constructor(
    private readonly client: NetworkClient,
    private readonly settings: DownloaderSettings,
    policyOverrides: Partial<RetryPolicy> = {}
  ) {
    assertPositiveInteger('bufferSize', settings.bufferSize);
    assertPositiveInteger('chunkSize', settings.chunkSize);
    this.policy = createRetryPolicy(settings.retry, policyOverrides);
    if (!Number.isSafeInteger(this.policy.maxRetries) || this.policy.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${this.policy.maxRetries}`);
    }
  }

  async download(
    url: string,
    destinationPath: string,
    onProgress?: ProgressSink,
    signal?: AbortSignal
  ): Promise<DownloadReport> {
    const request: TransferRequest = { url, destinationPath };
    const emitter = new ProgressEmitter(onProgress);

    log().info('Starting download', { url, destinationPath });
    const startTime = Date.now();

    const result = await runWithRetry(
      (attempt) => this.attempt(request, attempt, emitter, signal),
      this.policy,
      signal
    );

    const meta = { url, attempts: result.attempts, duration: Date.now() - startTime };
    if (result.outcome.kind === 'success') {
      log().info('Download completed', { ...meta, size: result.outcome.bytesWritten, strategy: result.outcome.strategy });
    } else {
      log().error('Download failed', { ...meta, outcome: result.outcome });
    }
    return result;
  }

  async tryDownload(
    url: string,
    destinationPath: string,
    onProgress?: ProgressSink,
    signal?: AbortSignal
  ): Promise<boolean> {
    const { outcome } = await this.download(url, destinationPath, onProgress, signal);
    return outcome.kind === 'success';
  }

  /**
   * Pull-based variant: progress is buffered until consumed and the iterable
   * ends once the download settles.
   */
  downloadWithProgress(url: string, destinationPath: string, signal?: AbortSignal): ProgressStream {
    const channel = new ProgressChannel();
    const done = this.download(url, destinationPath, channel.push, signal).finally(() => channel.close());
    return { progress: channel, done };
  }

  private async attempt(
    request: TransferRequest,
    attempt: number,
    progress: ProgressEmitter,
    signal?: AbortSignal
  ): Promise<TransferOutcome> {
    if (signal?.aborted) {
      return cancelledBeforeStart();
    }

    let capabilities: ServerCapabilities;
    try {
      capabilities = await probeCapabilities(this.client, request.url, signal);
    } catch (error) {
      if (signal?.aborted) {
        return cancelledBeforeStart();
      }
      log().error('Probe failed', { url: request.url, attempt, error });
      return error instanceof ProbeStatusError
        ? { kind: 'transient-failure', reason: 'probe', message: error.message, status: error.status }
        : {
            kind: 'transient-failure',
            reason: 'transport',
            message: error instanceof Error ? error.message : String(error),
          };
    }

    const plan = selectStrategy(capabilities, this.settings.chunkSize);
    log().debug('Transfer strategy selected', {
      url: request.url,
      attempt,
      strategy: plan.strategy,
      contentLength: capabilities.declaredContentLength,
    });

    return runTransfer({
      client: this.client,
      request,
      capabilities,
      plan,
      bufferSize: this.settings.bufferSize,
      progress,
      attempt,
      retainPartialOnCancel: this.settings.retainPartialOnCancel,
      signal,
    });
  }
}

export interface FileDownloaderOverrides extends Partial<DownloaderSettings> {
  client?: NetworkClient;
  policy?: Partial<RetryPolicy>;
}

/**
 * Builds a downloader from the current configuration and the node-fetch
 * client.
 */
export function createFileDownloader(overrides: FileDownloaderOverrides = {}): FileDownloader {
  const config = ConfigManager.getInstance().getConfig();
  const { client, policy, ...settings } = overrides;

  return new FileDownloader(
    client ??
      createNetworkClient({
        timeout: config.download.requestTimeoutMs,
        headers: { 'User-Agent': config.download.userAgent },
      }),
    {
      bufferSize: config.download.bufferSize,
      chunkSize: config.download.chunkSize,
      retainPartialOnCancel: config.download.retainPartialOnCancel,
      retry: config.retry,
      ...settings,
    },
    policy
  );
}
