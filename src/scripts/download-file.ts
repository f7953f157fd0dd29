#!/usr/bin/env tsx

import { basename, join, resolve } from 'path';
import { createFileDownloader } from '../downloader/index.js';
import type { TransferProgress } from '../downloader/index.js';
import { getConfig } from '../config/index.js';
import { logger } from '../utils/logger.js';

function defaultDestination(url: string): string {
  const name = basename(new URL(url).pathname) || 'download';
  return join(getConfig().paths.downloadsDir, name);
}

function renderProgress(progress: TransferProgress): string {
  const percent =
    progress.percentComplete === undefined ? '?' : `${(progress.percentComplete * 100).toFixed(1)}%`;
  const total = progress.totalBytes === undefined ? '?' : String(progress.totalBytes);
  return `\r[attempt ${progress.attempt}] ${percent} (${progress.bytesTransferred}/${total} bytes)`;
}

async function main(): Promise<number> {
  const [url, destination] = process.argv.slice(2);

  if (!url) {
    console.error('Usage: npm run download -- <url> [destination]');
    console.error('Example: npm run download -- https://example.com/file.bin ./file.bin');
    return 1;
  }

  try {
    new URL(url);
  } catch {
    console.error(`Invalid URL: ${url}`);
    return 1;
  }

  const destinationPath = destination ? resolve(destination) : defaultDestination(url);
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger().warn('Interrupted, stopping after the current buffer');
    controller.abort();
  });

  const downloader = createFileDownloader();
  const { outcome, attempts } = await downloader.download(
    url,
    destinationPath,
    (progress) => process.stdout.write(renderProgress(progress)),
    controller.signal
  );
  process.stdout.write('\n');

  switch (outcome.kind) {
    case 'success':
      logger().info(`Saved ${outcome.bytesWritten} bytes to ${outcome.filePath}`, { md5: outcome.hash, attempts });
      return 0;
    case 'integrity-failure':
      logger().error('Downloaded content did not match the declared MD5', { ...outcome, attempts });
      return 1;
    case 'transient-failure':
      logger().error(`Download failed: ${outcome.message}`, { reason: outcome.reason, attempts });
      return 1;
    case 'cancelled':
      logger().warn('Download cancelled', { partialFileRetained: outcome.partialFileRetained });
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger().error('Unexpected error', { error });
    process.exitCode = 1;
  });
