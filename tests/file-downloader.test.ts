import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { join } from 'path';
import { createFileDownloader, FileDownloader } from '../src/downloader/file-downloader.js';
import type { RetryPolicy } from '../src/downloader/retry.js';
import type { DownloaderSettings, TransferProgress } from '../src/downloader/types.js';
import { ConfigManager } from '../src/config/index.js';
import { createTempDir, exists, remove } from '../src/utils/filesystem.js';
import { brokenStream, createFakeClient, FakeNetworkClient, md5Base64, md5Hex } from './helpers/fake-network.js';

const RESOURCE_URL = 'https://example.test/installer.bin';

const settings: DownloaderSettings = {
  bufferSize: 8192,
  chunkSize: 8192,
  retainPartialOnCancel: false,
  retry: { maxRetries: 3, initialDelayMs: 1, maxDelayMs: 1, factor: 1 },
};

function instantPolicy(): Partial<RetryPolicy> {
  return { sleep: vi.fn(async () => undefined) };
}

function patterned(length: number): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (i * 7 + 3) % 256);
}

describe('FileDownloader', () => {
  let tempDir: string;
  let destinationPath: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    destinationPath = join(tempDir, 'downloads', 'installer.bin');
  });

  afterEach(async () => {
    await remove(tempDir);
  });

  function downloaderFor(client: FakeNetworkClient, overrides: Partial<DownloaderSettings> = {}): FileDownloader {
    return new FileDownloader(client, { ...settings, ...overrides }, instantPolicy());
  }

  async function readBytes(): Promise<number[]> {
    return [...(await fs.readFile(destinationPath))];
  }

  describe('scenarios', () => {
    it('should download through a range request when the server advertises byte ranges', async () => {
      const content = new Uint8Array([1, 2, 3]);
      const client = createFakeClient({
        content,
        headers: { 'accept-ranges': 'bytes', 'content-length': '3', 'content-md5': md5Base64(content) },
      });

      const report = await downloaderFor(client).download(RESOURCE_URL, destinationPath);

      expect(report).toEqual({
        outcome: { kind: 'success', filePath: destinationPath, bytesWritten: 3, strategy: 'chunked', hash: md5Hex(content) },
        attempts: 1,
      });
      expect(client.fetchRange).toHaveBeenCalledWith(RESOURCE_URL, 0, 2, undefined);
      expect(client.fetchAll).not.toHaveBeenCalled();
      expect(await readBytes()).toEqual([1, 2, 3]);
    });

    it('should download in one request without range support and no declared hash', async () => {
      const client = createFakeClient({ content: new Uint8Array([1, 2, 3]), headers: { 'content-length': '3' } });

      const report = await downloaderFor(client).download(RESOURCE_URL, destinationPath);

      expect(report.outcome.kind).toBe('success');
      expect(client.fetchAll).toHaveBeenCalledTimes(1);
      expect(client.fetchRange).not.toHaveBeenCalled();
      expect(await readBytes()).toEqual([1, 2, 3]);
    });

    it('should fail and leave no file when the declared hash does not match', async () => {
      const client = createFakeClient({
        content: new Uint8Array([1, 2, 3]),
        headers: { 'content-length': '3', 'content-md5': Buffer.from([4, 5, 6]).toString('base64') },
      });

      const report = await downloaderFor(client).download(RESOURCE_URL, destinationPath);

      expect(report.outcome).toEqual({
        kind: 'integrity-failure',
        expectedHash: '040506',
        actualHash: md5Hex(new Uint8Array([1, 2, 3])),
      });
      // The same wrong bytes twice in a row stop the retries
      expect(report.attempts).toBe(2);
      expect(await exists(destinationPath)).toBe(false);
    });

    it('should succeed after one retry when the first probe throws', async () => {
      const client = createFakeClient({ content: new Uint8Array([1, 2, 3]), headers: { 'content-length': '3' } });
      client.probe.mockRejectedValueOnce(new Error('getaddrinfo EAI_AGAIN example.test'));

      const report = await downloaderFor(client).download(RESOURCE_URL, destinationPath);

      expect(report.outcome.kind).toBe('success');
      expect(report.attempts).toBe(2);
      expect(client.probe).toHaveBeenCalledTimes(2);
      expect(await readBytes()).toEqual([1, 2, 3]);
    });
  });

  describe('retries', () => {
    it('should exhaust retries on persistent transport failures and leave no file', async () => {
      const client = createFakeClient({ content: new Uint8Array([1, 2, 3]), headers: { 'content-length': '3' } });
      client.fetchAll.mockImplementation(async () => ({ status: 200, body: brokenStream(new Uint8Array([1, 2, 3]), 2) }));

      const report = await downloaderFor(client).download(RESOURCE_URL, destinationPath);

      expect(report).toEqual({
        outcome: { kind: 'transient-failure', reason: 'transport', message: 'ECONNRESET' },
        attempts: 4,
      });
      expect(client.probe).toHaveBeenCalledTimes(4);
      expect(await exists(destinationPath)).toBe(false);
    });

    it('should stop retrying when the probe keeps returning the same status', async () => {
      const client = createFakeClient({ content: new Uint8Array(0), status: 404 });

      const report = await downloaderFor(client).download(RESOURCE_URL, destinationPath);

      expect(report).toEqual({
        outcome: { kind: 'transient-failure', reason: 'probe', message: 'HTTP 404: Error', status: 404 },
        attempts: 2,
      });
      expect(client.fetchAll).not.toHaveBeenCalled();
      expect(await exists(destinationPath)).toBe(false);
    });

    it('should restart from byte zero after a mid-transfer failure', async () => {
      const content = patterned(10);
      const client = createFakeClient({ content, headers: { 'content-length': '10', 'content-md5': md5Base64(content) } });
      client.fetchAll.mockImplementationOnce(async () => ({ status: 200, body: brokenStream(content, 6) }));
      const seen: TransferProgress[] = [];

      const report = await downloaderFor(client, { bufferSize: 4 }).download(RESOURCE_URL, destinationPath, (p) =>
        seen.push(p)
      );

      expect(report.outcome.kind).toBe('success');
      expect(seen.map((p) => [p.attempt, p.bytesTransferred])).toEqual([
        [1, 4],
        [2, 4],
        [2, 8],
        [2, 10],
      ]);
      expect(await readBytes()).toEqual([...content]);
    });
  });

  describe('properties', () => {
    it('should write identical bytes with chunked and full-stream strategies', async () => {
      const content = patterned(1000);
      const headers = { 'content-length': '1000', 'content-md5': md5Base64(content) };
      const chunkedClient = createFakeClient({ content, headers: { ...headers, 'accept-ranges': 'bytes' }, pieceSize: 33 });
      const fullClient = createFakeClient({ content, headers, pieceSize: 33 });
      const chunkedPath = join(tempDir, 'chunked.bin');
      const fullPath = join(tempDir, 'full.bin');

      const chunked = await downloaderFor(chunkedClient, { chunkSize: 64, bufferSize: 10 }).download(RESOURCE_URL, chunkedPath);
      const full = await downloaderFor(fullClient, { chunkSize: 64, bufferSize: 10 }).download(RESOURCE_URL, fullPath);

      expect(chunked.outcome).toMatchObject({ kind: 'success', strategy: 'chunked', bytesWritten: 1000 });
      expect(full.outcome).toMatchObject({ kind: 'success', strategy: 'full', bytesWritten: 1000 });
      expect(chunkedClient.fetchRange).toHaveBeenCalledTimes(16);
      expect(await fs.readFile(chunkedPath)).toEqual(await fs.readFile(fullPath));
      expect((await fs.stat(chunkedPath)).size).toBe(1000);
    });

    it('should report non-decreasing progress ending at the bytes written', async () => {
      const content = patterned(25);
      const client = createFakeClient({
        content,
        headers: { 'content-length': '25', 'accept-ranges': 'bytes' },
        pieceSize: 7,
      });
      const seen: TransferProgress[] = [];

      const report = await downloaderFor(client, { chunkSize: 10, bufferSize: 4 }).download(
        RESOURCE_URL,
        destinationPath,
        (p) => seen.push(p)
      );

      const counts = seen.map((p) => p.bytesTransferred);
      expect(counts).toEqual([4, 8, 10, 14, 18, 20, 24, 25]);
      expect(counts.every((value, i) => i === 0 || value >= counts[i - 1])).toBe(true);
      expect(report.outcome).toMatchObject({ kind: 'success', bytesWritten: 25 });
      expect(seen[seen.length - 1].percentComplete).toBe(1);
    });
  });

  describe('cancellation', () => {
    it('should return cancelled and delete the partial file by default', async () => {
      const content = patterned(20);
      const client = createFakeClient({ content, headers: { 'content-length': '20' } });
      const controller = new AbortController();

      const report = await downloaderFor(client, { bufferSize: 5 }).download(
        RESOURCE_URL,
        destinationPath,
        (p) => {
          if (p.bytesTransferred === 10) {
            controller.abort();
          }
        },
        controller.signal
      );

      expect(report).toEqual({ outcome: { kind: 'cancelled', bytesWritten: 10, partialFileRetained: false }, attempts: 1 });
      expect(client.probe).toHaveBeenCalledTimes(1);
      expect(await exists(destinationPath)).toBe(false);
    });

    it('should leave the partial file on disk when retention is enabled', async () => {
      const content = patterned(20);
      const client = createFakeClient({ content, headers: { 'content-length': '20' } });
      const controller = new AbortController();

      const report = await downloaderFor(client, { bufferSize: 5, retainPartialOnCancel: true }).download(
        RESOURCE_URL,
        destinationPath,
        (p) => {
          if (p.bytesTransferred === 10) {
            controller.abort();
          }
        },
        controller.signal
      );

      expect(report.outcome).toEqual({ kind: 'cancelled', bytesWritten: 10, partialFileRetained: true });
      expect(await readBytes()).toEqual([...content.slice(0, 10)]);
    });

    it('should not contact the server when cancelled up front', async () => {
      const client = createFakeClient({ content: new Uint8Array([1]) });
      const controller = new AbortController();
      controller.abort();

      const report = await downloaderFor(client).download(RESOURCE_URL, destinationPath, undefined, controller.signal);

      expect(report.outcome.kind).toBe('cancelled');
      expect(client.probe).not.toHaveBeenCalled();
    });

    it('should hand each caller its own cancelled outcome', async () => {
      const client = createFakeClient({ content: new Uint8Array([1]) });
      const controller = new AbortController();
      controller.abort();
      const subject = downloaderFor(client);

      const first = await subject.download(RESOURCE_URL, destinationPath, undefined, controller.signal);
      if (first.outcome.kind === 'cancelled') {
        first.outcome.bytesWritten = 99;
      }
      const second = await subject.download(RESOURCE_URL, destinationPath, undefined, controller.signal);

      expect(second.outcome).not.toBe(first.outcome);
      expect(second.outcome).toEqual({ kind: 'cancelled', bytesWritten: 0, partialFileRetained: false });
    });
  });

  describe('tryDownload', () => {
    it('should collapse the outcome to a boolean', async () => {
      const good = createFakeClient({ content: new Uint8Array([1, 2, 3]), headers: { 'content-length': '3' } });
      const bad = createFakeClient({ content: new Uint8Array(0), status: 500 });

      expect(await downloaderFor(good).tryDownload(RESOURCE_URL, destinationPath)).toBe(true);
      expect(await downloaderFor(bad).tryDownload(RESOURCE_URL, join(tempDir, 'other.bin'))).toBe(false);
    });
  });

  describe('downloadWithProgress', () => {
    it('should expose progress as an async iterable that ends with the download', async () => {
      const content = patterned(9);
      const client = createFakeClient({ content, headers: { 'content-length': '9' } });

      const { progress, done } = downloaderFor(client, { bufferSize: 3 }).downloadWithProgress(
        RESOURCE_URL,
        destinationPath
      );

      const fractions: Array<number | undefined> = [];
      for await (const update of progress) {
        fractions.push(update.percentComplete);
      }

      expect(fractions).toEqual([3 / 9, 6 / 9, 1]);
      expect((await done).outcome.kind).toBe('success');
    });
  });

  describe('construction', () => {
    it('should reject invalid buffer and chunk sizes', () => {
      const client = createFakeClient({ content: new Uint8Array(0) });

      expect(() => downloaderFor(client, { bufferSize: 0 })).toThrow('bufferSize must be a positive integer, got 0');
      expect(() => downloaderFor(client, { chunkSize: -1 })).toThrow('chunkSize must be a positive integer, got -1');
      expect(() => new FileDownloader(client, settings, { maxRetries: -1 })).toThrow(RangeError);
    });

    it('should build from configuration', async () => {
      // @ts-expect-error - accessing private static property for testing
      ConfigManager.instance = undefined;
      process.env.DOWNLOAD_BUFFER_SIZE = '2';
      process.env.DOWNLOAD_MAX_RETRIES = '0';
      try {
        const client = createFakeClient({ content: new Uint8Array([1, 2, 3]), headers: { 'content-length': '3' } });
        client.fetchAll.mockRejectedValueOnce(new Error('ECONNREFUSED'));
        const seen: number[] = [];

        const failed = await createFileDownloader({ client }).download(RESOURCE_URL, destinationPath);
        const succeeded = await createFileDownloader({ client }).download(RESOURCE_URL, destinationPath, (p) =>
          seen.push(p.bytesTransferred)
        );

        expect(failed.attempts).toBe(1);
        expect(failed.outcome.kind).toBe('transient-failure');
        expect(succeeded.outcome.kind).toBe('success');
        expect(seen).toEqual([2, 3]);
      } finally {
        delete process.env.DOWNLOAD_BUFFER_SIZE;
        delete process.env.DOWNLOAD_MAX_RETRIES;
        // @ts-expect-error - accessing private static property for testing
        ConfigManager.instance = undefined;
      }
    });
  });
});
