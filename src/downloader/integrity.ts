import { createHash, Hash } from 'crypto';
import { ServerCapabilities, TransferOutcome, TransferStrategy } from './types.js';
import { discardFile } from '../utils/filesystem.js';
import { logger } from '../utils/logger.js';

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

/**
 * Running MD5 over the bytes of one attempt. Single use.
 */
export class ContentHasher {
  private readonly hash: Hash = createHash('md5');
  private digestBytes: Uint8Array | null = null;

  update(buffer: Uint8Array): void {
    if (this.digestBytes) {
      throw new Error('ContentHasher already finalized');
    }
    this.hash.update(buffer);
  }

  digest(): Uint8Array {
    if (!this.digestBytes) {
      this.digestBytes = new Uint8Array(this.hash.digest());
    }
    return this.digestBytes;
  }
}

export function digestsEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

export interface VerifiedTransfer {
  computedHash: Uint8Array;
  capabilities: ServerCapabilities;
  destinationPath: string;
  bytesWritten: number;
  strategy: TransferStrategy;
}

/**
 * Accepts the transfer unless the server declared a hash that differs from
 * the computed one, in which case the destination file is deleted.
 */
export async function verifyIntegrity(transfer: VerifiedTransfer): Promise<TransferOutcome> {
  const { computedHash, capabilities, destinationPath } = transfer;
  const declared = capabilities.declaredContentHash;

  if (declared && !digestsEqual(declared, computedHash)) {
    logger().warn('Content hash mismatch', {
      destinationPath,
      expected: toHex(declared),
      actual: toHex(computedHash),
    });
    await discardFile(destinationPath);
    return {
      kind: 'integrity-failure',
      expectedHash: toHex(declared),
      actualHash: toHex(computedHash),
    };
  }

  return {
    kind: 'success',
    filePath: destinationPath,
    bytesWritten: transfer.bytesWritten,
    strategy: transfer.strategy,
    hash: toHex(computedHash),
  };
}
