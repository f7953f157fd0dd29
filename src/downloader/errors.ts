export class TruncatedTransferError extends Error {
  constructor(
    public readonly expected: number,
    public readonly received: number,
    public readonly what: string
  ) {
    super(`Expected ${expected} bytes for ${what}, received ${received}`);
    this.name = 'TruncatedTransferError';
  }
}
