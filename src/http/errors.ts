export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = 'HttpStatusError';
  }
}

export class ProbeStatusError extends HttpStatusError {
  constructor(status: number, statusText: string, url: string) {
    super(status, statusText, url);
    this.name = 'ProbeStatusError';
  }
}

export class RangeNotHonouredError extends Error {
  constructor(
    public readonly status: number,
    public readonly start: number,
    public readonly end: number
  ) {
    super(`Expected 206 for bytes=${start}-${end}, got HTTP ${status}`);
    this.name = 'RangeNotHonouredError';
  }
}

export class TimeoutError extends Error {
  constructor(public readonly timeout: number) {
    super(`Request timeout after ${timeout}ms`);
    this.name = 'TimeoutError';
  }
}
