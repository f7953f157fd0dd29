export interface Config {
  // Transfer settings
  download: {
    bufferSize: number; // bytes per read buffer
    chunkSize: number; // bytes per range request
    requestTimeoutMs: number;
    retainPartialOnCancel: boolean;
    userAgent: string;
  };

  // Whole-attempt retry policy
  retry: {
    maxRetries: number;
    initialDelayMs: number;
    maxDelayMs: number;
    factor: number;
  };

  // File paths
  paths: {
    rootDir: string;
    downloadsDir: string;
  };

  // Logging settings
  logging: {
    level: 'error' | 'warn' | 'info' | 'debug';
    file?: string;
  };
}
