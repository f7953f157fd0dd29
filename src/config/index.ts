import { Config } from './types.js';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const PACKAGE_VERSION = '0.1.0';

const LOG_LEVELS: ReadonlyArray<Config['logging']['level']> = ['error', 'warn', 'info', 'debug'];

function readInt(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value >= min ? value : fallback;
}

function readNumber(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value >= min ? value : fallback;
}

function readLogLevel(): Config['logging']['level'] {
  const raw = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

export class ConfigManager {
  private static instance: ConfigManager;
  private config: Config;

  private constructor() {
    this.config = this.loadConfig();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  public getConfig(): Config {
    return this.config;
  }

  public get<K extends keyof Config>(key: K): Config[K] {
    return this.config[key];
  }

  private loadConfig(): Config {
    const rootDir = join(__dirname, '..', '..');

    const config: Config = {
      download: {
        bufferSize: readInt('DOWNLOAD_BUFFER_SIZE', 8192, 1),
        chunkSize: readInt('DOWNLOAD_CHUNK_SIZE', 1024 * 1024, 1),
        requestTimeoutMs: readInt('DOWNLOAD_REQUEST_TIMEOUT_MS', 30000, 1),
        retainPartialOnCancel: process.env.DOWNLOAD_RETAIN_PARTIAL === 'true',
        userAgent: process.env.DOWNLOAD_USER_AGENT ?? `steady-download/${PACKAGE_VERSION}`,
      },
      retry: {
        maxRetries: readInt('DOWNLOAD_MAX_RETRIES', 3, 0),
        initialDelayMs: readInt('DOWNLOAD_RETRY_INITIAL_DELAY_MS', 500, 0),
        maxDelayMs: readInt('DOWNLOAD_RETRY_MAX_DELAY_MS', 8000, 0),
        factor: readNumber('DOWNLOAD_RETRY_FACTOR', 2, 1),
      },
      paths: {
        rootDir,
        downloadsDir: process.env.DOWNLOADS_DIR ?? join(rootDir, 'downloads'),
      },
      logging: {
        level: readLogLevel(),
        file: process.env.LOG_FILE,
      },
    };

    return config;
  }

  public updateConfig(updates: Partial<Config>): void {
    this.config = { ...this.config, ...updates };
  }
}

// Export singleton instance getter
export const getConfig = (): Config => ConfigManager.getInstance().getConfig();
