import winston from 'winston';
import { ConfigManager } from '../config/index.js';
import type { Config } from '../config/types.js';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';

export type LogMeta = Record<string, unknown>;

function describeMeta(meta: LogMeta): LogMeta {
  // Error instances serialize to {} under JSON.stringify
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

export class Logger {
  private static instance: Logger;
  private logger: winston.Logger;

  private constructor() {
    const config = ConfigManager.getInstance().getConfig();
    this.logger = this.createLogger(config.logging);
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  private createLogger(loggingConfig: Config['logging']): winston.Logger {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp(),
          winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
            const scope = typeof component === 'string' ? ` (${component})` : '';
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `${String(timestamp)} [${String(level)}]${scope}: ${String(message)}${metaStr}`;
          })
        ),
      }),
    ];

    if (loggingConfig.file) {
      transports.push(this.createFileTransport(loggingConfig.file));
    }

    return winston.createLogger({
      level: loggingConfig.level,
      transports,
    });
  }

  private createFileTransport(filename: string): winston.transport {
    return new winston.transports.File({
      filename,
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    });
  }

  public async setLogFile(filepath: string): Promise<void> {
    await mkdir(dirname(filepath), { recursive: true });

    const fileTransport = this.logger.transports.find(
      (transport) => transport instanceof winston.transports.File
    );
    if (fileTransport) {
      this.logger.remove(fileTransport);
    }

    this.logger.add(this.createFileTransport(filepath));
  }

  public error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta && describeMeta(meta));
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta && describeMeta(meta));
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta && describeMeta(meta));
  }

  public debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta && describeMeta(meta));
  }

  /**
   * Logger that tags every entry with the emitting component.
   */
  public child(component: string): ScopedLogger {
    return new ScopedLogger(this, component);
  }

  public setLevel(level: Config['logging']['level']): void {
    this.logger.level = level;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }
}

export class ScopedLogger {
  constructor(
    private readonly parent: Logger,
    public readonly component: string
  ) {}

  public error(message: string, meta?: LogMeta): void {
    this.parent.error(message, { component: this.component, ...meta });
  }

  public warn(message: string, meta?: LogMeta): void {
    this.parent.warn(message, { component: this.component, ...meta });
  }

  public info(message: string, meta?: LogMeta): void {
    this.parent.info(message, { component: this.component, ...meta });
  }

  public debug(message: string, meta?: LogMeta): void {
    this.parent.debug(message, { component: this.component, ...meta });
  }
}

export const logger = (): Logger => Logger.getInstance();
export const error = (message: string, meta?: LogMeta): void => logger().error(message, meta);
export const warn = (message: string, meta?: LogMeta): void => logger().warn(message, meta);
export const info = (message: string, meta?: LogMeta): void => logger().info(message, meta);
export const debug = (message: string, meta?: LogMeta): void => logger().debug(message, meta);
