export * from './downloader/index.js';
export * from './http/index.js';
export { ConfigManager, getConfig } from './config/index.js';
export type { Config } from './config/types.js';
export { Logger, logger } from './utils/logger.js';
