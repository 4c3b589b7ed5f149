export { config, loadConfig } from './config';
export type { Config, DatabaseConfig, CatalogConfig, GraphConfig, LoggingConfig } from './config';
export { logger, createComponentLogger, flushLogs } from './logger';
export * from './errors';
