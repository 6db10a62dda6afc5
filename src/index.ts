export { loadConfig, ConfigError } from './config.js';
export type { AppConfig } from './config.js';
export { createLogger, loggerOptions } from './logger.js';
export type { Logger } from './logger.js';
export { createScraperRuntime } from './services.js';
export type { ScraperServices, ScraperRuntime } from './services.js';
export * from './browser/index.js';
export * from './portal/index.js';
export * from './api/index.js';
export { createScraperMcpServer, ToolErrorCode } from './mcp/scraper-mcp-server.js';
export type { ScraperMcpServerOptions } from './mcp/scraper-mcp-server.js';
