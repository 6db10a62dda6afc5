export { buildApp, registerErrorHandler, registerScreenshots } from './app.js';
export type { BuildAppOptions } from './app.js';
export { registerRoutes, API_VERSION } from './routes.js';
export { registerMcpSseRoutes } from './mcp-sse.js';
export { ApiError, ErrorCode } from './errors.js';
export type { ErrorResponse } from './errors.js';
