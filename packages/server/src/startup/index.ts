/**
 * Startup Module - Barrel export for all startup modules
 *
 * Usage:
 * ```typescript
 * import { loadConfig, createHttpServer, registerApiRoutes } from './startup';
 * ```
 */

export { loadConfig, resolveConfig, type ServerConfig } from "./config.js";
export { createHttpServer } from "./http-server.js";
export { registerApiRoutes } from "./api-routes.js";
export { registerShutdownHandlers } from "./shutdown.js";
