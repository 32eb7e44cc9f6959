/**
 * Shutdown Module - Graceful server cleanup
 *
 * Shutdown sequence:
 * 1. Close HTTP server (stop accepting new connections, finish in-flight
 *    responses so their deferred cleanup runs)
 * 2. Unload the model (terminates the pipeline worker)
 * 3. Exit process
 *
 * Handles signals:
 * - SIGINT (Ctrl+C) - User termination
 * - SIGTERM (Docker stop, systemd) - Graceful shutdown
 * - uncaughtException - Crash handling
 * - unhandledRejection - Promise error handling
 *
 * Usage:
 * ```typescript
 * registerShutdownHandlers(fastify, context);
 * ```
 */

import type { FastifyInstance } from "fastify";
import type { ServiceContext } from "../context/ServiceContext.js";

/**
 * Register all shutdown handlers
 */
export function registerShutdownHandlers(
  fastify: FastifyInstance,
  context: ServiceContext,
): void {
  console.log("[Shutdown] Registering shutdown handlers...");

  // Track if we're shutting down (prevent duplicate shutdowns)
  let isShuttingDown = false;

  const gracefulShutdown = async (signal: string, exitCode = 0) => {
    if (isShuttingDown) {
      console.log(`[Shutdown] Already shutting down, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;

    console.log(`[Shutdown] Received ${signal}, starting graceful shutdown...`);

    await closeHttpServer(fastify);
    await unloadModel(context);

    console.log("[Shutdown] ✅ Graceful shutdown complete");
    process.exit(exitCode);
  };

  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

  process.on("uncaughtException", (error) => {
    console.error("[Shutdown] Uncaught exception:", error);
    void gracefulShutdown("uncaughtException", 1);
  });

  process.on("unhandledRejection", (reason) => {
    console.error("[Shutdown] Unhandled rejection:", reason);
    void gracefulShutdown("unhandledRejection", 1);
  });

  console.log("[Shutdown] ✅ Shutdown handlers registered");
}

/**
 * Close HTTP server
 *
 * @private
 */
async function closeHttpServer(fastify: FastifyInstance): Promise<void> {
  try {
    console.log("[Shutdown] Closing HTTP server...");
    await fastify.close();
    console.log("[Shutdown] ✅ HTTP server closed");
  } catch (err) {
    console.error("[Shutdown] Error closing HTTP server:", err);
  }
}

/**
 * Unload the model and terminate its worker
 *
 * @private
 */
async function unloadModel(context: ServiceContext): Promise<void> {
  try {
    if (context.models.isLoaded) {
      console.log("[Shutdown] Unloading model...");
    }
    await context.models.unload();
  } catch (err) {
    console.error("[Shutdown] Error unloading model:", err);
  }
}
