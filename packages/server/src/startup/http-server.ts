/**
 * HTTP Server Module - Fastify setup
 *
 * Configures the Fastify HTTP server with CORS, multipart uploads and the
 * error handler that turns service errors into client-facing responses.
 *
 * Responsibilities:
 * - Create Fastify instance with logging
 * - Configure CORS
 * - Register multipart with the upload ceiling
 * - Map errors to status codes and `{ detail }` bodies
 *
 * Usage:
 * ```typescript
 * const fastify = await createHttpServer(config);
 * registerApiRoutes(fastify, context);
 * await fastify.listen({ port: config.port, host: config.host });
 * ```
 */

import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import Fastify, {
  type FastifyError,
  type FastifyInstance,
  type FastifyReply,
  type FastifyRequest,
} from "fastify";
import { ServiceError } from "../errors.js";
import type { ServerConfig } from "./config.js";

/**
 * Create and configure Fastify HTTP server
 *
 * Does NOT start the server listening - that's done after routes are
 * registered.
 */
export async function createHttpServer(
  config: ServerConfig,
): Promise<FastifyInstance> {
  console.log("[HTTP] Creating Fastify server...");

  // Create Fastify instance with minimal logging
  const fastify = Fastify({ logger: { level: "error" } });

  await fastify.register(cors, {
    origin: config.corsOrigins.includes("*") ? "*" : config.corsOrigins,
    methods: ["GET", "POST", "OPTIONS"],
  });
  console.log("[HTTP] ✅ CORS configured");

  // The parser stops reading at the ceiling and flags the stream as
  // truncated; the upload validator turns that into a 400
  await fastify.register(multipart, {
    limits: {
      fileSize: config.maxUploadBytes,
      files: 1,
    },
    throwFileSizeLimit: false,
  });
  console.log("[HTTP] ✅ Multipart registered");

  fastify.setErrorHandler(createErrorHandler(config));

  console.log("[HTTP] ✅ HTTP server created");
  return fastify;
}

/**
 * Build the error handler
 *
 * - ServiceError → its own status, `{ detail: message }`
 * - other client errors (bad multipart, unsupported media type) → their status
 * - anything else → 500; the message is hidden in production
 */
export function createErrorHandler(config: ServerConfig) {
  return (
    err: FastifyError | Error,
    request: FastifyRequest,
    reply: FastifyReply,
  ) => {
    const route = `${request.method} ${request.url}`;

    if (err instanceof ServiceError) {
      if (err.statusCode < 500) {
        console.warn(`[API] ${route} rejected: ${err.message}`);
      } else {
        console.error(`[API] ${route} failed (${err.code}): ${err.message}`);
      }
      return reply.status(err.statusCode).send({ detail: err.message });
    }

    const statusCode =
      "statusCode" in err && typeof err.statusCode === "number"
        ? err.statusCode
        : 500;
    if (statusCode < 500) {
      console.warn(`[API] ${route} rejected: ${err.message}`);
      return reply.status(statusCode).send({ detail: err.message });
    }

    console.error(`[API] ${route} failed:`, err);
    return reply.status(500).send({
      detail:
        config.nodeEnv === "production"
          ? "Internal server error"
          : err.message,
    });
  };
}
