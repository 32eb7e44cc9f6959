/**
 * API Routes Module - REST endpoint handlers
 *
 * Responsibilities:
 * - / - Service summary
 * - /health - Detailed health (model loaded, accelerators, staging dir)
 * - /generate-3d - Image upload → GLB download
 *
 * Every generate request gets a RequestScope. Cleanup of its staged files is
 * deferred on the scope before any work that can fail, and the scope is
 * drained once the response has been sent or the connection has closed. A
 * scope drained while inference is still running is drained again when the
 * work ends, so nothing written afterwards is left behind.
 *
 * Usage:
 * ```typescript
 * registerApiRoutes(fastify, context);
 * ```
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import fs from "fs-extra";
import { RequestScope } from "../context/RequestScope.js";
import type { ServiceContext } from "../context/ServiceContext.js";
import { ValidationError } from "../errors.js";
import { GLB_MIME_TYPE } from "../inference/glb-exporter.js";
import { BufferedUpload, validateUpload } from "../upload/UploadValidator.js";

export const UPLOAD_FIELD = "image";

/**
 * Register all API routes
 */
export function registerApiRoutes(
  fastify: FastifyInstance,
  context: ServiceContext,
): void {
  console.log("[API] Registering API routes...");

  registerHealthRoutes(fastify, context);
  registerGenerateRoutes(fastify, context);

  console.log("[API] ✅ API routes registered");
}

/**
 * Register health and status endpoints
 *
 * @private
 */
function registerHealthRoutes(
  fastify: FastifyInstance,
  context: ServiceContext,
): void {
  const { config, store, models } = context;

  fastify.get("/", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      message: "3D Model Generator API",
      status: "healthy",
      supported_formats: config.supportedFormats,
      temp_dir: store.dir,
    });
  });

  fastify.get(
    "/health",
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const accelerators = await context.detectAccelerators();

      return reply.code(200).send({
        status: "healthy",
        pipeline_loaded: models.isLoaded,
        cuda_available: accelerators.available,
        device_count: accelerators.deviceCount,
        temp_dir: store.dir,
      });
    },
  );
}

/**
 * Read the image part of a multipart request into memory
 *
 * busboy reports a part sent with an empty filename as a plain field, so an
 * `image` field that is not a file means the client gave no filename.
 *
 * @private
 */
async function readImageUpload(
  request: FastifyRequest,
): Promise<BufferedUpload> {
  for await (const part of request.parts()) {
    if (part.fieldname !== UPLOAD_FIELD) {
      if (part.type === "file") part.file.resume();
      continue;
    }
    if (part.type !== "file") {
      throw new ValidationError("No filename provided");
    }
    return BufferedUpload.fromStream(
      part.filename,
      part.file,
      () => part.file.truncated,
    );
  }
  throw new ValidationError(
    `No image uploaded (expected multipart field "${UPLOAD_FIELD}")`,
  );
}

/**
 * Register the generate endpoint and the hooks that drain request scopes
 *
 * @private
 */
function registerGenerateRoutes(
  fastify: FastifyInstance,
  context: ServiceContext,
): void {
  const { config, store, models, orchestrator } = context;
  const scopes = new WeakMap<FastifyRequest, RequestScope>();

  const drainScope = async (request: FastifyRequest) => {
    const scope = scopes.get(request);
    if (scope) {
      scopes.delete(request);
      await scope.drain();
    }
  };

  // Runs after the response has been fully sent, on success and error alike
  fastify.addHook("onResponse", async (request) => {
    await drainScope(request);
  });
  fastify.addHook("onRequestAbort", async (request) => {
    await drainScope(request);
  });

  fastify.post(
    "/generate-3d",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const upload = await readImageUpload(request);
      const ext = await validateUpload(upload, config);

      const scope = new RequestScope();
      scopes.set(request, scope);
      const { inputPath, outputPath } = store.stage(scope.requestId, ext);
      scope.defer("input cleanup", () => store.cleanup(inputPath));
      scope.defer("output cleanup", () => store.cleanup(outputPath));

      // onResponse does not run when the client disconnects mid-request
      reply.raw.once("close", () => {
        void drainScope(request);
      });

      console.log(`[API] Processing request ${scope.requestId}`);

      try {
        await store.write(inputPath, await upload.read());
        console.log(`[API] Saved input: ${inputPath}`);

        const pipeline = await models.acquire();
        await orchestrator.run(inputPath, outputPath, pipeline);
      } finally {
        if (await scope.redrain()) {
          console.warn(
            `[API] Client disconnected during request ${scope.requestId}; staged files removed`,
          );
        }
      }

      if (scope.isDrained) {
        // Nobody is left to receive the model
        reply.hijack();
        return reply;
      }

      return reply
        .code(200)
        .type(GLB_MIME_TYPE)
        .header(
          "Content-Disposition",
          `attachment; filename="model_${scope.requestId}.glb"`,
        )
        .send(fs.createReadStream(outputPath));
    },
  );
}
