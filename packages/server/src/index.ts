/**
 * Image-to-Mesh Server - Main entry point
 *
 * Serves a single-image-to-3D generation model over HTTP. A client uploads an
 * image to /generate-3d and receives a GLB file.
 *
 * **Server Architecture**:
 * ```
 * Client ←→ Fastify HTTP Server ──► UploadValidator ──► TempFileStore
 *                                         │
 *                                   ModelManager ──► WorkerPipeline ──► worker thread
 *                                         │                              (pipeline module)
 *                                 InferenceOrchestrator ──► GLB export
 * ```
 *
 * **Initialization Sequence**:
 * 1. Load configuration (environment variables, paths)
 * 2. Create the service context and prepare the staging directory
 * 3. Set up HTTP server (Fastify, CORS, multipart)
 * 4. Register API routes
 * 5. Start listening for connections
 * 6. Register graceful shutdown handlers
 *
 * The model is not loaded at startup; the first generate request loads it.
 *
 * **Environment Variables**:
 * See startup/config.ts for the complete list.
 */

import { createServiceContext, prepareStaging } from "./context/ServiceContext.js";
import {
  createHttpServer,
  loadConfig,
  registerApiRoutes,
  registerShutdownHandlers,
} from "./startup/index.js";

async function startServer() {
  console.log("=".repeat(60));
  console.log("🚀 Image-to-Mesh Server Starting...");
  console.log("=".repeat(60));

  // Step 1: Load configuration
  console.log("[Server] Step 1/6: Loading configuration...");
  const config = loadConfig();
  console.log(`[Server] ✅ Configuration loaded (port: ${config.port})`);

  // Step 2: Service context and staging directory
  console.log("[Server] Step 2/6: Preparing staging directory...");
  const context = createServiceContext(config);
  await prepareStaging(context);
  console.log(`[Server] ✅ Staging directory ready (${config.tempDir})`);

  // Step 3: Create HTTP server
  console.log("[Server] Step 3/6: Creating HTTP server...");
  const fastify = await createHttpServer(config);

  // Step 4: Register API routes
  console.log("[Server] Step 4/6: Registering API routes...");
  registerApiRoutes(fastify, context);

  // Step 5: Start listening
  console.log("[Server] Step 5/6: Starting HTTP server...");
  await fastify.listen({ port: config.port, host: config.host });
  console.log(
    `[Server] ✅ Server listening on http://${config.host}:${config.port}`,
  );

  console.log("[Server] Step 6/6: Registering shutdown handlers...");
  registerShutdownHandlers(fastify, context);

  if (!config.pipelineModule) {
    console.warn(
      "[Server] ⚠️  PIPELINE_MODULE is not set; generate requests will fail to load the model",
    );
  }

  console.log("=".repeat(60));
  console.log("✅ Image-to-Mesh Server Ready");
  console.log("=".repeat(60));
  console.log(`   Port:        ${config.port}`);
  console.log(`   Environment: ${config.nodeEnv}`);
  console.log(`   Model:       ${config.modelId}`);
  console.log(`   Pipeline:    ${config.pipelineModule ?? "(not configured)"}`);
  console.log(`   Staging:     ${config.tempDir}`);
  console.log("=".repeat(60));
}

startServer().catch((err) => {
  console.error("=".repeat(60));
  console.error("❌ FATAL ERROR DURING STARTUP");
  console.error("=".repeat(60));
  console.error(err);
  console.error("=".repeat(60));
  process.exit(1);
});
