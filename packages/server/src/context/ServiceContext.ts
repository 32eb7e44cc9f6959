/**
 * Service Context
 *
 * The process-scoped object handed to the HTTP layer. It owns the staging
 * store, the model manager (the one piece of shared mutable state), the
 * inference orchestrator and the accelerator detector. Tests build their own
 * context with a fake loader instead of touching module-level state.
 */

import { InferenceOrchestrator } from "../inference/InferenceOrchestrator.js";
import {
  createAcceleratorDetector,
  type AcceleratorDetector,
} from "../model/accelerators.js";
import { ModelManager } from "../model/ModelManager.js";
import type { PipelineLoader } from "../model/types.js";
import { createWorkerPipelineLoader } from "../model/WorkerPipeline.js";
import { TempFileStore } from "../staging/TempFileStore.js";
import type { ServerConfig } from "../startup/config.js";

export interface ServiceContext {
  config: ServerConfig;
  store: TempFileStore;
  models: ModelManager;
  orchestrator: InferenceOrchestrator;
  detectAccelerators: AcceleratorDetector;
}

export interface ServiceContextOverrides {
  loader?: PipelineLoader;
  detectAccelerators?: AcceleratorDetector;
}

export function createServiceContext(
  config: ServerConfig,
  overrides: ServiceContextOverrides = {},
): ServiceContext {
  const loader =
    overrides.loader ?? createWorkerPipelineLoader(config.pipelineModule);

  return {
    config,
    store: new TempFileStore(config.tempDir),
    models: new ModelManager(loader, { modelId: config.modelId }),
    orchestrator: new InferenceOrchestrator({
      timeoutMs: config.inferenceTimeoutMs,
    }),
    detectAccelerators: overrides.detectAccelerators ?? createAcceleratorDetector(),
  };
}

/**
 * Create the staging directory and clear files left by a previous process
 */
export async function prepareStaging(context: ServiceContext): Promise<void> {
  await context.store.ensure();
  const removed = await context.store.purge();
  if (removed > 0) {
    console.log(`[Staging] Removed ${removed} stale file(s) from ${context.store.dir}`);
  }
}
