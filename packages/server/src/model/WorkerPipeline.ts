/**
 * Worker-hosted pipeline handle
 *
 * Main-thread proxy for a pipeline module running in a `worker_threads`
 * worker. Calls are queued here and posted to the worker one at a time, so a
 * call's `onStart` fires when the model actually begins on it. The worker
 * transfers result arrays back without copying.
 *
 * A running model call cannot be interrupted, so aborting the running call
 * terminates the worker. Calls still queued behind it are rejected with
 * PipelineInterruptedError; the handle reports `healthy === false` and the
 * model manager loads a fresh one on the next acquire. Aborting a queued call
 * only removes it from the queue.
 *
 * Usage:
 * ```typescript
 * const pipeline = await WorkerPipeline.start({
 *   modulePath: "/opt/models/hunyuan.mjs",
 *   modelId: "tencent/Hunyuan3D-2",
 * });
 * const meshes = await pipeline.generate("/tmp/input.png", { signal });
 * ```
 */

import { createRequire } from "module";
import { Worker } from "worker_threads";
import {
  GenerationError,
  ModelLoadError,
  PipelineInterruptedError,
} from "../errors.js";
import type {
  GenerateOptions,
  MeshArrays,
  MeshPipeline,
  PipelineLoader,
} from "./types.js";
import type {
  GenerateRequestMessage,
  PipelineWorkerData,
  WorkerRequest,
  WorkerResponse,
} from "./worker-protocol.js";

/**
 * The part of `worker_threads.Worker` the pipeline handle uses
 */
export interface PipelineWorker {
  postMessage(message: WorkerRequest): void;
  terminate(): Promise<number>;
  on(event: "message", listener: (message: WorkerResponse) => void): this;
  on(event: "error", listener: (err: Error) => void): this;
  on(event: "exit", listener: (code: number) => void): this;
  once(event: "error", listener: (err: Error) => void): this;
  once(event: "exit", listener: (code: number) => void): this;
  off(event: "message", listener: (message: WorkerResponse) => void): this;
  off(event: "error", listener: (err: Error) => void): this;
  off(event: "exit", listener: (code: number) => void): this;
}

export type SpawnPipelineWorker = (data: PipelineWorkerData) => PipelineWorker;

interface QueuedCall {
  id: number;
  imagePath: string;
  onStart?: () => void;
  resolve: (meshes: MeshArrays[]) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

/**
 * Resolve the worker entry next to this module
 *
 * A built tree loads pipeline.worker.js. Running from .ts sources, the worker
 * does not inherit tsx from the main thread, so it starts from a CommonJS
 * bootstrap that registers tsx and then imports pipeline.worker.ts.
 */
function workerEntry(): { entry: string | URL; eval: boolean } {
  if (!import.meta.url.endsWith(".ts")) {
    return {
      entry: new URL("./pipeline.worker.js", import.meta.url),
      eval: false,
    };
  }

  const tsxApi = createRequire(import.meta.url).resolve("tsx/esm/api");
  const source = new URL("./pipeline.worker.ts", import.meta.url).href;
  return {
    entry: [
      `const { register } = require(${JSON.stringify(tsxApi)});`,
      "register();",
      `import(${JSON.stringify(source)});`,
    ].join("\n"),
    eval: true,
  };
}

export const spawnThreadWorker: SpawnPipelineWorker = (data) => {
  const { entry, eval: isEval } = workerEntry();
  return new Worker(entry, { workerData: data, eval: isEval });
};

export class WorkerPipeline implements MeshPipeline {
  private queue: QueuedCall[] = [];
  private active: QueuedCall | null = null;
  private nextId = 1;
  private alive = true;

  private constructor(private readonly worker: PipelineWorker) {
    worker.on("message", (message: WorkerResponse) => this.onMessage(message));
    worker.on("error", (err) => this.fail(err));
    worker.on("exit", (code) =>
      this.fail(new Error(`Pipeline worker exited with code ${code}`)),
    );
  }

  get healthy(): boolean {
    return this.alive;
  }

  /** Calls waiting behind the running one */
  get queued(): number {
    return this.queue.length;
  }

  /**
   * Spawn the worker and wait until the pipeline module reports ready
   *
   * @throws ModelLoadError if the module fails to load or the worker dies
   */
  static start(
    data: PipelineWorkerData,
    spawn: SpawnPipelineWorker = spawnThreadWorker,
  ): Promise<WorkerPipeline> {
    const worker = spawn(data);

    return new Promise((resolve, reject) => {
      const settle = (error?: Error) => {
        worker.off("message", onMessage);
        worker.off("error", onError);
        worker.off("exit", onExit);
        if (error) {
          void worker.terminate();
          reject(error);
        } else {
          resolve(new WorkerPipeline(worker));
        }
      };
      const onMessage = (message: WorkerResponse) => {
        if (message.type === "ready") settle();
        else if (message.type === "load-error") {
          settle(new ModelLoadError(`Failed to load model: ${message.message}`));
        }
      };
      const onError = (err: Error) =>
        settle(new ModelLoadError(`Failed to load model: ${err.message}`, err));
      const onExit = (code: number) =>
        settle(
          new ModelLoadError(
            `Failed to load model: worker exited with code ${code}`,
          ),
        );

      worker.on("message", onMessage);
      worker.once("error", onError);
      worker.once("exit", onExit);
    });
  }

  generate(
    imagePath: string,
    options: GenerateOptions = {},
  ): Promise<MeshArrays[]> {
    const { signal, onStart } = options;
    if (!this.alive) {
      return Promise.reject(
        new GenerationError("Pipeline worker is not running"),
      );
    }
    if (signal?.aborted) {
      return Promise.reject(toError(signal.reason));
    }

    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      const onAbort = () => this.abort(id, toError(signal?.reason));
      signal?.addEventListener("abort", onAbort, { once: true });

      this.queue.push({
        id,
        imagePath,
        onStart,
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener("abort", onAbort),
      });
      this.dispatch();
    });
  }

  async dispose(): Promise<void> {
    this.alive = false;
    const error = new GenerationError("Pipeline disposed");
    this.rejectAll(error, error);
    await this.worker.terminate();
  }

  private dispatch(): void {
    if (!this.alive || this.active) return;
    const call = this.queue.shift();
    if (!call) return;

    this.active = call;
    call.onStart?.();
    const request: GenerateRequestMessage = {
      type: "generate",
      id: call.id,
      imagePath: call.imagePath,
    };
    this.worker.postMessage(request);
  }

  private abort(id: number, reason: Error): void {
    const running = this.active;
    if (running && running.id === id) {
      this.active = null;
      running.reject(reason);
      // The model call is still running inside the worker
      this.fail(new GenerationError("Pipeline worker terminated after abort"));
      return;
    }

    const index = this.queue.findIndex((call) => call.id === id);
    if (index === -1) return;
    const [call] = this.queue.splice(index, 1);
    call.reject(reason);
  }

  private onMessage(message: WorkerResponse): void {
    if (message.type !== "result" && message.type !== "error") return;

    const call = this.active;
    if (!call || call.id !== message.id) return;
    this.active = null;
    call.cleanup();

    if (message.type === "result") {
      call.resolve(message.meshes);
    } else {
      call.reject(new Error(message.message));
    }
    this.dispatch();
  }

  private fail(error: Error): void {
    if (!this.alive) return;
    this.alive = false;
    console.error(`[Model] Pipeline worker failed: ${error.message}`);
    this.rejectAll(error, new PipelineInterruptedError());
    void this.worker.terminate();
  }

  /**
   * Reject the running call with `runningError` and every queued call with
   * `queuedError`
   */
  private rejectAll(runningError: Error, queuedError: Error): void {
    const running = this.active;
    this.active = null;
    if (running) {
      running.cleanup();
      running.reject(runningError);
    }
    for (const call of this.queue.splice(0)) {
      call.cleanup();
      call.reject(queuedError);
    }
  }
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

/**
 * Loader that hosts the configured pipeline module in a worker thread
 */
export function createWorkerPipelineLoader(
  modulePath: string | undefined,
  spawn: SpawnPipelineWorker = spawnThreadWorker,
): PipelineLoader {
  return async ({ modelId }) => {
    if (!modulePath) {
      throw new ModelLoadError(
        "Failed to load model: PIPELINE_MODULE is not configured",
      );
    }
    return WorkerPipeline.start({ modulePath, modelId }, spawn);
  };
}
