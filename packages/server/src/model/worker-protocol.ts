/**
 * Pipeline Worker Protocol
 *
 * Messages exchanged between the main thread and the worker that hosts the
 * pipeline module, plus the worker-side handler. The handler is independent
 * of `worker_threads` so it can run in-process as well.
 *
 * ```
 * main ──────────────────────────────► worker
 *        { type: "generate", id, imagePath }
 * main ◄────────────────────────────── worker
 *        { type: "ready" } | { type: "load-error", message }
 *        { type: "result", id, meshes } | { type: "error", id, message }
 * ```
 */

import path from "path";
import { pathToFileURL } from "url";
import { toMeshArrays } from "./mesh-arrays.js";
import type {
  MeshArrays,
  PipelineBackend,
  PipelineLoadOptions,
  PipelineModule,
} from "./types.js";

export interface PipelineWorkerData extends PipelineLoadOptions {
  /** Module specifier or absolute path of the pipeline module */
  modulePath: string;
}

export interface GenerateRequestMessage {
  type: "generate";
  id: number;
  imagePath: string;
}

export type WorkerRequest = GenerateRequestMessage;

export type WorkerResponse =
  | { type: "ready" }
  | { type: "load-error"; message: string }
  | { type: "result"; id: number; meshes: MeshArrays[] }
  | { type: "error"; id: number; message: string };

export interface WorkerPort {
  postMessage(message: WorkerResponse, transfer?: ArrayBuffer[]): void;
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isPipelineModule(value: unknown): value is PipelineModule {
  return (
    typeof value === "object" &&
    value !== null &&
    "loadPipeline" in value &&
    typeof value.loadPipeline === "function"
  );
}

/**
 * Import a pipeline module and construct its backend
 */
export async function importPipelineBackend(
  data: PipelineWorkerData,
  importer: (specifier: string) => Promise<unknown> = (specifier) =>
    import(specifier),
): Promise<PipelineBackend> {
  const specifier = path.isAbsolute(data.modulePath)
    ? pathToFileURL(data.modulePath).href
    : data.modulePath;
  const mod = await importer(specifier);
  if (!isPipelineModule(mod)) {
    throw new Error(
      `Pipeline module ${data.modulePath} does not export loadPipeline()`,
    );
  }
  return mod.loadPipeline({ modelId: data.modelId });
}

/**
 * Worker-side message handler
 *
 * `start()` constructs the backend and reports `ready` or `load-error`;
 * `handle()` answers generate requests. Result arrays are listed as
 * transferables so they move to the main thread without copying.
 */
export function createWorkerHandler(
  port: WorkerPort,
  loadBackend: () => Promise<PipelineBackend>,
) {
  let backend: PipelineBackend | null = null;

  return {
    async start(): Promise<void> {
      try {
        backend = await loadBackend();
        port.postMessage({ type: "ready" });
      } catch (err) {
        port.postMessage({ type: "load-error", message: messageOf(err) });
      }
    },

    async handle(message: WorkerRequest): Promise<void> {
      if (!backend) {
        port.postMessage({
          type: "error",
          id: message.id,
          message: "Pipeline is not loaded",
        });
        return;
      }

      try {
        const raw = await backend.generate(message.imagePath);
        const meshes = (raw ?? []).map(toMeshArrays);
        const transfer: ArrayBuffer[] = [];
        for (const mesh of meshes) {
          for (const buffer of [mesh.positions.buffer, mesh.indices.buffer]) {
            if (buffer instanceof ArrayBuffer) transfer.push(buffer);
          }
        }
        port.postMessage({ type: "result", id: message.id, meshes }, transfer);
      } catch (err) {
        port.postMessage({
          type: "error",
          id: message.id,
          message: messageOf(err),
        });
      }
    },

    async dispose(): Promise<void> {
      await backend?.dispose?.();
      backend = null;
    },
  };
}
