/**
 * Pipeline worker entry
 *
 * Loaded by WorkerPipeline with `workerData: PipelineWorkerData`. Imports the
 * pipeline module, then serves generate requests as they arrive. The blocking
 * model call runs here, never on the HTTP thread.
 */

import { parentPort, workerData } from "worker_threads";
import {
  createWorkerHandler,
  importPipelineBackend,
  type PipelineWorkerData,
  type WorkerRequest,
} from "./worker-protocol.js";

function isWorkerData(value: unknown): value is PipelineWorkerData {
  return (
    typeof value === "object" &&
    value !== null &&
    "modulePath" in value &&
    typeof value.modulePath === "string" &&
    "modelId" in value &&
    typeof value.modelId === "string"
  );
}

const port = parentPort;
if (!port) {
  throw new Error("pipeline.worker must be started as a worker thread");
}
if (!isWorkerData(workerData)) {
  throw new Error("pipeline.worker started without pipeline worker data");
}
const data: PipelineWorkerData = workerData;

const handler = createWorkerHandler(
  {
    postMessage: (message, transfer) => port.postMessage(message, transfer),
  },
  () => importPipelineBackend(data),
);

port.on("message", (message: WorkerRequest) => {
  void handler.handle(message);
});

port.on("close", () => {
  void handler.dispose();
});

void handler.start();
