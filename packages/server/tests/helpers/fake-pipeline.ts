/**
 * In-process pipeline stand-ins
 *
 * FakePipeline implements the model handle without a worker thread;
 * FakeWorker plays the worker side of the message protocol on the same
 * event loop.
 */

import { EventEmitter } from "events";
import fs from "fs-extra";
import type { PipelineWorker } from "../../src/model/WorkerPipeline.js";
import type {
  GenerateOptions,
  MeshArrays,
  MeshPipeline,
  PipelineBackend,
} from "../../src/model/types.js";
import {
  createWorkerHandler,
  type WorkerRequest,
  type WorkerResponse,
} from "../../src/model/worker-protocol.js";

/** Four vertices, four outward-facing triangles */
export function tetrahedron(): MeshArrays {
  return {
    positions: new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1]),
    indices: new Uint32Array([0, 2, 1, 0, 1, 3, 0, 3, 2, 1, 2, 3]),
  };
}

export interface GenerateCall {
  imagePath: string;
  /** Whether the staged input existed when the model was called */
  inputExisted: boolean;
  signal?: AbortSignal;
}

type GenerateImpl = (
  imagePath: string,
  signal?: AbortSignal,
) => Promise<MeshArrays[]>;

export class FakePipeline implements MeshPipeline {
  healthy = true;
  disposed = false;
  readonly calls: GenerateCall[] = [];

  constructor(
    private readonly impl: GenerateImpl = async () => [tetrahedron()],
  ) {}

  async generate(
    imagePath: string,
    options: GenerateOptions = {},
  ): Promise<MeshArrays[]> {
    this.calls.push({
      imagePath,
      inputExisted: await fs.pathExists(imagePath),
      signal: options.signal,
    });
    options.onStart?.();
    return this.impl(imagePath, options.signal);
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    this.healthy = false;
  }
}

/**
 * A promise opened from outside, for holding a fake model call in place
 */
export function gate<T = void>() {
  let open: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

/**
 * Settles once `signal` aborts, rejecting with its reason
 */
export function untilAborted(signal?: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    signal?.addEventListener("abort", () => reject(signal.reason), {
      once: true,
    });
  });
}

/**
 * Worker double driven by the real worker-side handler
 */
export class FakeWorker extends EventEmitter implements PipelineWorker {
  readonly requests: WorkerRequest[] = [];
  terminated = false;
  private readonly handler: ReturnType<typeof createWorkerHandler>;

  constructor(loadBackend: () => Promise<PipelineBackend>) {
    super();
    this.handler = createWorkerHandler(
      {
        postMessage: (message: WorkerResponse) => {
          setImmediate(() => this.emit("message", message));
        },
      },
      loadBackend,
    );
    void this.handler.start();
  }

  postMessage(message: WorkerRequest): void {
    this.requests.push(message);
    void this.handler.handle(message);
  }

  async terminate(): Promise<number> {
    if (!this.terminated) {
      this.terminated = true;
      await this.handler.dispose();
      setImmediate(() => this.emit("exit", 1));
    }
    return 1;
  }
}
