/**
 * Inference Orchestrator
 *
 * Runs one image through the pipeline and writes the first candidate mesh to
 * the output path as GLB. Errors propagate to the caller untouched; the
 * caller has already deferred cleanup of both staged paths before calling.
 */

import { GenerationError, InferenceTimeoutError } from "../errors.js";
import type { MeshArrays, MeshPipeline } from "../model/types.js";
import { createMeshObject, exportToGLBFile } from "./glb-exporter.js";

export interface InferenceOptions {
  /** Abort the model call once it has run this many milliseconds */
  timeoutMs: number;
}

export class InferenceOrchestrator {
  constructor(private readonly options: InferenceOptions) {}

  /**
   * Generate a mesh from `inputPath` and export it to `outputPath`
   *
   * @returns the output path
   * @throws GenerationError if the model returns no candidates
   * @throws InferenceTimeoutError if the model call exceeds the timeout
   * @throws PipelineInterruptedError if the pipeline restarted before the
   *   call started
   */
  async run(
    inputPath: string,
    outputPath: string,
    pipeline: MeshPipeline,
  ): Promise<string> {
    const candidates = await this.invoke(pipeline, inputPath);
    if (candidates.length === 0) {
      throw new GenerationError("Failed to generate 3D model");
    }

    // Only the first candidate is exported; any others are discarded
    const mesh = candidates[0];

    console.log("[Inference] Converting to GLB...");
    const { stats } = await exportToGLBFile(createMeshObject(mesh), outputPath);
    console.log(
      `[Inference] Model saved: ${stats.vertexCount} vertices, ${stats.triangleCount} faces, ${stats.fileSizeBytes} bytes`,
    );

    return outputPath;
  }

  /**
   * Call the pipeline with a deadline that starts when the model begins on
   * this call, not while it waits behind other requests
   */
  private async invoke(
    pipeline: MeshPipeline,
    inputPath: string,
  ): Promise<MeshArrays[]> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let startedAt = Date.now();
    let cancelDeadline = () => {};

    const onStart = () => {
      console.log("[Inference] Generating 3D model...");
      startedAt = Date.now();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      cancelDeadline = () => clearTimeout(timer);
    };

    try {
      const candidates = await pipeline.generate(inputPath, {
        signal: controller.signal,
        onStart,
      });
      console.log(
        `[Inference] Pipeline returned ${candidates.length} candidate(s) in ${Date.now() - startedAt}ms`,
      );
      return candidates;
    } catch (err) {
      if (controller.signal.aborted) {
        throw new InferenceTimeoutError(timeoutMs);
      }
      throw err;
    } finally {
      cancelDeadline();
    }
  }
}
