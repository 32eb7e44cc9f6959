/**
 * Model Resource Manager
 *
 * Holds the one model handle of the process. The first `acquire()` constructs
 * it through the loader; callers arriving while construction is in flight
 * share the same promise, so the heavyweight load happens once. A failed load
 * leaves the handle unset and the next `acquire()` tries again.
 *
 * Usage:
 * ```typescript
 * const models = new ModelManager(loader, { modelId: "tencent/Hunyuan3D-2" });
 * const pipeline = await models.acquire();
 * ```
 */

import { ModelLoadError, errorMessage } from "../errors.js";
import type {
  MeshPipeline,
  PipelineLoadOptions,
  PipelineLoader,
} from "./types.js";

export class ModelManager {
  private pipeline: MeshPipeline | null = null;
  private loading: Promise<MeshPipeline> | null = null;
  private constructions = 0;

  constructor(
    private readonly loader: PipelineLoader,
    private readonly options: PipelineLoadOptions,
  ) {}

  /** Whether a usable handle is currently held */
  get isLoaded(): boolean {
    return this.pipeline !== null && this.pipeline.healthy;
  }

  /** Number of times the loader has been invoked */
  get loadCount(): number {
    return this.constructions;
  }

  /**
   * Get the shared pipeline, constructing it on first use
   *
   * @throws ModelLoadError if construction fails
   */
  async acquire(): Promise<MeshPipeline> {
    if (this.pipeline) {
      if (this.pipeline.healthy) {
        return this.pipeline;
      }
      await this.discard("handle is no longer healthy");
    }

    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  /**
   * Dispose the current handle, if any. The next `acquire()` reloads.
   */
  async unload(): Promise<void> {
    if (this.loading) {
      // Let an in-flight construction settle so its handle is not leaked
      await this.loading.catch(() => undefined);
    }
    await this.discard("unload requested");
  }

  private async load(): Promise<MeshPipeline> {
    this.constructions++;
    console.log(`[Model] Loading pipeline ${this.options.modelId}...`);
    const startedAt = Date.now();

    let pipeline: MeshPipeline;
    try {
      pipeline = await this.loader(this.options);
    } catch (err) {
      console.error(`[Model] Failed to load pipeline: ${errorMessage(err)}`);
      throw err instanceof ModelLoadError
        ? err
        : new ModelLoadError(`Failed to load model: ${errorMessage(err)}`, err);
    }

    this.pipeline = pipeline;
    console.log(
      `[Model] ✅ Pipeline loaded in ${((Date.now() - startedAt) / 1000).toFixed(1)}s`,
    );
    return pipeline;
  }

  private async discard(reason: string): Promise<void> {
    const pipeline = this.pipeline;
    if (!pipeline) return;
    this.pipeline = null;

    console.warn(`[Model] Releasing pipeline (${reason})`);
    try {
      await pipeline.dispose();
    } catch (err) {
      console.error(`[Model] Error disposing pipeline: ${errorMessage(err)}`);
    }
  }
}
