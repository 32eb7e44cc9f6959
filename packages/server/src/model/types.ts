/**
 * Model Types
 *
 * Contracts between the service and the generative pipeline it hosts.
 */

/**
 * Vertex or face data as a backend hands it over: flat (`[x0, y0, z0, x1, ...]`,
 * typed arrays included) or as a list of triples (`[[x0, y0, z0], ...]`)
 */
export type MeshData = ArrayLike<number> | ReadonlyArray<ArrayLike<number>>;

/**
 * Candidate mesh produced by the model
 */
export interface RawMesh {
  vertices: MeshData;
  faces: MeshData;
}

/**
 * Flat typed-array form used across the worker boundary and by the exporter
 */
export interface MeshArrays {
  /** x, y, z per vertex */
  positions: Float32Array;
  /** three vertex indices per triangle */
  indices: Uint32Array;
}

export interface GenerateOptions {
  /** Aborting rejects the call */
  signal?: AbortSignal;
  /**
   * Called when the model starts on this call. Calls wait their turn behind
   * earlier ones; time spent waiting is not part of the call.
   */
  onStart?: () => void;
}

/**
 * The loaded pipeline (the process-wide model handle)
 */
export interface MeshPipeline {
  /**
   * Run the model on an image file. Candidates are ordered by the model.
   */
  generate(imagePath: string, options?: GenerateOptions): Promise<MeshArrays[]>;

  /** False once the handle can no longer serve requests */
  readonly healthy: boolean;

  /** Release the pipeline's resources */
  dispose(): Promise<void>;
}

export interface PipelineLoadOptions {
  modelId: string;
}

/**
 * Constructs the model handle. Called at most once at a time.
 */
export type PipelineLoader = (
  options: PipelineLoadOptions,
) => Promise<MeshPipeline>;

/**
 * What a pipeline module returns from `loadPipeline`
 */
export interface PipelineBackend {
  generate(imagePath: string): RawMesh[] | Promise<RawMesh[]>;
  dispose?(): void | Promise<void>;
}

/**
 * Shape of a pipeline module loaded inside the worker
 */
export interface PipelineModule {
  loadPipeline(options: PipelineLoadOptions): Promise<PipelineBackend>;
}

export interface AcceleratorInfo {
  available: boolean;
  deviceCount: number;
}
