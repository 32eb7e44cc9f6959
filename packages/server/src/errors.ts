/**
 * Service Errors
 *
 * Typed error taxonomy for the generate flow. Each error carries a stable
 * code and the HTTP status the API layer answers with.
 */

export const ERROR_CODES = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  MODEL_LOAD_ERROR: "MODEL_LOAD_ERROR",
  GENERATION_ERROR: "GENERATION_ERROR",
  INFERENCE_TIMEOUT: "INFERENCE_TIMEOUT",
  PIPELINE_INTERRUPTED: "PIPELINE_INTERRUPTED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = "ServiceError";
  }
}

/**
 * Client fault: bad or missing filename, disallowed extension, oversized upload.
 */
export class ValidationError extends ServiceError {
  constructor(message: string) {
    super(message, ERROR_CODES.VALIDATION_ERROR, 400);
    this.name = "ValidationError";
  }
}

/**
 * Pipeline construction failed. The model handle stays unset so the next
 * request retries the load.
 */
export class ModelLoadError extends ServiceError {
  constructor(
    message: string,
    public readonly reason?: unknown,
  ) {
    super(message, ERROR_CODES.MODEL_LOAD_ERROR, 500);
    this.name = "ModelLoadError";
  }
}

/**
 * The model ran but produced no usable output.
 */
export class GenerationError extends ServiceError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.GENERATION_ERROR) {
    super(message, code, 500);
    this.name = "GenerationError";
  }
}

export class InferenceTimeoutError extends GenerationError {
  constructor(public readonly timeoutMs: number) {
    super(
      `Inference timed out after ${timeoutMs}ms`,
      ERROR_CODES.INFERENCE_TIMEOUT,
    );
    this.name = "InferenceTimeoutError";
  }
}

/**
 * The request was still queued when the pipeline was restarted (another
 * request timed out or the worker crashed). The model never saw it, so the
 * client may simply retry.
 */
export class PipelineInterruptedError extends ServiceError {
  constructor(message = "Pipeline restarted before the request started") {
    super(message, ERROR_CODES.PIPELINE_INTERRUPTED, 503);
    this.name = "PipelineInterruptedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
