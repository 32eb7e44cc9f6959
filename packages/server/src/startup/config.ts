/**
 * Configuration Module - Environment and path resolution
 *
 * Centralizes environment variable loading and path resolution for the server.
 *
 * Responsibilities:
 * - Load environment variables from .env files
 * - Resolve the staging directory
 * - Parse the upload allow-list, size ceiling and inference timeout
 * - Export typed configuration object
 *
 * Usage:
 * ```typescript
 * const config = loadConfig();
 * console.log(config.port, config.tempDir, config.modelId);
 * ```
 */

import dotenv from "dotenv";
import path from "path";

export const DEFAULT_SUPPORTED_FORMATS = [
  "jpg",
  "jpeg",
  "png",
  "webp",
  "bmp",
] as const;

export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

/**
 * Server configuration interface
 */
export interface ServerConfig {
  /** Server HTTP port */
  port: number;

  /** Bind address */
  host: string;

  /** Staging directory for per-request input/output files */
  tempDir: string;

  /** Lowercase image extensions accepted by /generate-3d */
  supportedFormats: string[];

  /** Upload ceiling in bytes */
  maxUploadBytes: number;

  /** Pretrained model identifier handed to the pipeline module */
  modelId: string;

  /** Module specifier of the pipeline module loaded inside the worker */
  pipelineModule?: string;

  /** Per-request inference timeout in milliseconds */
  inferenceTimeoutMs: number;

  /** Allowed CORS origins (`*` allows any) */
  corsOrigins: string[];

  /** Node environment */
  nodeEnv: string;
}

type Env = Record<string, string | undefined>;

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseList(value: string | undefined, fallback: readonly string[]) {
  if (!value) return [...fallback];
  return value
    .split(",")
    .map((entry) => entry.trim().toLowerCase().replace(/^\./, ""))
    .filter((entry) => entry.length > 0);
}

/**
 * Build a configuration from an environment map
 *
 * Pure counterpart of {@link loadConfig}; tests call it with a literal env.
 */
export function resolveConfig(
  env: Env,
  cwd: string = process.cwd(),
): ServerConfig {
  const TEMP_DIR = env["TEMP_DIR"] || "./temp_3d";
  const PIPELINE_MODULE = env["PIPELINE_MODULE"];

  return {
    port: parseInteger(env["PORT"], 8000),
    host: env["HOST"] || "0.0.0.0",
    tempDir: path.isAbsolute(TEMP_DIR) ? TEMP_DIR : path.join(cwd, TEMP_DIR),
    supportedFormats: parseList(
      env["SUPPORTED_FORMATS"],
      DEFAULT_SUPPORTED_FORMATS,
    ),
    maxUploadBytes: parseInteger(
      env["MAX_UPLOAD_BYTES"],
      DEFAULT_MAX_UPLOAD_BYTES,
    ),
    modelId: env["MODEL_ID"] || "tencent/Hunyuan3D-2",
    // Relative file paths resolve against the working directory; bare
    // specifiers are left for the worker's import() to resolve as packages
    pipelineModule:
      PIPELINE_MODULE && PIPELINE_MODULE.startsWith(".")
        ? path.join(cwd, PIPELINE_MODULE)
        : PIPELINE_MODULE || undefined,
    inferenceTimeoutMs: parseInteger(env["INFERENCE_TIMEOUT_MS"], 600_000),
    corsOrigins: (env["CORS_ORIGIN"] || "*")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    nodeEnv: env["NODE_ENV"] || "development",
  };
}

/**
 * Load and validate server configuration
 *
 * Loads environment variables from the package and workspace root `.env`
 * files, then resolves them against the working directory.
 *
 * @throws Error if a numeric variable is malformed
 */
export function loadConfig(): ServerConfig {
  // Priority: local .env > workspace root .env
  dotenv.config({ path: ".env" });
  dotenv.config({ path: "../../.env" });

  return resolveConfig(process.env);
}
