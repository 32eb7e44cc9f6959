/**
 * Accelerator detection
 *
 * Reports the GPUs visible to the process for the health endpoint, by asking
 * `nvidia-smi` once and caching the answer. Any failure (no driver, no
 * binary, timeout) reads as "no accelerator".
 */

import { execFile } from "child_process";
import type { AcceleratorInfo } from "./types.js";

export type AcceleratorDetector = () => Promise<AcceleratorInfo>;

const NO_ACCELERATOR: AcceleratorInfo = { available: false, deviceCount: 0 };

/**
 * Count GPU lines in `nvidia-smi -L` output
 * (`GPU 0: NVIDIA A100-SXM4-40GB (UUID: GPU-...)`)
 */
export function parseDeviceList(output: string): AcceleratorInfo {
  const deviceCount = output
    .split("\n")
    .filter((line) => /^GPU \d+:/.test(line.trim())).length;
  return { available: deviceCount > 0, deviceCount };
}

function runNvidiaSmi(timeoutMs: number): Promise<AcceleratorInfo> {
  return new Promise((resolve) => {
    execFile(
      "nvidia-smi",
      ["-L"],
      { timeout: timeoutMs },
      (error, stdout) => {
        if (error) {
          resolve(NO_ACCELERATOR);
          return;
        }
        resolve(parseDeviceList(stdout));
      },
    );
  });
}

/**
 * Detector that runs once and serves the cached result afterwards
 */
export function createAcceleratorDetector(timeoutMs = 5000): AcceleratorDetector {
  let cached: Promise<AcceleratorInfo> | null = null;
  return () => {
    if (!cached) {
      cached = runNvidiaSmi(timeoutMs);
    }
    return cached;
  };
}
