/**
 * Temporary File Store
 *
 * Owns the staging directory. Every generate request gets an input and an
 * output path derived from its request id; both are removed when the request
 * ends, whatever the outcome.
 */

import fs from "fs-extra";
import path from "path";

export interface StagedPaths {
  inputPath: string;
  outputPath: string;
}

const STAGED_FILE_PATTERN = /^(input|output)_[0-9a-zA-Z-]+\.[0-9a-zA-Z]+$/;

export class TempFileStore {
  constructor(
    public readonly dir: string,
    private readonly outputExtension: string = "glb",
  ) {}

  /**
   * Create the staging directory if needed
   */
  async ensure(): Promise<void> {
    await fs.ensureDir(this.dir);
  }

  /**
   * Derive the request's input and output paths. Nothing is created on disk.
   */
  stage(requestId: string, inputExtension: string = "jpg"): StagedPaths {
    if (!/^[0-9a-zA-Z-]+$/.test(requestId)) {
      throw new Error(`Invalid request id: ${requestId}`);
    }
    return {
      inputPath: path.join(this.dir, `input_${requestId}.${inputExtension}`),
      outputPath: path.join(
        this.dir,
        `output_${requestId}.${this.outputExtension}`,
      ),
    };
  }

  async write(filePath: string, content: Buffer): Promise<void> {
    await fs.writeFile(filePath, content);
  }

  /**
   * Delete a staged file. Idempotent: a missing file is not an error.
   *
   * @returns whether a file was removed
   */
  async cleanup(filePath: string): Promise<boolean> {
    const existed = await fs.pathExists(filePath);
    await fs.remove(filePath);
    if (existed) {
      console.log(`[Staging] Cleaned up: ${path.basename(filePath)}`);
    }
    return existed;
  }

  /**
   * Remove staged files left behind by an earlier process
   *
   * @returns number of files removed
   */
  async purge(): Promise<number> {
    const entries = await fs.readdir(this.dir);
    const stale = entries.filter((entry) => STAGED_FILE_PATTERN.test(entry));
    await Promise.all(
      stale.map((entry) => fs.remove(path.join(this.dir, entry))),
    );
    return stale.length;
  }
}
