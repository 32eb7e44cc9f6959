import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  GLB_MIME_TYPE,
  createMeshObject,
  exportToGLB,
  exportToGLBFile,
} from "../../src/inference/glb-exporter.js";
import {
  inspectGlb,
  inspectGlbFile,
  parseGlbJson,
} from "../helpers/glb-inspector.js";
import { tetrahedron } from "../helpers/fake-pipeline.js";

describe("GLB export", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "glb-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("exports the mesh without changing its vertex or face count", async () => {
    const result = await exportToGLB(createMeshObject(tetrahedron()));

    expect(result.mimeType).toBe(GLB_MIME_TYPE);
    expect(result.stats.vertexCount).toBe(4);
    expect(result.stats.triangleCount).toBe(4);
    expect(result.stats.fileSizeBytes).toBe(result.data.byteLength);

    const stats = inspectGlb(Buffer.from(result.data));
    expect(stats.version).toBe(2);
    expect(stats.meshCount).toBe(1);
    expect(stats.vertexCount).toBe(4);
    expect(stats.triangleCount).toBe(4);
  });

  it("writes a GLB file to the output path", async () => {
    const outputPath = path.join(dir, "output_r1.glb");
    const result = await exportToGLBFile(
      createMeshObject(tetrahedron()),
      outputPath,
    );

    const written = await fs.readFile(outputPath);
    expect(written.byteLength).toBe(result.data.byteLength);
    expect(written.toString("ascii", 0, 4)).toBe("glTF");

    const stats = await inspectGlbFile(outputPath);
    expect(stats.vertexCount).toBe(4);
    expect(stats.triangleCount).toBe(4);
    expect(stats.byteLength).toBe(written.byteLength);
  });
});

describe("parseGlbJson", () => {
  it("rejects a buffer shorter than the header", () => {
    expect(() => parseGlbJson(Buffer.alloc(4))).toThrow("GLB too short");
  });

  it("rejects a buffer with the wrong magic", () => {
    expect(() => parseGlbJson(Buffer.alloc(12))).toThrow(
      "Not a valid GLB file (bad magic)",
    );
  });

  it("rejects GLB version 1", () => {
    const header = Buffer.alloc(12);
    header.writeUInt32LE(0x46546c67, 0);
    header.writeUInt32LE(1, 4);
    header.writeUInt32LE(12, 8);
    expect(() => parseGlbJson(header)).toThrow("Unsupported GLB version: 1");
  });

  it("reports a file without a JSON chunk", () => {
    const header = Buffer.alloc(12);
    header.writeUInt32LE(0x46546c67, 0);
    header.writeUInt32LE(2, 4);
    header.writeUInt32LE(12, 8);
    expect(() => parseGlbJson(header)).toThrow("No JSON chunk found");
  });
});
