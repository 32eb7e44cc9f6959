/**
 * GLB Export Utilities
 *
 * Turns raw model output into a three.js mesh and writes it as binary glTF.
 * The geometry is used exactly as the model produced it: no normals are
 * computed, no vertices merged, no faces repaired or dropped.
 */

import "../shared/polyfills.js";
import fs from "fs-extra";
import * as THREE from "three";
import { GLTFExporter } from "three/examples/jsm/exporters/GLTFExporter.js";
import type { MeshArrays } from "../model/types.js";

export const GLB_MIME_TYPE = "model/gltf-binary";

/**
 * Export result containing the GLB data
 */
export interface GLBExportResult {
  /** Raw GLB data */
  data: ArrayBuffer;
  /** MIME type */
  mimeType: string;
  stats: {
    vertexCount: number;
    triangleCount: number;
    fileSizeBytes: number;
  };
}

/**
 * Build an exportable mesh from flat vertex and index arrays
 */
export function createMeshObject(mesh: MeshArrays, name = "model"): THREE.Mesh {
  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute(
    "position",
    new THREE.BufferAttribute(mesh.positions, 3),
  );
  geometry.setIndex(new THREE.BufferAttribute(mesh.indices, 1));

  const object = new THREE.Mesh(geometry, new THREE.MeshStandardMaterial());
  object.name = name;
  return object;
}

function isArrayBuffer(value: unknown): value is ArrayBuffer {
  return Object.prototype.toString.call(value) === "[object ArrayBuffer]";
}

/**
 * Export a three.js object to GLB
 */
export async function exportToGLB(
  object: THREE.Object3D,
): Promise<GLBExportResult> {
  const exporter = new GLTFExporter();
  const stats = collectStats(object);

  try {
    const result = await exporter.parseAsync(object, {
      binary: true,
      includeCustomExtensions: false,
      animations: [],
    });
    if (!isArrayBuffer(result)) {
      throw new Error("GLTFExporter returned JSON instead of binary glTF");
    }

    return {
      data: result,
      mimeType: GLB_MIME_TYPE,
      stats: { ...stats, fileSizeBytes: result.byteLength },
    };
  } finally {
    disposeObject(object);
  }
}

/**
 * Export a three.js object to GLB and write it to a file
 */
export async function exportToGLBFile(
  object: THREE.Object3D,
  outputPath: string,
): Promise<GLBExportResult> {
  const result = await exportToGLB(object);
  await fs.writeFile(outputPath, Buffer.from(result.data));
  return result;
}

function collectStats(object: THREE.Object3D) {
  let vertexCount = 0;
  let triangleCount = 0;

  object.traverse((child) => {
    if (child instanceof THREE.Mesh) {
      const geometry: THREE.BufferGeometry = child.geometry;
      const position = geometry.getAttribute("position");
      vertexCount += position ? position.count : 0;
      triangleCount += geometry.index
        ? geometry.index.count / 3
        : (position?.count ?? 0) / 3;
    }
  });

  return { vertexCount, triangleCount };
}

function disposeObject(object: THREE.Object3D): void {
  object.traverse((child) => {
    if (child instanceof THREE.Mesh) {
      child.geometry.dispose();
      const materials: THREE.Material[] = Array.isArray(child.material)
        ? child.material
        : [child.material];
      for (const material of materials) {
        material.dispose();
      }
    }
  });
}
