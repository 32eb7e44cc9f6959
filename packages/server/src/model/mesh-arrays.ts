import type { MeshArrays, MeshData, RawMesh } from "./types.js";

function isNested(data: MeshData): data is ReadonlyArray<ArrayLike<number>> {
  return data.length > 0 && typeof data[0] !== "number";
}

function flatten(data: MeshData, label: string): number[] | ArrayLike<number> {
  if (!isNested(data)) {
    if (data.length % 3 !== 0) {
      throw new Error(
        `${label} length ${data.length} is not a multiple of 3`,
      );
    }
    return data;
  }

  const flat: number[] = [];
  for (let i = 0; i < data.length; i++) {
    const entry = data[i];
    if (entry.length !== 3) {
      throw new Error(`${label}[${i}] has ${entry.length} components, expected 3`);
    }
    flat.push(entry[0], entry[1], entry[2]);
  }
  return flat;
}

/**
 * Copy a candidate mesh into flat typed arrays. Values are taken as they
 * are: no merging, reordering or repair.
 */
export function toMeshArrays(mesh: RawMesh): MeshArrays {
  const positions = Float32Array.from(flatten(mesh.vertices, "vertices"));
  const indices = Uint32Array.from(flatten(mesh.faces, "faces"));
  return { positions, indices };
}
