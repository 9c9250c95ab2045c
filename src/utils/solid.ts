import { BufferGeometry } from "three";
import * as BufferGeometryUtils from "three/addons/utils/BufferGeometryUtils.js";
import { GeometryInvariantError } from "../errors";
import type { RGBA } from "../forestColors";

export type Vec3 = [number, number, number];

// Self-contained triangle mesh, Z-up, one RGBA color per triangle
export interface Solid {
  positions: Float64Array;
  indices: Uint32Array;
  faceColors: Uint8Array;
}

export interface Bounds {
  min: Vec3;
  max: Vec3;
}

export function vertexCount(solid: Solid): number {
  return solid.positions.length / 3;
}

export function triangleCount(solid: Solid): number {
  return solid.indices.length / 3;
}

// Always computed from the current positions
export function computeBounds(solid: Solid): Bounds {
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  const pos = solid.positions;
  for (let i = 0; i < pos.length; i += 3) {
    for (let axis = 0; axis < 3; axis++) {
      const v = pos[i + axis];
      if (v < min[axis]) min[axis] = v;
      if (v > max[axis]) max[axis] = v;
    }
  }
  return { min, max };
}

// Mutates in place and returns the same solid
export function translateSolid(solid: Solid, dx: number, dy: number, dz: number): Solid {
  const pos = solid.positions;
  for (let i = 0; i < pos.length; i += 3) {
    pos[i] += dx;
    pos[i + 1] += dy;
    pos[i + 2] += dz;
  }
  return solid;
}

export function assertSolidValid(solid: Solid, label = "solid") {
  const count = vertexCount(solid);
  if (!Number.isInteger(count) || solid.indices.length % 3 !== 0) {
    throw new GeometryInvariantError(`${label}: position or index array is not a multiple of 3`);
  }
  if (solid.faceColors.length !== (solid.indices.length / 3) * 4) {
    throw new GeometryInvariantError(
      `${label}: ${solid.faceColors.length / 4} colors for ${solid.indices.length / 3} triangles`
    );
  }
  for (let i = 0; i < solid.indices.length; i++) {
    if (solid.indices[i] >= count) {
      throw new GeometryInvariantError(
        `${label}: index ${solid.indices[i]} out of range for ${count} vertices`
      );
    }
  }
}

// Concatenate solids into a new one; indices are shifted by the running vertex count
export function mergeSolids(solids: readonly Solid[]): Solid {
  let totalPositions = 0;
  let totalIndices = 0;
  let totalColors = 0;
  solids.forEach((s, i) => {
    assertSolidValid(s, `merge input ${i}`);
    totalPositions += s.positions.length;
    totalIndices += s.indices.length;
    totalColors += s.faceColors.length;
  });

  const positions = new Float64Array(totalPositions);
  const indices = new Uint32Array(totalIndices);
  const faceColors = new Uint8Array(totalColors);

  let vertexOffset = 0;
  let positionOffset = 0;
  let indexOffset = 0;
  let colorOffset = 0;
  for (const s of solids) {
    positions.set(s.positions, positionOffset);
    for (let i = 0; i < s.indices.length; i++) {
      indices[indexOffset + i] = s.indices[i] + vertexOffset;
    }
    faceColors.set(s.faceColors, colorOffset);

    vertexOffset += vertexCount(s);
    positionOffset += s.positions.length;
    indexOffset += s.indices.length;
    colorOffset += s.faceColors.length;
  }

  return { positions, indices, faceColors };
}

export function fillFaceColors(triangles: number, color: RGBA): Uint8Array {
  const colors = new Uint8Array(triangles * 4);
  for (let i = 0; i < triangles; i++) {
    colors.set(color, i * 4);
  }
  return colors;
}

// Weld a three.js geometry by position and copy it out as a flat-colored Solid.
// The input geometry is disposed.
export function solidFromGeometry(geometry: BufferGeometry, color: RGBA): Solid {
  // Normals and UVs split vertices along seams; only positions matter here
  geometry.deleteAttribute("normal");
  geometry.deleteAttribute("uv");
  const welded = BufferGeometryUtils.mergeVertices(geometry);
  geometry.dispose();

  const attribPos = welded.getAttribute("position");
  const index = welded.getIndex();
  if (!index) {
    welded.dispose();
    throw new GeometryInvariantError("welded geometry has no index");
  }

  const positions = new Float64Array(attribPos.count * 3);
  for (let i = 0; i < attribPos.count; i++) {
    positions[i * 3 + 0] = attribPos.getX(i);
    positions[i * 3 + 1] = attribPos.getY(i);
    positions[i * 3 + 2] = attribPos.getZ(i);
  }
  const indices = new Uint32Array(index.count);
  for (let i = 0; i < index.count; i++) {
    indices[i] = index.getX(i);
  }
  welded.dispose();

  return { positions, indices, faceColors: fillFaceColors(indices.length / 3, color) };
}
