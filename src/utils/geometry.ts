import { BufferGeometry, Matrix4 } from "three";
import { GeometryInvariantError } from "../errors";
import { OVERLAP_AMOUNT } from "../overrides";
import { computeBounds, translateSolid, type Solid } from "./solid";

// three.js primitives are built Y-up; (x, y, z) -> (x, -z, y) makes their axis Z.
// Written out by hand so the swap is exact (no cos(PI/2) residue).
const yUpToZUp = new Matrix4().set(1, 0, 0, 0, 0, 0, -1, 0, 0, 1, 0, 0, 0, 0, 0, 1);
const zUpToYUp = yUpToZUp.clone().invert();

export function toZUp<T extends BufferGeometry>(geom: T): T {
  geom.applyMatrix4(yUpToZUp);
  return geom;
}

export function toYUp<T extends BufferGeometry>(geom: T): T {
  geom.applyMatrix4(zUpToYUp);
  return geom;
}

// Move `top` vertically so its lowest point sits `overlap` below the highest point of `bottom`.
// Both extents are read from current positions, so this chains: trunk -> crown -> crown.
// Mutates and returns `top`; X and Y are untouched.
export function stackOnTop(bottom: Solid, top: Solid, overlap = OVERLAP_AMOUNT): Solid {
  if (!(overlap >= 0)) {
    throw new GeometryInvariantError(`stack overlap must be >= 0, got ${overlap}`);
  }
  const bottomTopZ = computeBounds(bottom).max[2];
  const topBottomZ = computeBounds(top).min[2];
  const shiftZ = bottomTopZ - overlap - topBottomZ;
  return translateSolid(top, 0, 0, shiftZ);
}
