import { PRNG } from "../src/utils/PRNG";
import type { Solid } from "../src/utils/solid";

// Replays `values` in order, then returns `fallback` forever
export function scriptedRng(values: number[], fallback = 0.5): PRNG {
  let i = 0;
  return PRNG.fromSource(() => (i < values.length ? values[i++] : fallback));
}

// Unit tetrahedron lifted so its lowest point is at z0
export function tetra(z0: number, x = 0, y = 0): Solid {
  return {
    positions: new Float64Array([x, y, z0, x + 1, y, z0, x, y + 1, z0, x, y, z0 + 1]),
    indices: new Uint32Array([0, 1, 2, 0, 1, 3, 0, 2, 3, 1, 2, 3]),
    faceColors: new Uint8Array(16).fill(255),
  };
}

export function zValues(solid: Solid): number[] {
  const zs: number[] = [];
  for (let i = 2; i < solid.positions.length; i += 3) zs.push(solid.positions[i]);
  return zs;
}
