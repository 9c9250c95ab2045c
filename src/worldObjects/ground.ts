import { groundColor } from "../forestColors";
import { GROUND_EXTENT_DIVISOR, GROUND_Z } from "../overrides";
import { fillFaceColors, type Solid } from "../utils/solid";

// Flat quad under the plot, two triangles fanning from corner 0
export function makeGroundQuad(plotSize: number): Solid {
  const a = plotSize / GROUND_EXTENT_DIVISOR;
  // prettier-ignore
  const positions = new Float64Array([
    -a, -a, GROUND_Z,
     a, -a, GROUND_Z,
     a,  a, GROUND_Z,
    -a,  a, GROUND_Z,
  ]);
  const indices = new Uint32Array([0, 1, 2, 0, 2, 3]);
  return { positions, indices, faceColors: fillFaceColors(2, groundColor) };
}
