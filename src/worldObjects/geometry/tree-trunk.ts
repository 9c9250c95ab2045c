import { CylinderGeometry } from "three";
import { trunkColor } from "../../forestColors";
import { TRUNK_SEGMENTS } from "../../overrides";
import { toZUp } from "../../utils/geometry";
import { computeBounds, solidFromGeometry, translateSolid, type Solid } from "../../utils/solid";

// Capped low-poly cylinder with its base on Z=0 and its top at Z=height
export function makeTrunk(height: number, radius: number): Solid {
  const trunk = toZUp(new CylinderGeometry(radius, radius, height, TRUNK_SEGMENTS, 1, false));
  const solid = solidFromGeometry(trunk, trunkColor);
  // Anchor by measured extent rather than height / 2; float32 attributes round the half-height
  return translateSolid(solid, 0, 0, -computeBounds(solid).min[2]);
}
