import { ConeGeometry, IcosahedronGeometry } from "three";
import type { RGB } from "../../forestColors";
import { CROWN_SUBDIVISIONS } from "../../overrides";
import { toZUp } from "../../utils/geometry";
import { PRNG } from "../../utils/PRNG";
import { solidFromGeometry, type Solid } from "../../utils/solid";
import { randomizeColor } from "./randomizeColor";

// Faceted sphere centered on the origin. Each subdivision level splits every edge in two,
// which is three.js detail 2^level - 1 (level 1: 80 triangles, 42 vertices).
export function makeRoundCrown(radius: number, baseColor: RGB, rng: PRNG): Solid {
  const detail = Math.pow(2, CROWN_SUBDIVISIONS) - 1;
  const geom = new IcosahedronGeometry(radius, detail);
  return solidFromGeometry(toZUp(geom), randomizeColor(baseColor, rng));
}

// Capped cone, base plane at Z = -height/2 and apex at Z = +height/2.
// Not re-anchored; stackOnTop places crowns by their measured extent.
export function makeConeCrown(
  radius: number,
  height: number,
  sections: 6 | 7,
  baseColor: RGB,
  rng: PRNG
): Solid {
  const geom = new ConeGeometry(radius, height, sections, 1, false);
  return solidFromGeometry(toZUp(geom), randomizeColor(baseColor, rng));
}
