import {
  lowerConeColor,
  pointyCrownColor,
  roundCrownColor,
  upperConeColor,
} from "../../forestColors";
import { stackOnTop } from "../../utils/geometry";
import { PRNG } from "../../utils/PRNG";
import { mergeSolids, translateSolid, type Solid } from "../../utils/solid";
import { makeConeCrown, makeRoundCrown } from "./crowns";
import { makeTrunk } from "./tree-trunk";

export type TreeArchetype = "roundy" | "pointy" | "stacked";

export const TREE_ARCHETYPES: readonly TreeArchetype[] = ["roundy", "pointy", "stacked"];

// Selector thresholds on a uniform draw: 40% roundy, 35% pointy, 25% stacked
export function pickArchetype(r: number): TreeArchetype {
  if (r < 0.4) return "roundy";
  if (r < 0.75) return "pointy";
  return "stacked";
}

// Sphere on trunk
export function makeRoundyTree(rng: PRNG): Solid {
  const trunkHeight = rng.float(3, 6);
  const crownRadius = rng.float(2.5, 4.5);

  const trunk = makeTrunk(trunkHeight, 0.7);
  const crown = makeRoundCrown(crownRadius, roundCrownColor, rng);
  stackOnTop(trunk, crown);

  return mergeSolids([trunk, crown]);
}

// Cone on trunk
export function makePointyTree(rng: PRNG): Solid {
  const trunkHeight = rng.float(2, 4);
  const crownHeight = rng.float(6, 10);
  const crownRadius = rng.float(2.5, 4.0);

  const trunk = makeTrunk(trunkHeight, 0.6);
  const crown = makeConeCrown(crownRadius, crownHeight, 6, pointyCrownColor, rng);
  stackOnTop(trunk, crown);

  return mergeSolids([trunk, crown]);
}

// Trunk -> wide cone -> small cone
export function makeStackedTree(rng: PRNG): Solid {
  const trunkHeight = rng.float(2, 3);
  const trunk = makeTrunk(trunkHeight, 0.7);

  const lowerHeight = rng.float(3, 5);
  const lower = makeConeCrown(rng.float(3, 4), lowerHeight, 7, lowerConeColor, rng);
  stackOnTop(trunk, lower);

  const upper = makeConeCrown(2.0, rng.float(2, 4), 7, upperConeColor, rng);
  stackOnTop(lower, upper);

  return mergeSolids([trunk, lower, upper]);
}

const builders: Record<TreeArchetype, (rng: PRNG) => Solid> = {
  roundy: makeRoundyTree,
  pointy: makePointyTree,
  stacked: makeStackedTree,
};

// Build one tree in its local frame and move it, as a unit, to (x, y) on the ground
export function buildTree(archetype: TreeArchetype, x: number, y: number, rng: PRNG): Solid {
  return translateSolid(builders[archetype](rng), x, y, 0);
}
