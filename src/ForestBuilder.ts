import {
  assertGenerationConfig,
  resolveGenerationConfig,
  type GenerationConfig,
} from "./forestConfig";
import { DEFAULT_SEED } from "./overrides";
import { PRNG } from "./utils/PRNG";
import { assertSolidValid, mergeSolids, triangleCount, vertexCount, type Solid } from "./utils/solid";
import { makeGroundQuad } from "./worldObjects/ground";
import { buildTree, pickArchetype, type TreeArchetype } from "./worldObjects/geometry/trees";

export type TreePlacement = {
  archetype: TreeArchetype;
  x: number;
  y: number;
};

// Every tree plus the ground quad in one buffer, indices global
export interface Forest extends Solid {
  placements: readonly TreePlacement[];
  // First triangle belonging to the ground quad; everything before it is trees
  groundTriangleOffset: number;
}

export function buildForest(config: GenerationConfig, rng?: PRNG): Forest {
  assertGenerationConfig(config);
  const { treeCount, plotSize } = config;
  const random = rng ?? new PRNG(config.seed ?? DEFAULT_SEED);

  // All ground positions are drawn up front, then one selector draw per tree
  const half = plotSize / 2;
  const positions: [number, number][] = [];
  for (let i = 0; i < treeCount; i++) {
    const x = random.float(-half, half);
    const y = random.float(-half, half);
    positions.push([x, y]);
  }

  const placements: TreePlacement[] = [];
  const trees: Solid[] = [];
  for (const [x, y] of positions) {
    const archetype = pickArchetype(random.next());
    const treeRng = config.streamPerTree ? random.fork() : random;
    trees.push(buildTree(archetype, x, y, treeRng));
    placements.push({ archetype, x, y });
  }

  const treesMesh = mergeSolids(trees);
  const merged = mergeSolids([treesMesh, makeGroundQuad(plotSize)]);
  assertSolidValid(merged, "forest");

  console.debug(
    `[forest] ${treeCount} trees on a ${plotSize}m plot: ${vertexCount(merged)} vertices, ${triangleCount(merged)} triangles`
  );

  return {
    ...merged,
    placements,
    groundTriangleOffset: triangleCount(treesMesh),
  };
}

// Entry point for the presentation layer: defaults, range checks, then generation
export function generateForest(partial: Partial<GenerationConfig> = {}): Forest {
  return buildForest(resolveGenerationConfig(partial));
}
