import { describe, it, expect } from "vitest";
import { PRNG } from "../src/utils/PRNG";
import { computeBounds, triangleCount, vertexCount, type Solid } from "../src/utils/solid";
import { makeTrunk } from "../src/worldObjects/geometry/tree-trunk";
import {
  buildTree,
  makePointyTree,
  makeRoundyTree,
  makeStackedTree,
  pickArchetype,
  TREE_ARCHETYPES,
  type TreeArchetype,
} from "../src/worldObjects/geometry/trees";
import { scriptedRng } from "./helpers";

function minZFrom(solid: Solid, firstVertex: number): number {
  let min = Infinity;
  for (let v = firstVertex; v < vertexCount(solid); v++) {
    min = Math.min(min, solid.positions[v * 3 + 2]);
  }
  return min;
}

describe("pickArchetype", () => {
  it("splits the unit interval at 0.4 and 0.75", () => {
    expect(pickArchetype(0)).toBe("roundy");
    expect(pickArchetype(0.399)).toBe("roundy");
    expect(pickArchetype(0.4)).toBe("pointy");
    expect(pickArchetype(0.749)).toBe("pointy");
    expect(pickArchetype(0.75)).toBe("stacked");
    expect(pickArchetype(0.999)).toBe("stacked");
  });

  it("yields a 40/35/25 mix over evenly spread draws", () => {
    const n = 10000;
    const counts: Record<TreeArchetype, number> = { roundy: 0, pointy: 0, stacked: 0 };
    for (let i = 0; i < n; i++) counts[pickArchetype((i + 0.5) / n)]++;
    expect(counts).toEqual({ roundy: 4000, pointy: 3500, stacked: 2500 });
  });

  it("approximates the mix over seeded draws", () => {
    const rng = new PRNG(11);
    const n = 20000;
    const counts: Record<TreeArchetype, number> = { roundy: 0, pointy: 0, stacked: 0 };
    for (let i = 0; i < n; i++) counts[pickArchetype(rng.next())]++;
    expect(counts.roundy / n).toBeCloseTo(0.4, 1);
    expect(counts.pointy / n).toBeCloseTo(0.35, 1);
    expect(counts.stacked / n).toBeCloseTo(0.25, 1);
  });
});

describe("tree archetypes", () => {
  it("sets a roundy crown 0.5 into the top of its trunk", () => {
    const tree = makeRoundyTree(scriptedRng([]));
    const trunkVertices = vertexCount(makeTrunk(4.5, 0.7));
    expect(triangleCount(tree)).toBe(20 + 80);
    expect(minZFrom(tree, trunkVertices)).toBeCloseTo(4.0, 6);
    expect(computeBounds(tree).min[2]).toBe(0);
  });

  it("stacks a pointy cone on its trunk", () => {
    const tree = makePointyTree(scriptedRng([]));
    const trunkVertices = vertexCount(makeTrunk(3, 0.6));
    expect(triangleCount(tree)).toBe(20 + 12);
    expect(minZFrom(tree, trunkVertices)).toBeCloseTo(2.5, 6);
    expect(computeBounds(tree).max[2]).toBeCloseTo(10.5, 6);
  });

  it("stacks two cones on a stacked tree", () => {
    const tree = makeStackedTree(scriptedRng([]));
    expect(triangleCount(tree)).toBe(20 + 14 + 14);
    expect(computeBounds(tree).max[2]).toBeCloseTo(8.5, 6);
    expect(tree.faceColors.length / 4).toBe(triangleCount(tree));
  });

  it("keeps trunk color first and crown color after", () => {
    const tree = makeRoundyTree(scriptedRng([0.5, 0.5, 0.99999, 0, 0.5]));
    expect(Array.from(tree.faceColors.slice(0, 4))).toEqual([101, 67, 33, 255]);
    expect(Array.from(tree.faceColors.slice(20 * 4, 20 * 4 + 4))).toEqual([148, 179, 57, 255]);
  });

  it.each(TREE_ARCHETYPES)("moves a %s tree rigidly to its ground position", (archetype) => {
    const local = buildTree(archetype, 0, 0, scriptedRng([]));
    const placed = buildTree(archetype, 12.5, -30, scriptedRng([]));
    expect(vertexCount(placed)).toBe(vertexCount(local));
    for (let i = 0; i < local.positions.length; i += 3) {
      expect(placed.positions[i]).toBeCloseTo(local.positions[i] + 12.5, 9);
      expect(placed.positions[i + 1]).toBeCloseTo(local.positions[i + 1] - 30, 9);
      expect(placed.positions[i + 2]).toBe(local.positions[i + 2]);
    }
  });

  it.each(TREE_ARCHETYPES)("builds a well-formed %s tree from real draws", (archetype) => {
    const rng = new PRNG(21);
    for (let i = 0; i < 20; i++) {
      const tree = buildTree(archetype, 0, 0, rng);
      expect(Array.from(tree.indices).every((v) => v < vertexCount(tree))).toBe(true);
      expect(tree.faceColors.length / 4).toBe(triangleCount(tree));
      expect(computeBounds(tree).min[2]).toBe(0);
    }
  });
});
