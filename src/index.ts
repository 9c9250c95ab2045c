export { buildForest, generateForest } from "./ForestBuilder";
export type { Forest, TreePlacement } from "./ForestBuilder";
export { faceColorsRGB, forestToGeometry, makeForestMesh } from "./ForestMesh";
export { assertGenerationConfig, resolveGenerationConfig } from "./forestConfig";
export type { GenerationConfig } from "./forestConfig";
export { GeometryInvariantError, InvalidConfigurationError } from "./errors";
export type { RGB, RGBA } from "./forestColors";
export { PRNG } from "./utils/PRNG";
export { stackOnTop } from "./utils/geometry";
export {
  computeBounds,
  mergeSolids,
  translateSolid,
  triangleCount,
  vertexCount,
} from "./utils/solid";
export type { Bounds, Solid, Vec3 } from "./utils/solid";
export { makeTrunk } from "./worldObjects/geometry/tree-trunk";
export { makeConeCrown, makeRoundCrown } from "./worldObjects/geometry/crowns";
export { randomizeColor } from "./worldObjects/geometry/randomizeColor";
export {
  buildTree,
  makePointyTree,
  makeRoundyTree,
  makeStackedTree,
  pickArchetype,
  TREE_ARCHETYPES,
} from "./worldObjects/geometry/trees";
export type { TreeArchetype } from "./worldObjects/geometry/trees";
export { makeGroundQuad } from "./worldObjects/ground";
