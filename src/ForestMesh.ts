import { BufferAttribute, BufferGeometry, Mesh, MeshStandardMaterial } from "three";
import type { Forest } from "./ForestBuilder";
import { toYUp } from "./utils/geometry";
import { triangleCount } from "./utils/solid";

// The M x 3 color array a plotter wants: alpha dropped
export function faceColorsRGB(forest: Forest): Uint8Array {
  const count = triangleCount(forest);
  const rgb = new Uint8Array(count * 3);
  for (let t = 0; t < count; t++) {
    rgb[t * 3 + 0] = forest.faceColors[t * 4 + 0];
    rgb[t * 3 + 1] = forest.faceColors[t * 4 + 1];
    rgb[t * 3 + 2] = forest.faceColors[t * 4 + 2];
  }
  return rgb;
}

// Un-index the forest so every triangle gets its own three vertices carrying the face color,
// then hand it back Y-up for three.js renderers.
export function forestToGeometry(forest: Forest): BufferGeometry {
  const count = triangleCount(forest);
  const positions = new Float32Array(count * 9);
  const colors = new Float32Array(count * 9);

  for (let t = 0; t < count; t++) {
    const r = forest.faceColors[t * 4 + 0] / 255;
    const g = forest.faceColors[t * 4 + 1] / 255;
    const b = forest.faceColors[t * 4 + 2] / 255;
    for (let k = 0; k < 3; k++) {
      const vi = forest.indices[t * 3 + k];
      const out = (t * 3 + k) * 3;
      positions[out + 0] = forest.positions[vi * 3 + 0];
      positions[out + 1] = forest.positions[vi * 3 + 1];
      positions[out + 2] = forest.positions[vi * 3 + 2];
      colors[out + 0] = r;
      colors[out + 1] = g;
      colors[out + 2] = b;
    }
  }

  const geom = new BufferGeometry();
  geom.setAttribute("position", new BufferAttribute(positions, 3));
  geom.setAttribute("color", new BufferAttribute(colors, 3));
  toYUp(geom);
  geom.computeVertexNormals();
  geom.computeBoundingBox();
  return geom;
}

export function makeForestMesh(forest: Forest): Mesh<BufferGeometry, MeshStandardMaterial> {
  const material = new MeshStandardMaterial({ vertexColors: true, flatShading: true });
  const mesh = new Mesh(forestToGeometry(forest), material);
  mesh.castShadow = true;
  mesh.receiveShadow = true;
  return mesh;
}
