import type { RGB, RGBA } from "../../forestColors";
import { COLOR_VARIANCE } from "../../overrides";
import { PRNG } from "../../utils/PRNG";
import { clamp } from "../../utils/math";

// Jitter each channel by an integer in [-variance, variance), clamped to [0, 255]. Alpha stays opaque.
export function randomizeColor(base: RGB, rng: PRNG, variance = COLOR_VARIANCE): RGBA {
  const jitter = (c: number) => clamp(c + rng.int(-variance, variance - 1), 0, 255);
  const r = jitter(base[0]);
  const g = jitter(base[1]);
  const b = jitter(base[2]);
  return [r, g, b, 255];
}
