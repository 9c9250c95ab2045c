export function clamp(v: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, v));
}

export function isIntegerInRange(v: number, range: readonly [number, number]): boolean {
  return Number.isInteger(v) && range[0] <= v && v <= range[1];
}
