export type RGB = readonly [number, number, number];
export type RGBA = readonly [number, number, number, number];

export const trunkColor: RGBA = [101, 67, 33, 255];
export const groundColor: RGBA = [160, 200, 120, 255];

export const roundCrownColor: RGB = [124, 204, 57];
export const pointyCrownColor: RGB = [34, 139, 34];
export const lowerConeColor: RGB = [46, 139, 87];
export const upperConeColor: RGB = [143, 188, 143];
