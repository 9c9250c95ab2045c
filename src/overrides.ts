// Vertical interpenetration between stacked primitives; hides seams under flat shading.
export const OVERLAP_AMOUNT = 0.5;

export const TRUNK_SEGMENTS = 5;
export const CROWN_SUBDIVISIONS = 1;
export const COLOR_VARIANCE = 25;

// Ground quad half-extent is plotSize / GROUND_EXTENT_DIVISOR, so it reaches a bit past the plot.
export const GROUND_EXTENT_DIVISOR = 1.8;
export const GROUND_Z = -0.1;

export const DEFAULT_SEED = 1;
export const DEFAULT_TREE_COUNT = 100;
export const DEFAULT_PLOT_SIZE = 120;

// Ranges the control panel offers; generateForest rejects anything else.
export const TREE_COUNT_RANGE: readonly [number, number] = [20, 300];
export const PLOT_SIZE_RANGE: readonly [number, number] = [50, 200];
