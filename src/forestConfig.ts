import { InvalidConfigurationError } from "./errors";
import {
  DEFAULT_PLOT_SIZE,
  DEFAULT_SEED,
  DEFAULT_TREE_COUNT,
  PLOT_SIZE_RANGE,
  TREE_COUNT_RANGE,
} from "./overrides";
import { isIntegerInRange } from "./utils/math";

export interface GenerationConfig {
  treeCount: number;
  // Full side length of the square plot; trees land in [-plotSize/2, plotSize/2]^2
  plotSize: number;
  seed?: number;
  // Give each tree its own forked random stream instead of sharing one sequence
  streamPerTree?: boolean;
}

// Shape checks only; buildForest accepts any non-negative count and positive plot size
export function assertGenerationConfig(config: GenerationConfig) {
  const { treeCount, plotSize, seed } = config;
  if (!Number.isInteger(treeCount) || treeCount < 0) {
    throw new InvalidConfigurationError("treeCount", treeCount, "expected an integer >= 0");
  }
  if (!Number.isFinite(plotSize) || plotSize <= 0) {
    throw new InvalidConfigurationError("plotSize", plotSize, "expected a finite number > 0");
  }
  if (seed !== undefined && !Number.isInteger(seed)) {
    throw new InvalidConfigurationError("seed", seed, "expected an integer");
  }
}

// Fill defaults and hold the values to the ranges the control panel offers
export function resolveGenerationConfig(partial: Partial<GenerationConfig> = {}): GenerationConfig {
  const config: GenerationConfig = {
    treeCount: partial.treeCount ?? DEFAULT_TREE_COUNT,
    plotSize: partial.plotSize ?? DEFAULT_PLOT_SIZE,
    seed: partial.seed ?? DEFAULT_SEED,
    streamPerTree: partial.streamPerTree ?? false,
  };
  if (!isIntegerInRange(config.treeCount, TREE_COUNT_RANGE)) {
    throw new InvalidConfigurationError(
      "treeCount",
      config.treeCount,
      `expected an integer in ${TREE_COUNT_RANGE[0]}..${TREE_COUNT_RANGE[1]}`
    );
  }
  if (!isIntegerInRange(config.plotSize, PLOT_SIZE_RANGE)) {
    throw new InvalidConfigurationError(
      "plotSize",
      config.plotSize,
      `expected an integer in ${PLOT_SIZE_RANGE[0]}..${PLOT_SIZE_RANGE[1]}`
    );
  }
  assertGenerationConfig(config);
  return config;
}
