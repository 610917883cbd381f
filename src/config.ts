import type { GeometryOptions } from "./board/types.js";
import { invariant } from "./lib/invariant.js";

export type ScoringOptions = {
  /** Added once per distinct non-desert resource beyond the first. */
  diversityBonus: number;
};

export const DEFAULT_SCORING: ScoringOptions = { diversityBonus: 0.5 };

export const DEFAULT_GEOMETRY: GeometryOptions = { size: 1, precision: 4, minHexes: 2 };

/** Range the slider offers. The scorer itself takes any non-negative weight. */
export const DIVERSITY_BONUS_UI_RANGE = { min: 0, max: 2 } as const;

export function resolveScoringOptions(overrides: Partial<ScoringOptions> = {}): ScoringOptions {
  const options: ScoringOptions = {
    diversityBonus: overrides.diversityBonus ?? DEFAULT_SCORING.diversityBonus,
  };
  invariant(
    Number.isFinite(options.diversityBonus) && options.diversityBonus >= 0,
    `diversityBonus must be a non-negative number (got ${options.diversityBonus})`,
  );
  return options;
}

export function resolveGeometryOptions(overrides: Partial<GeometryOptions> = {}): GeometryOptions {
  const options: GeometryOptions = {
    size: overrides.size ?? DEFAULT_GEOMETRY.size,
    precision: overrides.precision ?? DEFAULT_GEOMETRY.precision,
    minHexes: overrides.minHexes ?? DEFAULT_GEOMETRY.minHexes,
  };
  invariant(Number.isInteger(options.precision) && options.precision >= 0, "precision must be a non-negative integer");
  invariant(options.minHexes === 1 || options.minHexes === 2, "minHexes must be 1 or 2");
  return options;
}
