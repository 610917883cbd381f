import { formatVertexLabel } from "../board/intersections.js";
import type { IntersectionGraph } from "../board/types.js";
import type { TileAssignment } from "../tiles/types.js";
import { DEFAULT_SCORING, type ScoringOptions } from "../config.js";
import { scoreIntersection } from "./scorer.js";
import type { IntersectionScore, ScoredIntersection } from "./types.js";

export function compareScoredIntersections(a: IntersectionScore, b: IntersectionScore): number {
  return b.score - a.score || b.pipsSum - a.pipsSum || b.distinctResources - a.distinctResources;
}

/**
 * Scores every intersection and returns all of them, best first. Ties on all
 * three keys keep graph order, so the same input always ranks the same way.
 */
export function rankIntersections(
  graph: IntersectionGraph,
  tiles: TileAssignment,
  options: ScoringOptions = DEFAULT_SCORING,
): ScoredIntersection[] {
  const scored: ScoredIntersection[] = [];
  for (const intersection of graph.values()) {
    scored.push({
      ...intersection,
      hexes: intersection.hexes.slice(),
      label: formatVertexLabel(intersection),
      ...scoreIntersection(intersection.hexes, tiles, options),
    });
  }
  return scored.sort(compareScoredIntersections);
}

export function takeTop<T>(ranked: readonly T[], n: number): T[] {
  return ranked.slice(0, Math.max(0, n));
}
