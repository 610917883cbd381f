import { createStandardBoard } from "./board/generator.js";
import { buildIntersectionGraph } from "./board/intersections.js";
import type { GeometryOptions, Hex, IntersectionGraph } from "./board/types.js";
import { resolveGeometryOptions, resolveScoringOptions, type ScoringOptions } from "./config.js";
import { rankIntersections } from "./scoring/rank.js";
import type { ScoredIntersection } from "./scoring/types.js";
import type { TileAssignment, TileIssue } from "./tiles/types.js";
import { validateTileAssignment } from "./tiles/validateTiles.js";

export interface BoardEvaluation {
  hexes: readonly Hex[];
  graph: IntersectionGraph;
  ranked: ScoredIntersection[];
  issues: TileIssue[];
}

export interface EvaluateBoardParams {
  tiles: TileAssignment;
  scoring?: Partial<ScoringOptions>;
  geometry?: Partial<GeometryOptions>;
}

export function evaluateBoard(params: EvaluateBoardParams): BoardEvaluation {
  const scoring = resolveScoringOptions(params.scoring);
  const geometry = resolveGeometryOptions(params.geometry);

  const hexes = createStandardBoard();
  const graph = buildIntersectionGraph(hexes, geometry);
  const issues = validateTileAssignment(params.tiles, hexes);
  const ranked = rankIntersections(graph, params.tiles, scoring);

  return { hexes, graph, ranked, issues };
}
