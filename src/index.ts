export type { AxialCoord, GeometryOptions, Hex, Intersection, IntersectionGraph, Point, VertexKey } from "./board/types.js";
export { createStandardBoard, STANDARD_HEX_COUNT, STANDARD_ROWS } from "./board/generator.js";
export { axialToPixel, hexVertices } from "./board/geometry.js";
export { buildIntersectionGraph, formatVertexLabel, roundCoordinate, vertexKey } from "./board/intersections.js";

export type { IntersectionScore, ScoredIntersection } from "./scoring/types.js";
export { PIP_TABLE, pipWeight } from "./scoring/pips.js";
export { scoreIntersection } from "./scoring/scorer.js";
export { compareScoredIntersections, rankIntersections, takeTop } from "./scoring/rank.js";

export type { RawTile, Resource, Tile, TileAssignment, TileConfig, TileIssue, TileIssueCode } from "./tiles/types.js";
export { RESOURCES } from "./tiles/types.js";
export { parseTileAssignment, parseTileNumber } from "./tiles/parseTiles.js";
export { validateTileAssignment } from "./tiles/validateTiles.js";
export { loadTileAssignmentFromFile, parseTileConfig, type LoadedTiles } from "./tiles/loadTiles.js";

export type { ScoringOptions } from "./config.js";
export { DEFAULT_GEOMETRY, DEFAULT_SCORING, DIVERSITY_BONUS_UI_RANGE } from "./config.js";
export { evaluateBoard, type BoardEvaluation, type EvaluateBoardParams } from "./pipeline.js";
export { renderRanking, renderRankingJson, renderRankingText, type OutputFormat } from "./report.js";
export { InvariantError, MissingTileError, invariant } from "./lib/invariant.js";
