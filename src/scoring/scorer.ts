import { MissingTileError } from "../lib/invariant.js";
import type { Resource, Tile, TileAssignment } from "../tiles/types.js";
import { DEFAULT_SCORING, type ScoringOptions } from "../config.js";
import { pipWeight } from "./pips.js";
import type { IntersectionScore } from "./types.js";

function describeTile(tile: Tile): string {
  return tile.resource === "desert" || tile.number === undefined ? tile.resource : `${tile.resource} ${tile.number}`;
}

export function scoreIntersection(
  hexes: readonly number[],
  tiles: TileAssignment,
  options: ScoringOptions = DEFAULT_SCORING,
): IntersectionScore {
  let pipsSum = 0;
  const resources = new Set<Resource>();
  const parts: string[] = [];

  for (const hex of hexes) {
    const tile = tiles.get(hex);
    if (!tile) throw new MissingTileError(hex);

    pipsSum += pipWeight(tile);
    if (tile.resource !== "desert") resources.add(tile.resource);
    parts.push(describeTile(tile));
  }

  const distinctResources = resources.size;
  const diversityBonus = options.diversityBonus * Math.max(0, distinctResources - 1);

  return {
    score: pipsSum + diversityBonus,
    pipsSum,
    diversityBonus,
    distinctResources,
    hexCount: hexes.length,
    adjacentDescription: parts.join(", "),
  };
}
