import type { Hex } from "../board/types.js";
import type { TileAssignment, TileIssue } from "./types.js";

/**
 * Advisory checks of the resource/number pairing. Never throws: scoring still
 * runs and treats a bad number as zero production.
 */
export function validateTileAssignment(tiles: TileAssignment, hexes: readonly Hex[]): TileIssue[] {
  const issues: TileIssue[] = [];

  for (const { index } of hexes) {
    const tile = tiles.get(index);
    if (!tile) {
      issues.push({ hex: index, code: "missing_tile", message: `hex ${index} has no tile` });
      continue;
    }

    if (tile.resource === "desert") {
      if (tile.number !== undefined) {
        issues.push({
          hex: index,
          code: "desert_with_number",
          message: `hex ${index} is desert but has number ${tile.number}`,
        });
      }
      continue;
    }

    if (tile.number === undefined) {
      issues.push({ hex: index, code: "missing_number", message: `hex ${index} (${tile.resource}) needs a number 2-12` });
    } else if (tile.number < 2 || tile.number > 12) {
      issues.push({
        hex: index,
        code: "number_out_of_range",
        message: `hex ${index} (${tile.resource}) has number ${tile.number}, expected 2-12`,
      });
    } else if (tile.number === 7) {
      issues.push({
        hex: index,
        code: "seven_has_no_production",
        message: `hex ${index} (${tile.resource}) has number 7, which never produces`,
      });
    }
  }

  return issues;
}
