import type { Tile } from "../tiles/types.js";

/** Ways to roll each total with two dice. 7 is left out: it moves the robber instead of producing. */
export const PIP_TABLE: Readonly<Record<number, number>> = Object.freeze({
  2: 1,
  3: 2,
  4: 3,
  5: 4,
  6: 5,
  8: 5,
  9: 4,
  10: 3,
  11: 2,
  12: 1,
});

export function pipWeight(tile: Tile): number {
  if (tile.resource === "desert" || tile.number === undefined) return 0;
  return PIP_TABLE[tile.number] ?? 0;
}
