import type { Hex } from "./types.js";

/** Half-open `q` range of every row of the standard 3-4-5-4-3 board, keyed by `r`. */
export const STANDARD_ROWS: readonly { r: number; qStart: number; qEnd: number }[] = [
  { r: -2, qStart: 0, qEnd: 3 },
  { r: -1, qStart: -1, qEnd: 3 },
  { r: 0, qStart: -2, qEnd: 3 },
  { r: 1, qStart: -2, qEnd: 2 },
  { r: 2, qStart: -2, qEnd: 1 },
];

export const STANDARD_HEX_COUNT = 19;

export function createStandardBoard(): readonly Hex[] {
  const hexes: Hex[] = [];
  for (const row of STANDARD_ROWS) {
    for (let q = row.qStart; q < row.qEnd; q++) {
      hexes.push(Object.freeze({ index: hexes.length, q, r: row.r }));
    }
  }
  return Object.freeze(hexes);
}
