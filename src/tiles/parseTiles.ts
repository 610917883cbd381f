import { invariant } from "../lib/invariant.js";
import type { RawTile, Tile, TileAssignment } from "./types.js";

/**
 * Collapses whatever an editor put in the number column into an integer or
 * absent. Blank, null, non-numeric and fractional values are all absent.
 */
export function parseTileNumber(raw: RawTile["number"]): number | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === "number") return Number.isInteger(raw) ? raw : undefined;

  const text = raw.trim();
  if (!/^[+-]?\d+$/.test(text)) return undefined;
  return Number.parseInt(text, 10);
}

export function parseTileAssignment(rows: readonly RawTile[], hexCount: number): TileAssignment {
  const tiles = new Map<number, Tile>();
  for (const row of rows) {
    invariant(Number.isInteger(row.hex), `tile hex must be an integer (got ${row.hex})`);
    invariant(row.hex >= 0 && row.hex < hexCount, `tile hex ${row.hex} is outside 0..${hexCount - 1}`);
    invariant(!tiles.has(row.hex), `hex ${row.hex} is assigned more than once`);

    const number = parseTileNumber(row.number);
    tiles.set(row.hex, number === undefined ? { resource: row.resource } : { resource: row.resource, number });
  }
  return tiles;
}
