export const RESOURCES = ["wood", "brick", "sheep", "wheat", "ore", "desert"] as const;

export type Resource = (typeof RESOURCES)[number];

export type Tile = {
  resource: Resource;
  number?: number;
};

/** Tile per hex index. Owned by the caller; scoring only reads it. */
export type TileAssignment = ReadonlyMap<number, Tile>;

/** One row of a tile configuration file, before the number is parsed. */
export type RawTile = {
  hex: number;
  resource: Resource;
  number?: number | string | null;
};

export type TileConfig = {
  name?: string;
  tiles: RawTile[];
};

export type TileIssueCode =
  | "missing_tile"
  | "missing_number"
  | "number_out_of_range"
  | "desert_with_number"
  | "seven_has_no_production";

export interface TileIssue {
  hex: number;
  code: TileIssueCode;
  message: string;
}
