import path from "node:path";
import { fileURLToPath } from "node:url";
import { validateJsonFileWithSchema, validateJsonWithSchema, type Json } from "../lib/jsonSchema.js";
import { parseTileAssignment } from "./parseTiles.js";
import type { TileAssignment, TileConfig } from "./types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const TILES_SCHEMA_PATH = path.resolve(__dirname, "../../schemas/tiles.schema.json");

export type LoadedTiles = {
  name?: string;
  tiles: TileAssignment;
};

export async function parseTileConfig(json: Json, hexCount: number, label = "tile config"): Promise<LoadedTiles> {
  const config = await validateJsonWithSchema<TileConfig>(json, TILES_SCHEMA_PATH, label);
  return { name: config.name, tiles: parseTileAssignment(config.tiles, hexCount) };
}

export async function loadTileAssignmentFromFile(tilesPath: string, hexCount: number): Promise<LoadedTiles> {
  const config = await validateJsonFileWithSchema<TileConfig>(tilesPath, TILES_SCHEMA_PATH);
  return { name: config.name, tiles: parseTileAssignment(config.tiles, hexCount) };
}
