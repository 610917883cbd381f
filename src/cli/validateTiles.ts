import { positionalArgs } from "../lib/args.js";
import { createStandardBoard, STANDARD_HEX_COUNT } from "../board/generator.js";
import { loadTileAssignmentFromFile } from "../tiles/loadTiles.js";
import { validateTileAssignment } from "../tiles/validateTiles.js";

const [tilesPath] = positionalArgs(process.argv);
if (!tilesPath) {
  console.error("Usage: validateTiles <path-to-tiles.json>");
  process.exitCode = 2;
} else {
  const { tiles } = await loadTileAssignmentFromFile(tilesPath, STANDARD_HEX_COUNT);
  const issues = validateTileAssignment(tiles, createStandardBoard());
  if (issues.length === 0) {
    console.log(`OK: ${tilesPath}`);
  } else {
    for (const issue of issues) console.error(`${issue.code}: ${issue.message}`);
    process.exitCode = 1;
  }
}
