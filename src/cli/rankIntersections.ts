import path from "node:path";
import { parseArgs } from "../lib/args.js";
import { DEFAULT_SCORING, DIVERSITY_BONUS_UI_RANGE } from "../config.js";
import { STANDARD_HEX_COUNT } from "../board/generator.js";
import { evaluateBoard } from "../pipeline.js";
import { renderRanking, type OutputFormat } from "../report.js";
import { takeTop } from "../scoring/rank.js";
import { loadTileAssignmentFromFile } from "../tiles/loadTiles.js";

async function main() {
  const args = parseArgs(process.argv);

  const tilesPath = args.get("--tiles") ?? "boards/beginner.json";
  const diversityBonus = Number.parseFloat(args.get("--bonus") ?? String(DEFAULT_SCORING.diversityBonus));
  const top = Number.parseInt(args.get("--top") ?? "10", 10);
  const size = Number.parseFloat(args.get("--size") ?? "1");
  const precision = Number.parseInt(args.get("--precision") ?? "4", 10);
  const formatArg = args.get("--format") ?? "text";
  const includeCoast = args.get("--include-coast") === "true";

  if (!Number.isFinite(diversityBonus) || diversityBonus < 0) throw new Error("--bonus must be a number >= 0");
  if (!Number.isInteger(top) || top < 1) throw new Error("--top must be an integer >= 1");
  if (!Number.isFinite(size) || size <= 0) throw new Error("--size must be > 0");
  if (formatArg !== "text" && formatArg !== "json") throw new Error("--format must be text or json");
  const format: OutputFormat = formatArg;
  if (diversityBonus > DIVERSITY_BONUS_UI_RANGE.max) {
    console.warn(`warning: --bonus ${diversityBonus} is above the usual range [${DIVERSITY_BONUS_UI_RANGE.min}, ${DIVERSITY_BONUS_UI_RANGE.max}]`);
  }

  const loaded = await loadTileAssignmentFromFile(path.resolve(tilesPath), STANDARD_HEX_COUNT);
  const { ranked, issues } = evaluateBoard({
    tiles: loaded.tiles,
    scoring: { diversityBonus },
    geometry: { size, precision, minHexes: includeCoast ? 1 : 2 },
  });

  for (const issue of issues) console.warn(`warning: ${issue.message}`);

  if (format === "text") {
    console.log(`${loaded.name ?? tilesPath}: ${ranked.length} intersections, top ${Math.min(top, ranked.length)}`);
  }
  console.log(renderRanking(takeTop(ranked, top), format));
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
