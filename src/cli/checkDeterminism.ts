import assert from "node:assert/strict";
import path from "node:path";
import { parseArgs } from "../lib/args.js";
import { DEFAULT_SCORING } from "../config.js";
import { STANDARD_HEX_COUNT } from "../board/generator.js";
import { evaluateBoard } from "../pipeline.js";
import { renderRankingJson } from "../report.js";
import { loadTileAssignmentFromFile } from "../tiles/loadTiles.js";

async function main() {
  const args = parseArgs(process.argv);
  const tilesPath = args.get("--tiles") ?? "boards/beginner.json";
  const diversityBonus = Number.parseFloat(args.get("--bonus") ?? String(DEFAULT_SCORING.diversityBonus));

  const { tiles } = await loadTileAssignmentFromFile(path.resolve(tilesPath), STANDARD_HEX_COUNT);

  const first = evaluateBoard({ tiles, scoring: { diversityBonus } });
  const second = evaluateBoard({ tiles, scoring: { diversityBonus } });

  assert.equal(
    renderRankingJson(first.ranked),
    renderRankingJson(second.ranked),
    "Determinism check failed: rankings differ",
  );
  console.log(`OK: deterministic for ${tilesPath} (${first.ranked.length} intersections, bonus=${diversityBonus})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
