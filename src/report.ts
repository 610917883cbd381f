import type { ScoredIntersection } from "./scoring/types.js";

export type OutputFormat = "text" | "json";

function fmt(value: number, digits = 2): string {
  return value.toFixed(digits);
}

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + " ".repeat(width - value.length);
}

export function renderRankingText(rows: readonly ScoredIntersection[]): string {
  const header = ["#", "Intersection", "Score", "Pips", "Bonus", "Res", "Hexes", "Adjacent"];
  const body = rows.map((row, i) => [
    String(i + 1),
    row.label,
    fmt(row.score),
    String(row.pipsSum),
    fmt(row.diversityBonus),
    String(row.distinctResources),
    String(row.hexCount),
    row.adjacentDescription,
  ]);

  const widths = header.map((h, col) => Math.max(h.length, ...body.map((cells) => cells[col]?.length ?? 0)));
  const line = (cells: string[]) =>
    cells
      .map((cell, col) => (col === cells.length - 1 ? cell : pad(cell, widths[col] ?? 0)))
      .join("  ");

  return [line(header), ...body.map(line)].join("\n");
}

export function renderRankingJson(rows: readonly ScoredIntersection[]): string {
  return JSON.stringify(
    rows.map((row) => ({
      label: row.label,
      x: row.x,
      y: row.y,
      hexes: row.hexes,
      score: row.score,
      pipsSum: row.pipsSum,
      diversityBonus: row.diversityBonus,
      distinctResources: row.distinctResources,
      hexCount: row.hexCount,
      adjacentDescription: row.adjacentDescription,
    })),
    null,
    2,
  );
}

export function renderRanking(rows: readonly ScoredIntersection[], format: OutputFormat): string {
  return format === "json" ? renderRankingJson(rows) : renderRankingText(rows);
}
