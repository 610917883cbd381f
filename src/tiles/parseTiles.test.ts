import { describe, expect, it } from "vitest";
import { InvariantError } from "../lib/invariant.js";
import { parseTileAssignment, parseTileNumber } from "./parseTiles.js";

describe("parseTileNumber", () => {
  it("accepts integers and integer strings", () => {
    expect(parseTileNumber(8)).toBe(8);
    expect(parseTileNumber("8")).toBe(8);
    expect(parseTileNumber(" 11 ")).toBe(11);
    expect(parseTileNumber("14")).toBe(14);
  });

  it("treats blank, null and unparseable values as absent", () => {
    expect(parseTileNumber(undefined)).toBeUndefined();
    expect(parseTileNumber(null)).toBeUndefined();
    expect(parseTileNumber("")).toBeUndefined();
    expect(parseTileNumber("   ")).toBeUndefined();
    expect(parseTileNumber("abc")).toBeUndefined();
    expect(parseTileNumber("6a")).toBeUndefined();
    expect(parseTileNumber(4.5)).toBeUndefined();
    expect(parseTileNumber("4.5")).toBeUndefined();
    expect(parseTileNumber(Number.NaN)).toBeUndefined();
  });
});

describe("parseTileAssignment", () => {
  it("builds a map keyed by hex index and drops absent numbers", () => {
    const tiles = parseTileAssignment(
      [
        { hex: 0, resource: "ore", number: "10" },
        { hex: 1, resource: "desert", number: "" },
        { hex: 2, resource: "wood", number: null },
      ],
      19,
    );
    expect([...tiles.entries()]).toEqual([
      [0, { resource: "ore", number: 10 }],
      [1, { resource: "desert" }],
      [2, { resource: "wood" }],
    ]);
    expect(tiles.get(1)).not.toHaveProperty("number");
  });

  it("rejects duplicate hexes", () => {
    expect(() =>
      parseTileAssignment(
        [
          { hex: 3, resource: "ore", number: 10 },
          { hex: 3, resource: "wood", number: 4 },
        ],
        19,
      ),
    ).toThrow(new InvariantError("hex 3 is assigned more than once"));
  });

  it("rejects hexes that are not on the board", () => {
    expect(() => parseTileAssignment([{ hex: 19, resource: "ore", number: 10 }], 19)).toThrow(
      "tile hex 19 is outside 0..18",
    );
  });
});
