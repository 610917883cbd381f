import { describe, expect, it } from "vitest";
import { createStandardBoard, STANDARD_HEX_COUNT } from "./generator.js";

describe("createStandardBoard", () => {
  it("yields 19 hexes indexed 0..18 in row-major order", () => {
    const hexes = createStandardBoard();
    expect(hexes).toHaveLength(STANDARD_HEX_COUNT);
    expect(hexes.map((h) => h.index)).toEqual(Array.from({ length: 19 }, (_, i) => i));
  });

  it("lays rows out 3-4-5-4-3", () => {
    const counts = new Map<number, number>();
    for (const hex of createStandardBoard()) counts.set(hex.r, (counts.get(hex.r) ?? 0) + 1);
    expect([...counts.entries()]).toEqual([
      [-2, 3],
      [-1, 4],
      [0, 5],
      [1, 4],
      [2, 3],
    ]);
  });

  it("places the corner and centre hexes at the expected axial coordinates", () => {
    const hexes = createStandardBoard();
    expect(hexes[0]).toEqual({ index: 0, q: 0, r: -2 });
    expect(hexes[2]).toEqual({ index: 2, q: 2, r: -2 });
    expect(hexes[9]).toEqual({ index: 9, q: 0, r: 0 });
    expect(hexes[18]).toEqual({ index: 18, q: 0, r: 2 });
  });

  it("returns frozen records", () => {
    const hexes = createStandardBoard();
    expect(Object.isFrozen(hexes)).toBe(true);
    expect(Object.isFrozen(hexes[4])).toBe(true);
  });

  it("is deterministic", () => {
    expect(createStandardBoard()).toEqual(createStandardBoard());
  });
});
