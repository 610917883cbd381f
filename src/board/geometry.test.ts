import { describe, expect, it } from "vitest";
import { axialToPixel, hexVertices } from "./geometry.js";

describe("axialToPixel", () => {
  it("puts the origin hex at the origin", () => {
    expect(axialToPixel({ q: 0, r: 0 })).toEqual({ x: 0, y: 0 });
  });

  it("projects pointy-top axial coordinates", () => {
    const east = axialToPixel({ q: 1, r: 0 });
    expect(east.x).toBeCloseTo(Math.sqrt(3), 12);
    expect(east.y).toBe(0);

    const south = axialToPixel({ q: 0, r: 2 }, 2);
    expect(south.x).toBeCloseTo(2 * Math.sqrt(3), 12);
    expect(south.y).toBe(6);
  });
});

describe("hexVertices", () => {
  it("returns six corners at distance size from the centre", () => {
    const center = { x: 3, y: -1 };
    const corners = hexVertices(center, 2);
    expect(corners).toHaveLength(6);
    for (const corner of corners) {
      expect(Math.hypot(corner.x - center.x, corner.y - center.y)).toBeCloseTo(2, 12);
    }
  });

  it("starts at -30 degrees and turns in increasing-angle order", () => {
    const corners = hexVertices({ x: 0, y: 0 });
    const angles = corners.map((c) => Math.round((Math.atan2(c.y, c.x) * 180) / Math.PI));
    expect(angles).toEqual([-30, 30, 90, 150, -150, -90]);
  });

  it("has a pointy top: corner 2 straight below and corner 5 straight above the centre in screen space", () => {
    const corners = hexVertices({ x: 0, y: 0 });
    expect(corners[2]?.x).toBeCloseTo(0, 12);
    expect(corners[2]?.y).toBeCloseTo(1, 12);
    expect(corners[5]?.x).toBeCloseTo(0, 12);
    expect(corners[5]?.y).toBeCloseTo(-1, 12);
  });
});
