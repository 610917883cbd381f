import type { AxialCoord, Point } from "./types.js";

const SQ3 = Math.sqrt(3);

/**
 * Pointy-top projection of an axial coordinate. `size` is the centre-to-corner
 * distance and must be positive; nothing here checks it.
 */
export function axialToPixel(hex: AxialCoord, size = 1): Point {
  return {
    x: size * SQ3 * (hex.q + hex.r / 2),
    y: size * 1.5 * hex.r,
  };
}

/** The six corners at 60°·i − 30°, in increasing-angle order. */
export function hexVertices(center: Point, size = 1): Point[] {
  const corners: Point[] = [];
  for (let i = 0; i < 6; i++) {
    const angle = (Math.PI / 180) * (60 * i - 30);
    corners.push({
      x: center.x + size * Math.cos(angle),
      y: center.y + size * Math.sin(angle),
    });
  }
  return corners;
}
