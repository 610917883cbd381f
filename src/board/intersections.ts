import { axialToPixel, hexVertices } from "./geometry.js";
import type { GeometryOptions, Hex, Intersection, IntersectionGraph, Point, VertexKey } from "./types.js";

export function roundCoordinate(value: number, precision: number): number {
  const factor = 10 ** precision;
  const rounded = Math.round(value * factor) / factor;
  // -0 would print as "0" but still compare unequal under Object.is
  return rounded === 0 ? 0 : rounded;
}

export function vertexKey(point: Point): VertexKey {
  return `${point.x},${point.y}`;
}

export function formatVertexLabel(point: Point): string {
  return `V(${point.x}, ${point.y})`;
}

/**
 * Merges the corners of every hex into shared intersections. Corners produced by
 * different hexes only coincide after rounding, so `precision` has to suit the
 * coordinate scale: 4 digits at size 1.
 */
export function buildIntersectionGraph(hexes: readonly Hex[], options: Partial<GeometryOptions> = {}): IntersectionGraph {
  const size = options.size ?? 1;
  const precision = options.precision ?? 4;
  const minHexes = options.minHexes ?? 2;

  const byKey: IntersectionGraph = new Map<VertexKey, Intersection>();
  for (const hex of hexes) {
    for (const corner of hexVertices(axialToPixel(hex, size), size)) {
      const point = { x: roundCoordinate(corner.x, precision), y: roundCoordinate(corner.y, precision) };
      const key = vertexKey(point);
      let entry = byKey.get(key);
      if (!entry) {
        entry = { key, x: point.x, y: point.y, hexes: [] };
        byKey.set(key, entry);
      }
      if (!entry.hexes.includes(hex.index)) entry.hexes.push(hex.index);
    }
  }

  const graph: IntersectionGraph = new Map();
  for (const [key, entry] of byKey) {
    if (entry.hexes.length < minHexes || entry.hexes.length > 3) continue;
    graph.set(key, entry);
  }
  return graph;
}
