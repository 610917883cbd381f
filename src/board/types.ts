export type AxialCoord = {
  q: number;
  r: number;
};

export type Hex = Readonly<AxialCoord & { index: number }>;

export type Point = {
  x: number;
  y: number;
};

/** Rounded `"x,y"` pair used to merge coincident corners of neighbouring hexes. */
export type VertexKey = string;

export interface Intersection {
  key: VertexKey;
  x: number;
  y: number;
  /** Distinct hex indices, in the order the hexes were visited. */
  hexes: number[];
}

export type IntersectionGraph = Map<VertexKey, Intersection>;

export interface GeometryOptions {
  size: number;
  precision: number;
  /** Smallest number of adjacent hexes a vertex needs to be kept (1 or 2). */
  minHexes: number;
}
