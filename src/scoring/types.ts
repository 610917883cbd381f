import type { Intersection } from "../board/types.js";

export interface IntersectionScore {
  score: number;
  pipsSum: number;
  diversityBonus: number;
  distinctResources: number;
  hexCount: number;
  /** "wood 5, brick 2", in adjacency order. */
  adjacentDescription: string;
}

export type ScoredIntersection = Intersection &
  IntersectionScore & {
    label: string;
  };
