/*
 * Types
 *
 * This module contains the type declarations shared by the planner and the command-line driver.
 */

export type City = string;

/**
 * Distances keyed by origin, then destination: distances[a][b] is the cost of going from a to b.
 */
export interface DistanceTable {
    [from: string]: {[to: string]: number};
}

/**
 * A directed edge, [from, to, cost].
 */
export type Edge = [City, City, number];

export const HEURISTIC_KINDS = ["nearest", "uniform", "mst"] as const;

/**
 * The estimates a TSP problem can use as its heuristic.
 * - nearest: the cheapest next hop; not admissible in general
 * - uniform: zero until every city is visited; turns A* into uniform-cost search
 * - mst: minimum spanning tree bound over the unvisited cities; admissible
 */
export type HeuristicKind = typeof HEURISTIC_KINDS[number];
