import {PreconditionError} from "../core/PreconditionError";
import type {City} from "../core/Types";
import type {DistanceMatrix} from "./DistanceMatrix";

/*
 * Heuristics
 *
 * Estimates of the cost of completing a partial tour.
 */

/**
 * The cheapest single hop from the last visited city to any unvisited city.
 * It bounds the next edge only, so it can overestimate the rest of the tour.
 */
export function nearestNextHop(matrix: DistanceMatrix, last: City, unvisited: City[]): number {
    return Math.min(...unvisited.map((city) => matrix.get(last, city)));
}

/**
 * Weight of a minimum spanning tree over the last visited city and the unvisited cities,
 * plus the cheapest way back to the start from any unvisited city.
 * Edges are undirected, weighing the cheaper of the two directions that exist.
 * Any completion of the tour contains such a spanning tree and such a return edge,
 * so this never overestimates.
 */
export function spanningTreeBound(matrix: DistanceMatrix, start: City, last: City, unvisited: City[]): number {
    const link = (a: City, b: City): number => Math.min(
        matrix.has(a, b) ? matrix.get(a, b) : Number.POSITIVE_INFINITY,
        matrix.has(b, a) ? matrix.get(b, a) : Number.POSITIVE_INFINITY);

    // Prim's algorithm, growing the tree from the last visited city
    const outside = new Map<City, number>();
    for (const city of unvisited) {
        outside.set(city, link(last, city));
    }
    let total = 0;
    while (outside.size > 0) {
        let nearest: City | null = null;
        let weight = Number.POSITIVE_INFINITY;
        for (const [city, w] of outside) {
            if (w < weight) {
                nearest = city;
                weight = w;
            }
        }
        if (nearest === null) {
            throw new PreconditionError(
                `No distances connect ${Array.from(outside.keys()).join(", ")} to the tour ending in ${last}`,
                {last, unreachable: Array.from(outside.keys())});
        }
        total += weight;
        outside.delete(nearest);
        for (const [city, w] of outside) {
            outside.set(city, Math.min(w, link(nearest, city)));
        }
    }

    const back = Math.min(...unvisited.map((city) =>
        matrix.has(city, start) ? matrix.get(city, start) : Number.POSITIVE_INFINITY));
    if (back === Number.POSITIVE_INFINITY) {
        throw new PreconditionError(`No distance leads back to ${start} from ${unvisited.join(", ")}`,
            {start, unvisited});
    }
    return total + back;
}
