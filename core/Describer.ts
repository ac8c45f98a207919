import type {SearchResult} from "../planner/Graph";
import type {TourState, TspProblem} from "../planner/TravellingSalesman";
import type {City} from "./Types";

/**
 * Describe a tour as its cities in order.
 *
 * @returns: e.g. "A -> B -> C".
 */
export function DescribeTour(state: TourState): string {
    return state.cities.join(" -> ");
}

/**
 * Describe the outcome of a search for a tour, one line per item.
 *
 * @param problem: The problem that was searched.
 * @param result: What the search returned.
 * @returns: The lines to print.
 */
export function DescribeResult(problem: TspProblem, result: SearchResult<TourState, City>): string[] {
    const statistics = `Nodes added to the frontier: ${result.visited}, expanded: ${result.expanded}`;
    if (result.node === null) {
        const reason = result.status === "timeout" ? "the search timed out" : "the search space was exhausted";
        return [`No route found: ${reason}`, statistics];
    }
    const state = result.node.state;
    return [
        `Visited cities in order: ${DescribeTour(state)}`,
        `Path cost: ${result.cost}`,
        `Round trip cost: ${problem.tourCost(state)}`,
        "Full path:",
        ...result.path.map((step, n) => `  ${n + 1}. ${step.action} (+${step.cost}) ${DescribeTour(step.child)}`),
        statistics,
    ];
}
