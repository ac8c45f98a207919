/*
 * A* search over arbitrary state spaces, and the Travelling Salesman Problem as one of them.
 */

export {aStarSearch, SearchNode, SearchOptionsSchema} from "./planner/AStarSearch";
export type {SearchOptions} from "./planner/AStarSearch";
export {SearchResult} from "./planner/Graph";
export type {SearchProblem, SearchStatus, Successor} from "./planner/Graph";
export {DistanceMatrix} from "./planner/DistanceMatrix";
export {nearestNextHop, spanningTreeBound} from "./planner/Heuristics";
export {TourState, TspProblem} from "./planner/TravellingSalesman";
export type {TspOptions} from "./planner/TravellingSalesman";
export {DescribeResult, DescribeTour} from "./core/Describer";
export {InstanceSchema, loadInstance} from "./core/Instance";
export type {Instance} from "./core/Instance";
export {PreconditionError} from "./core/PreconditionError";
export {HEURISTIC_KINDS} from "./core/Types";
export type {City, DistanceTable, Edge, HeuristicKind} from "./core/Types";
