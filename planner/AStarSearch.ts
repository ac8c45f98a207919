import {Dictionary, PriorityQueue} from "typescript-collections";
import {z} from "zod";
import {PreconditionError} from "../core/PreconditionError";
import {parseOrThrow} from "../core/Validation";
import {SearchResult} from "./Graph";
import type {SearchProblem, Successor} from "./Graph";

/*
 * AStarSearch
 *
 * This module contains an implementation of the A* algorithm.
 */

export const SearchOptionsSchema = z.object({
    // Maximum time (in seconds) to spend searching
    timeout: z.number().positive().optional(),
    // Maximum number of nodes taken from the frontier
    maxExpansions: z.number().int().positive().optional(),
}).strict();

export type SearchOptions = z.infer<typeof SearchOptionsSchema>;

/**
 * A* search implementation, parameterised by the 'State' and 'Action' types of the problem.
 * @param problem: The state space to search.
 * @param options: Optional limits; the search is unbounded without them.
 * @returns A search result, which contains the goal node, the path from the initial state to it,
 *          the cost of this path, and some statistics.
 *          Running out of nodes or of expansions gives status 'failure', running out of time 'timeout'.
 * @throws PreconditionError if the problem yields a negative or non-finite cost or heuristic,
 *         or if the options are malformed. Errors thrown by the problem itself propagate unchanged.
 */
export function aStarSearch<State, Action>(problem: SearchProblem<State, Action>,
                                           options: SearchOptions = {}): SearchResult<State, Action> {
    const {timeout, maxExpansions} = parseOrThrow(SearchOptionsSchema, options, "search options");
    const endTime = timeout === undefined ? Number.POSITIVE_INFINITY : Date.now() + timeout * 1000;

    // Frontier is a priority queue of nodes that will be examined, it is sorted by the estimated cost of nodes
    const frontier = new Frontier<State, Action>();

    // Best path cost found so far for every state that has been added to the frontier
    const explored = new Dictionary<State, number>((state) => problem.stateKey(state));

    let inserted = 0;
    let expanded = 0;

    const start = problem.initialState();
    frontier.add(new SearchNode<State, Action>(start, null, 0, heuristicOf(problem, start), inserted++));
    explored.setValue(start, 0);

    while (true) {
        if (Date.now() > endTime) {
            return new SearchResult<State, Action>("timeout", null, [], -1, inserted, expanded);
        }
        if (maxExpansions !== undefined && expanded >= maxExpansions) {
            return new SearchResult<State, Action>("failure", null, [], -1, inserted, expanded);
        }

        // Find node with min path cost + heuristic
        const current = frontier.dequeue();
        if (current === undefined) {
            // We explored all nodes connected to start, but none lead to goal.
            return new SearchResult<State, Action>("failure", null, [], -1, inserted, expanded);
        }
        expanded++;

        if (problem.isGoal(current.state)) {
            return new SearchResult<State, Action>(
                "success", current, current.reconstructPath(), current.pathCost, inserted, expanded);
        }

        for (const action of problem.actions(current.state)) {
            const next = problem.result(current.state, action);
            const cost = problem.cost(current.state, action, next);
            if (!Number.isFinite(cost) || cost < 0) {
                throw new PreconditionError(
                    `Invalid cost ${cost} for action ${String(action)} from state ${String(current.state)}`,
                    {state: current.state, action, cost});
            }

            // A state is only added again when it is reached by a strictly cheaper path
            const pathCost = current.pathCost + cost;
            const known = explored.getValue(next);
            if (known === undefined || pathCost < known) {
                explored.setValue(next, pathCost);
                frontier.add(new SearchNode<State, Action>(
                    next,
                    {parent: current, action, cost},
                    pathCost,
                    heuristicOf(problem, next),
                    inserted++));
            }
        }
    }
}

function heuristicOf<State, Action>(problem: SearchProblem<State, Action>, state: State): number {
    const estimate = problem.heuristic(state);
    if (!Number.isFinite(estimate) || estimate < 0) {
        throw new PreconditionError(`Invalid heuristic ${estimate} for state ${String(state)}`, {state, estimate});
    }
    return estimate;
}

/**
 * The edge from a node to its parent.
 */
interface ParentLink<State, Action> {
    parent: SearchNode<State, Action>;
    action: Action;
    cost: number;
}

/**
 * A node of the search tree. Children point to their parent, never the other way.
 */
export class SearchNode<State, Action> {
    constructor(
        public readonly state: State,
        private readonly link: ParentLink<State, Action> | null,
        // Cost of path up to this node
        public readonly pathCost: number,
        // Estimated cost to goal from this node
        public readonly heuristic: number,
        // Insertion order, used to break ties between nodes of equal total cost
        public readonly sequence: number,
    ) {}

    public get parent(): SearchNode<State, Action> | null {
        return this.link === null ? null : this.link.parent;
    }

    public get action(): Action | null {
        return this.link === null ? null : this.link.action;
    }

    /**
     * The total estimated cost of a path over this node
     */
    public totalCost(): number {
        return this.pathCost + this.heuristic;
    }

    /**
     * Reconstruct a path from this node by visiting all linked nodes.
     * @returns Path from start to this node, the start state not included
     */
    public reconstructPath(): Array<Successor<State, Action>> {
        const path: Array<Successor<State, Action>> = [];

        let current: SearchNode<State, Action> = this;
        while (current.link !== null) {
            path.push({action: current.link.action, child: current.state, cost: current.link.cost});
            current = current.link.parent;
        }

        // Reverse order since this list was built from end to start
        return path.reverse();
    }
}

/**
 * Priority queue of search nodes: lowest total cost first, oldest first among equals.
 */
class Frontier<State, Action> {
    private queue: PriorityQueue<SearchNode<State, Action>> =
        new PriorityQueue<SearchNode<State, Action>>((nodeA, nodeB) =>
            (nodeB.totalCost() - nodeA.totalCost()) || (nodeB.sequence - nodeA.sequence));

    public add(searchNode: SearchNode<State, Action>): void {
        this.queue.add(searchNode);
    }

    /**
     * Get and remove the node with the lowest estimated cost
     */
    public dequeue(): SearchNode<State, Action> | undefined {
        return this.queue.dequeue();
    }
}
