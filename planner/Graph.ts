import type {SearchNode} from "./AStarSearch";

/* Graph
 *
 * This module contains the types shared by the search engine and the problems it solves.
 */

/**
 * A state space, as seen by the search engine.
 * Implementations must be free of side effects: the engine may call any method
 * any number of times, and independent runs may share one instance.
 */
export interface SearchProblem<State, Action> {
    /** The state the search starts from. */
    initialState(): State;

    isGoal(state: State): boolean;

    /**
     * The actions applicable in a state, in a fixed order.
     * Must be empty exactly when the state is a goal.
     */
    actions(state: State): Action[];

    /** The state reached by applying an action. Throws if the action is not applicable. */
    result(state: State, action: Action): State;

    /** Non-negative cost of the transition from 'state' to 'next' through 'action'. */
    cost(state: State, action: Action, next: State): number;

    /** Non-negative estimate of the cost still needed to reach a goal from 'state'. */
    heuristic(state: State): number;

    /**
     * A key identifying a state by value: two states are the same state exactly when their keys are equal.
     * The engine uses it to recognise states it has already reached.
     */
    stateKey(state: State): string;
}

/**
 * One step of a path: the action taken, the state it led to, and its cost.
 */
export interface Successor<State, Action> {
    action: Action;
    child: State;
    cost: number;
}

export type SearchStatus = "success" | "failure" | "timeout";

/**
 * The class for search results: this is what the function 'aStarSearch' returns.
 * If the search fails: 'status' is 'failure' or 'timeout', 'node' is null, 'path' is [] and 'cost' is negative.
 * If the search succeeds: 'status' is 'success', 'node' is the goal node, and 'path' leads from the
 * start state (not included) to the goal state (included).
 */
export class SearchResult<State, Action> {
    constructor(
        public status: SearchStatus,
        public node: SearchNode<State, Action> | null,
        public path: Array<Successor<State, Action>>,
        public cost: number,     // the path cost g of the goal node
        public visited: number,  // the number of nodes that have been added to the frontier
        public expanded: number, // the number of nodes that have been taken from the frontier
    ) {}

    /**
     * The goal state, i.e. the visited order for a tour.
     */
    public get state(): State | null {
        return this.node === null ? null : this.node.state;
    }
}
