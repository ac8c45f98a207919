import {expect} from "chai";
import {describe, it} from "mocha";
import {PreconditionError} from "../core/PreconditionError";
import {aStarSearch} from "../planner/AStarSearch";
import type {SearchProblem} from "../planner/Graph";

/*
 * test-astar
 *
 * Tests for the generic A* engine, on small hand-made graphs.
 */

type Edges = {[from: string]: Array<[string, number]>};

/**
 * A directed weighted graph searched from "S"; the action is the name of the node moved to.
 */
class WeightedGraph implements SearchProblem<string, string> {
    constructor(
        private edges: Edges,
        private goal: string,
        private estimates: {[node: string]: number} = {},
    ) {}

    public initialState(): string {
        return "S";
    }

    public isGoal(state: string): boolean {
        return state === this.goal;
    }

    public actions(state: string): string[] {
        return (this.edges[state] || []).map(([to]) => to);
    }

    public result(state: string, action: string): string {
        return action;
    }

    public cost(state: string, action: string): number {
        const edge = (this.edges[state] || []).find(([to]) => to === action);
        if (edge === undefined) {
            throw new Error(`No edge ${state} -> ${action}`);
        }
        return edge[1];
    }

    public heuristic(state: string): number {
        return state in this.estimates ? this.estimates[state] : 0;
    }

    public stateKey(state: string): string {
        return state;
    }
}

/**
 * An endless chain 0 -> 1 -> 2 -> ... that never reaches a goal.
 */
class EndlessChain implements SearchProblem<number, "next"> {
    constructor(private delayMs: number) {}

    public initialState(): number {
        return 0;
    }

    public isGoal(): boolean {
        return false;
    }

    public actions(): Array<"next"> {
        return ["next"];
    }

    public result(state: number): number {
        return state + 1;
    }

    public cost(): number {
        return 1;
    }

    public heuristic(): number {
        const until = Date.now() + this.delayMs;
        while (Date.now() < until) {
            // busy wait
        }
        return 0;
    }

    public stateKey(state: number): string {
        return String(state);
    }
}

interface Point {
    x: number;
}

/**
 * A line of points 0 -> 1 -> ... -> length, with plain objects as states.
 */
class PointLine implements SearchProblem<Point, number> {
    constructor(private length: number) {}

    public initialState(): Point {
        return {x: 0};
    }

    public isGoal(state: Point): boolean {
        return state.x === this.length;
    }

    public actions(state: Point): number[] {
        return state.x < this.length ? [state.x + 1] : [];
    }

    public result(state: Point, action: number): Point {
        return {x: action};
    }

    public cost(): number {
        return 1;
    }

    public heuristic(): number {
        return 0;
    }

    public stateKey(state: Point): string {
        return String(state.x);
    }
}

describe("aStarSearch", () => {
    it("finds the cheapest path and reconstructs it from the start", () => {
        const graph = new WeightedGraph({
            S: [["A", 2], ["B", 1]],
            A: [["G", 2]],
            B: [["G", 5]],
        }, "G");

        const result = aStarSearch(graph);

        expect(result.status).to.equal("success");
        expect(result.state).to.equal("G");
        expect(result.cost).to.equal(4);
        expect(result.path).to.deep.equal([
            {action: "A", child: "A", cost: 2},
            {action: "G", child: "G", cost: 2},
        ]);
    });

    it("tells states apart by their key, not by object identity or toString", () => {
        const result = aStarSearch(new PointLine(3));

        expect(result.status).to.equal("success");
        expect(result.cost).to.equal(3);
        expect(result.path.map((step) => step.child)).to.deep.equal([{x: 1}, {x: 2}, {x: 3}]);
        expect(result.visited).to.equal(4);
        expect(result.expanded).to.equal(4);
    });

    it("returns the start node when the start is a goal", () => {
        const result = aStarSearch(new WeightedGraph({}, "S"));

        expect(result.status).to.equal("success");
        expect(result.path).to.deep.equal([]);
        expect(result.cost).to.equal(0);
        expect(result.node !== null && result.node.parent).to.equal(null);
        expect(result.visited).to.equal(1);
        expect(result.expanded).to.equal(1);
    });

    it("reopens a state that is reached again by a strictly cheaper path", () => {
        // The estimate for B delays it until C has already been reached through A at cost 6
        const graph = new WeightedGraph({
            S: [["A", 1], ["B", 1]],
            A: [["C", 5]],
            B: [["C", 1]],
            C: [["G", 1]],
        }, "G", {B: 3});

        const result = aStarSearch(graph);

        expect(result.status).to.equal("success");
        expect(result.cost).to.equal(3);
        expect(result.path.map((step) => step.action)).to.deep.equal(["B", "C", "G"]);
        expect(result.visited).to.equal(6);
        expect(result.expanded).to.equal(5);
    });

    it("links every node to its parent and the action that produced it", () => {
        const graph = new WeightedGraph({S: [["A", 1]], A: [["G", 2]]}, "G");

        const goal = aStarSearch(graph).node;

        expect(goal === null ? null : goal.action).to.equal("G");
        const parent = goal === null ? null : goal.parent;
        expect(parent === null ? null : parent.state).to.equal("A");
        expect(parent === null ? null : parent.pathCost).to.equal(1);
    });

    it("reports exhaustion when the frontier runs out", () => {
        const graph = new WeightedGraph({S: [["A", 1]], A: []}, "G");

        const result = aStarSearch(graph);

        expect(result.status).to.equal("failure");
        expect(result.node).to.equal(null);
        expect(result.state).to.equal(null);
        expect(result.path).to.deep.equal([]);
        expect(result.cost).to.equal(-1);
        expect(result.visited).to.equal(2);
        expect(result.expanded).to.equal(2);
    });

    it("stops with a failure after the maximum number of expansions", () => {
        const result = aStarSearch(new EndlessChain(0), {maxExpansions: 5});

        expect(result.status).to.equal("failure");
        expect(result.expanded).to.equal(5);
        expect(result.visited).to.equal(6);
    });

    it("stops with a timeout when the time limit is exceeded", () => {
        const result = aStarSearch(new EndlessChain(2), {timeout: 0.02});

        expect(result.status).to.equal("timeout");
        expect(result.node).to.equal(null);
        expect(result.expanded).to.be.greaterThan(0);
    });

    it("rejects a negative cost", () => {
        const graph = new WeightedGraph({S: [["A", -1]]}, "A");

        expect(() => aStarSearch(graph)).to.throw(PreconditionError, "Invalid cost -1 for action A from state S");
    });

    it("rejects a heuristic that is not a finite non-negative number", () => {
        const graph = new WeightedGraph({S: [["A", 1]]}, "A", {A: Number.NaN});

        expect(() => aStarSearch(graph)).to.throw(PreconditionError, "Invalid heuristic NaN for state A");
    });

    it("rejects malformed options", () => {
        const graph = new WeightedGraph({}, "S");

        expect(() => aStarSearch(graph, {maxExpansions: 0})).to.throw(PreconditionError, "Invalid search options");
        expect(() => aStarSearch(graph, {timeout: -1})).to.throw(PreconditionError, "timeout:");
    });

    it("propagates errors thrown by the problem", () => {
        const graph = new WeightedGraph({S: [["A", 1]]}, "A");
        graph.actions = () => ["Z"];

        expect(() => aStarSearch(graph)).to.throw(Error, "No edge S -> Z");
    });
});
