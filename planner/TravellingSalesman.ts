import {PreconditionError} from "../core/PreconditionError";
import type {City, HeuristicKind} from "../core/Types";
import type {DistanceMatrix} from "./DistanceMatrix";
import type {SearchProblem} from "./Graph";
import {nearestNextHop, spanningTreeBound} from "./Heuristics";

/*
 * TravellingSalesman
 *
 * The Travelling Salesman Problem as a state space: a state is the tour visited so far,
 * an action is the next city to visit.
 */

/**
 * An immutable tour prefix. Two states are the same state when they visit the same cities in the same order,
 * which is what toString() encodes; TspProblem.stateKey uses it.
 */
export class TourState {
    public readonly cities: ReadonlyArray<City>;

    constructor(cities: ReadonlyArray<City>) {
        this.cities = Object.freeze(cities.slice());
    }

    public get length(): number {
        return this.cities.length;
    }

    public contains(city: City): boolean {
        return this.cities.indexOf(city) >= 0;
    }

    /**
     * @throws PreconditionError if the tour is empty.
     */
    public first(): City {
        if (this.cities.length === 0) {
            throw new PreconditionError("An empty tour has no first city");
        }
        return this.cities[0];
    }

    /**
     * @throws PreconditionError if the tour is empty.
     */
    public last(): City {
        if (this.cities.length === 0) {
            throw new PreconditionError("An empty tour has no last city");
        }
        return this.cities[this.cities.length - 1];
    }

    public append(city: City): TourState {
        return new TourState(this.cities.concat([city]));
    }

    public toString(): string {
        return JSON.stringify(this.cities);
    }
}

export interface TspOptions {
    heuristic?: HeuristicKind;
}

/**
 * A TSP instance. The tour starts at the first city of the list.
 */
export class TspProblem implements SearchProblem<TourState, City> {
    public readonly cities: ReadonlyArray<City>;
    public readonly heuristicKind: HeuristicKind;

    /**
     * @throws PreconditionError if the city list is empty or contains duplicates.
     */
    constructor(cities: ReadonlyArray<City>, public readonly distances: DistanceMatrix, options: TspOptions = {}) {
        if (cities.length === 0) {
            throw new PreconditionError("A TSP instance needs at least one city");
        }
        const duplicates = cities.filter((city, n) => cities.indexOf(city) !== n);
        if (duplicates.length > 0) {
            throw new PreconditionError(`Duplicate cities: ${duplicates.join(", ")}`, {duplicates});
        }
        this.cities = Object.freeze(cities.slice());
        this.heuristicKind = options.heuristic || "nearest";
    }

    public initialState(): TourState {
        return new TourState([this.cities[0]]);
    }

    public isGoal(state: TourState): boolean {
        return state.length === this.cities.length;
    }

    public actions(state: TourState): City[] {
        return this.cities.filter((city) => !state.contains(city));
    }

    public result(state: TourState, action: City): TourState {
        if (this.cities.indexOf(action) < 0) {
            throw new PreconditionError(`Unknown city ${action}`, {state: state.cities, action});
        }
        if (state.contains(action)) {
            throw new PreconditionError(`City ${action} is already visited in ${state}`, {state: state.cities, action});
        }
        return state.append(action);
    }

    public cost(state: TourState, action: City, next: TourState): number {
        return this.distances.get(state.last(), action);
    }

    public stateKey(state: TourState): string {
        return state.toString();
    }

    public heuristic(state: TourState): number {
        if (this.isGoal(state)) {
            // Estimate cost to return to the start (making it a round trip)
            return this.returnCost(state);
        }
        switch (this.heuristicKind) {
        case "nearest":
            return nearestNextHop(this.distances, state.last(), this.actions(state));
        case "uniform":
            return 0;
        case "mst":
            return spanningTreeBound(this.distances, state.first(), state.last(), this.actions(state));
        }
    }

    /**
     * The cost of a complete tour, including the edge back to the start.
     * @throws PreconditionError if the tour does not visit every city.
     */
    public tourCost(state: TourState): number {
        if (!this.isGoal(state)) {
            throw new PreconditionError(`Tour ${state} does not visit every city`, {state: state.cities});
        }
        let total = 0;
        for (let n = 1; n < state.length; n++) {
            total += this.distances.get(state.cities[n - 1], state.cities[n]);
        }
        return total + this.returnCost(state);
    }

    private returnCost(state: TourState): number {
        // A single-city tour is already back at the start
        return state.length === 1 ? 0 : this.distances.get(state.last(), state.first());
    }
}
