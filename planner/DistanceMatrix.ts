import {PreconditionError} from "../core/PreconditionError";
import type {City, DistanceTable, Edge} from "../core/Types";

/*
 * DistanceMatrix
 *
 * Directed distances between cities. The matrix need not be symmetric and need not be complete,
 * but every lookup that is made must succeed.
 */

export class DistanceMatrix {
    /**
     * Build a matrix where every edge can be travelled both ways at the same cost.
     */
    public static symmetric(edges: Edge[]): DistanceMatrix {
        const matrix = new DistanceMatrix();
        for (const [from, to, cost] of edges) {
            matrix.set(from, to, cost);
            matrix.set(to, from, cost);
        }
        return matrix;
    }

    public static fromTable(table: DistanceTable): DistanceMatrix {
        const matrix = new DistanceMatrix();
        for (const from of Object.keys(table)) {
            for (const to of Object.keys(table[from])) {
                matrix.set(from, to, table[from][to]);
            }
        }
        return matrix;
    }

    private rows: Map<City, Map<City, number>> = new Map();

    public has(from: City, to: City): boolean {
        const row = this.rows.get(from);
        return row !== undefined && row.has(to);
    }

    /**
     * @throws PreconditionError if there is no entry for the pair.
     */
    public get(from: City, to: City): number {
        const row = this.rows.get(from);
        const cost = row === undefined ? undefined : row.get(to);
        if (cost === undefined) {
            throw new PreconditionError(`Missing distance from ${from} to ${to}`, {from, to});
        }
        return cost;
    }

    private set(from: City, to: City, cost: number): void {
        if (!Number.isFinite(cost) || cost < 0) {
            throw new PreconditionError(`Invalid distance ${cost} from ${from} to ${to}`, {from, to, cost});
        }
        let row = this.rows.get(from);
        if (row === undefined) {
            row = new Map();
            this.rows.set(from, row);
        }
        row.set(to, cost);
    }
}
