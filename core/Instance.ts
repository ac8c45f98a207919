import {z} from "zod";
import {DistanceMatrix} from "../planner/DistanceMatrix";
import {TspProblem} from "../planner/TravellingSalesman";
import type {TspOptions} from "../planner/TravellingSalesman";
import {parseOrThrow} from "./Validation";

/*
 * Instance
 *
 * Validation of TSP instances given as JSON, e.g.
 * { "name": "triangle", "cities": ["A", "B", "C"], "distances": { "A": { "B": 1, "C": 2 }, ... } }
 */

const distance = z.number().finite().nonnegative();

export const InstanceSchema = z.object({
    name: z.string().min(1).optional(),
    cities: z.array(z.string().min(1)).min(1),
    distances: z.record(z.string(), z.record(z.string(), distance)),
}).superRefine((instance, ctx) => {
    const listed = new Set(instance.cities);
    instance.cities.forEach((city, n) => {
        if (instance.cities.indexOf(city) !== n) {
            ctx.addIssue({code: z.ZodIssueCode.custom, path: ["cities", n], message: `Duplicate city ${city}`});
        }
    });
    for (const from of Object.keys(instance.distances)) {
        if (!listed.has(from)) {
            ctx.addIssue({code: z.ZodIssueCode.custom, path: ["distances", from], message: `Unknown city ${from}`});
        }
        for (const to of Object.keys(instance.distances[from])) {
            if (!listed.has(to)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ["distances", from, to],
                    message: `Unknown city ${to}`,
                });
            }
        }
    }
});

export type Instance = z.infer<typeof InstanceSchema>;

/**
 * Validate a raw instance and build the problem it describes.
 * @throws PreconditionError listing every validation issue.
 */
export function loadInstance(raw: unknown, options: TspOptions = {}): {name: string, problem: TspProblem} {
    const instance = parseOrThrow(InstanceSchema, raw, "instance");
    return {
        name: instance.name || "unnamed",
        problem: new TspProblem(instance.cities, DistanceMatrix.fromTable(instance.distances), options),
    };
}
