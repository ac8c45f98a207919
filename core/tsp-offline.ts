#!/usr/bin/env node
import * as fs from "fs";
import {z} from "zod";
import {aStarSearch} from "../planner/AStarSearch";
import {DescribeResult} from "./Describer";
import {ExampleInstances} from "./ExampleInstances";
import {loadInstance} from "./Instance";
import {PreconditionError} from "./PreconditionError";
import {HEURISTIC_KINDS} from "./Types";
import {parseOrThrow} from "./Validation";

/*
 * tsp-offline
 *
 * This is the main file for the command-line version.
 */

export interface Output {
    log(line: string): void;
    error(line: string): void;
}

const ArgumentsSchema = z.object({
    instance: z.string().min(1),
    heuristic: z.enum(HEURISTIC_KINDS).default("nearest"),
    maxExpansions: z.coerce.number().int().positive().optional(),
    timeout: z.coerce.number().positive().optional(),
});

export type Arguments = z.infer<typeof ArgumentsSchema>;

const flags = new Map<string, "heuristic" | "maxExpansions" | "timeout">([
    ["--heuristic", "heuristic"],
    ["--max-expansions", "maxExpansions"],
    ["--timeout", "timeout"],
]);

export function usage(program: string): string {
    return "Usage: " + program + " (" + Object.keys(ExampleInstances).join(" | ") + " | file.json)" +
        " [--heuristic " + HEURISTIC_KINDS.join("|") + "] [--max-expansions N] [--timeout SECONDS]";
}

/**
 * @throws PreconditionError on unknown flags, missing values or malformed values.
 */
export function parseArguments(argv: string[]): Arguments {
    const raw: {[key: string]: string} = {};
    for (let n = 0; n < argv.length; n++) {
        const arg = argv[n];
        const key = flags.get(arg);
        if (key !== undefined) {
            if (n + 1 >= argv.length) {
                throw new PreconditionError(`Missing value for ${arg}`, {flag: arg});
            }
            raw[key] = argv[++n];
        } else if (arg.startsWith("--")) {
            throw new PreconditionError(`Unknown option ${arg}`, {flag: arg});
        } else if (raw.instance === undefined) {
            raw.instance = arg;
        } else {
            throw new PreconditionError(`Unexpected argument ${arg}`, {argument: arg});
        }
    }
    return parseOrThrow(ArgumentsSchema, raw, "arguments");
}

function readInstance(name: string): unknown {
    if (Object.prototype.hasOwnProperty.call(ExampleInstances, name)) {
        return ExampleInstances[name];
    }
    let text: string;
    try {
        text = fs.readFileSync(name, "utf8");
    } catch (err) {
        throw new PreconditionError(`Cannot read instance ${name}: ${err instanceof Error ? err.message : err}`,
            {instance: name});
    }
    try {
        return JSON.parse(text);
    } catch (err) {
        throw new PreconditionError(`Instance ${name} is not valid JSON: ${err instanceof Error ? err.message : err}`,
            {instance: name});
    }
}

/**
 * Solve one instance and print the result.
 * @returns The exit code: 0 when a route was found, 2 when none was, 1 on bad input.
 */
export function main(argv: string[], out: Output = console, program: string = "tsp-offline"): number {
    let args: Arguments;
    try {
        args = parseArguments(argv);
    } catch (err) {
        if (err instanceof PreconditionError) {
            out.error("ERROR: " + err.message);
            out.error(usage(program));
            return 1;
        }
        throw err;
    }

    try {
        const {name, problem} = loadInstance(readInstance(args.instance), {heuristic: args.heuristic});
        const result = aStarSearch(problem, {maxExpansions: args.maxExpansions, timeout: args.timeout});

        out.log(`Instance: ${name} (${problem.cities.length} cities, heuristic ${problem.heuristicKind})`);
        for (const line of DescribeResult(problem, result)) {
            out.log(line);
        }
        return result.status === "success" ? 0 : 2;
    } catch (err) {
        if (err instanceof PreconditionError) {
            out.error("ERROR: " + err.message);
            return 1;
        }
        throw err;
    }
}

if (require.main === module) {
    process.exitCode = main(process.argv.slice(2), console, process.argv[1].replace(/^.*\//, ""));
}
