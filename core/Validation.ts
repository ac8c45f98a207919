import type {z} from "zod";
import {PreconditionError} from "./PreconditionError";

/**
 * Validate a value against a zod schema.
 * @param what: A short name of the value, used in the error message.
 * @returns The parsed value.
 * @throws PreconditionError listing every issue as "path: message".
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.output<T> {
    const parsed = schema.safeParse(value);
    if (parsed.success) {
        return parsed.data;
    }
    const issues = parsed.error.issues.map((issue) =>
        `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`);
    throw new PreconditionError(`Invalid ${what}: ${issues.join("; ")}`, {issues});
}
