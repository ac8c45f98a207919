/**
 * Thrown when a problem definition or a caller breaks a precondition of the search:
 * an action applied twice, a missing distance, a negative cost, a malformed instance.
 * These abort the run; they are never retried or replaced by defaults.
 */
export class PreconditionError extends Error {
    constructor(m: string, public readonly details: {[key: string]: unknown} = {}) {
        super(m);
        Object.setPrototypeOf(this, PreconditionError.prototype);
        this.name = "PreconditionError";
    }
}
