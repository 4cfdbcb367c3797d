/**
 * Error types for the frequency map.
 *
 * Nothing in the core does I/O, so these only ever mean "the input or the
 * geometry code broke a contract". Callers decide per route what to do.
 */

// geometry op handed back something that isn't a line (or a point we can drop)
export class InvalidGeometryKindError extends Error {
    constructor(public readonly kind: string) {
        super(`expected line geometry, got ${kind}`);
        this.name = "InvalidGeometryKindError";
    }
}

export class DegenerateInputError extends Error {
    constructor(public readonly shapeId: string, reason: string) {
        super(`shape ${shapeId}: ${reason}`);
        this.name = "DegenerateInputError";
    }
}

export class ReconciliationLimitError extends Error {
    constructor(public readonly rounds: number, public readonly remaining: number) {
        super(`reconcile did not settle after ${rounds} rounds (${remaining} pieces still pending)`);
        this.name = "ReconciliationLimitError";
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export class MissingTableError extends Error {
    constructor(public readonly table: string, source: string) {
        super(`missing ${table} in ${source}`);
        this.name = "MissingTableError";
    }
}
