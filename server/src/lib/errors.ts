import type { EntityKind } from "../types/entities.js";

/**
 * Base class for every failure the core reports. Each subclass carries the
 * HTTP status and machine-readable code the route layer answers with.
 */
export abstract class DomainError extends Error {
    abstract readonly statusCode: number;
    abstract readonly code: string;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

    /** Extra fields merged into the error response body. */
    details(): Record<string, unknown> {
        return {};
    }
}

export interface FieldIssue {
    field: string;
    reason: string;
}

export class ValidationError extends DomainError {
    readonly statusCode = 400;
    readonly code = "VALIDATION_ERROR";
    readonly field: string;
    readonly reason: string;

    constructor(readonly issues: [FieldIssue, ...FieldIssue[]]) {
        super(`${issues[0].field}: ${issues[0].reason}`);
        this.field = issues[0].field;
        this.reason = issues[0].reason;
    }

    static of(field: string, reason: string): ValidationError {
        return new ValidationError([{ field, reason }]);
    }

    details() {
        return { field: this.field, issues: this.issues };
    }
}

export class ReferenceError extends DomainError {
    readonly statusCode = 404;
    readonly code = "REFERENCE_NOT_FOUND";

    constructor(readonly missingField: string, readonly missingId: string) {
        super(`${missingField} "${missingId}" does not exist`);
    }

    details() {
        return { field: this.missingField, id: this.missingId };
    }
}

export class NotFoundError extends DomainError {
    readonly statusCode = 404;
    readonly code = "NOT_FOUND";

    constructor(readonly kind: EntityKind | "media", readonly id: string) {
        super(`${kind} "${id}" not found`);
    }

    details() {
        return { kind: this.kind, id: this.id };
    }
}

export class ConflictError extends DomainError {
    readonly statusCode = 409;
    readonly code = "CONFLICT";

    constructor(
        readonly targetKind: EntityKind,
        readonly targetId: string,
        readonly dependentKind: EntityKind,
        readonly dependentIds: string[],
    ) {
        super(`${targetKind} "${targetId}" is still referenced by ${dependentIds.length} ${dependentKind}(s)`);
    }

    details() {
        return { dependentKind: this.dependentKind, dependentIds: this.dependentIds };
    }
}

export class CapacityError extends DomainError {
    readonly statusCode = 409;
    readonly code = "CAPACITY_EXCEEDED";

    constructor(readonly requested: number, readonly available: number) {
        super(`Requested ${requested} seats but only ${available} available`);
    }

    details() {
        return { requested: this.requested, available: this.available };
    }
}

/** Store, blob or lock infrastructure failure. Never a domain rule. */
export class UnavailableError extends DomainError {
    readonly statusCode = 503;
    readonly code = "UNAVAILABLE";

    constructor(message: string, readonly origin?: unknown) {
        super(message);
    }
}
