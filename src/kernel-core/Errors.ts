/**
 * Label Kernel Error Taxonomy
 * Centralized error codes for lookups, misuse and storage rejections.
 */

export enum ErrorCode {
    // I. Lookup
    NOT_FOUND = 'NOT_FOUND',

    // II. Misuse (fatal, never retried)
    PRECONDITION_VIOLATED = 'PRECONDITION_VIOLATED',

    // III. Identity
    IDENTIFIER_CONFLICT = 'IDENTIFIER_CONFLICT',

    // IV. Storage
    CONSTRAINT_VIOLATION = 'CONSTRAINT_VIOLATION',

    // V. Boundary
    INVALID_REQUEST = 'INVALID_REQUEST',
}

export class LabelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Label:${code}] ${message}`);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when a lookup by unique key (name, uuid, value) yields no row.
 */
export class NotFoundError extends LabelError {
    constructor(entity: string, key: string | number) {
        super(ErrorCode.NOT_FOUND, `${entity} '${key}' not found`, { entity, key });
    }
}

/**
 * Thrown when an operation is invoked on an entity that was never persisted.
 */
export class PreconditionViolatedError extends LabelError {
    constructor(message: string, metadata?: Record<string, unknown>) {
        super(ErrorCode.PRECONDITION_VIOLATED, message, metadata);
    }
}

/**
 * Thrown when a caller-supplied object uuid is already taken.
 */
export class IdentifierConflictError extends LabelError {
    constructor(uuid: string) {
        super(ErrorCode.IDENTIFIER_CONFLICT, `Object uuid '${uuid}' is already assigned`, { uuid });
    }
}

/**
 * Thrown when the store rejects a write (uniqueness, foreign key).
 */
export class ConstraintViolationError extends LabelError {
    constructor(message: string, underlying?: unknown) {
        super(ErrorCode.CONSTRAINT_VIOLATION, message, { underlying });
    }
}

export class InvalidRequestError extends LabelError {
    constructor(message: string, issues: unknown) {
        super(ErrorCode.INVALID_REQUEST, message, { issues });
    }
}

export function isLabelError(e: unknown): e is LabelError {
    return e instanceof LabelError;
}
