/**
 * Error taxonomy for Curio.
 *
 * - PreconditionViolation: a caller broke a contract (e.g. saving a concept without identity). Fatal.
 * - NotFoundError: an identity that is not stored. Recovered locally as an "I don't know" answer.
 * - AmbiguousInputError: an answer that cannot be turned into an attribute value. Recovered as a clarification.
 * - TransientStoreFailure: the persistence layer failed after its retry. Reported per turn.
 */
export type CurioErrorCode = 'PRECONDITION_VIOLATION' | 'NOT_FOUND' | 'AMBIGUOUS_INPUT' | 'TRANSIENT_STORE_FAILURE';

export class CurioError extends Error {
    readonly code: CurioErrorCode;

    constructor(code: CurioErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class PreconditionViolation extends CurioError {
    constructor(message: string) {
        super('PRECONDITION_VIOLATION', message);
    }
}

export class NotFoundError extends CurioError {
    readonly identity: string;

    constructor(identity: string) {
        super('NOT_FOUND', `No concept stored for "${identity}".`);
        this.identity = identity;
    }
}

export class AmbiguousInputError extends CurioError {
    readonly input: string;

    constructor(input: string, message = `Could not extract a value from "${input}".`) {
        super('AMBIGUOUS_INPUT', message);
        this.input = input;
    }
}

export class TransientStoreFailure extends CurioError {
    constructor(message: string, cause?: unknown) {
        super('TRANSIENT_STORE_FAILURE', message, { cause });
    }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
