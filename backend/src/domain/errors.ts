export type TriageErrorCode =
    | "TRANSPORT_FAILURE"
    | "EXTERNAL_SERVICE_FAILURE"
    | "PERSISTENCE_FAILURE"
    | "VALIDATION_FAILURE";

export class TriageError extends Error {
    constructor(
        readonly code: TriageErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Mail connect, fetch or send failed. */
export class TransportFailure extends TriageError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("TRANSPORT_FAILURE", message, options);
    }
}

/** Generative text call errored, timed out or answered with something unusable. */
export class ExternalServiceFailure extends TriageError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("EXTERNAL_SERVICE_FAILURE", message, options);
    }
}

export class PersistenceFailure extends TriageError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("PERSISTENCE_FAILURE", message, options);
    }
}

export class ValidationFailure extends TriageError {
    constructor(message: string, readonly details?: string) {
        super("VALIDATION_FAILURE", message);
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }
    return typeof err === "string" ? err : "unknown";
}
