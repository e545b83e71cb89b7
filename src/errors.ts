// --- Error Types ---

export type PatientSyncErrorCode = 'validation' | 'remote' | 'transport' | 'persistence' | 'conflict';

/** Base class for every failure surfaced by the sync layer. */
export class PatientSyncError extends Error {
    constructor(public readonly code: PatientSyncErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PatientSyncError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A local precondition was not met (nothing to upload, no server id to
 * download, no stored record). Thrown synchronously, before any request.
 */
export class ValidationError extends PatientSyncError {
    constructor(message: string) {
        super('validation', message);
        this.name = 'ValidationError';
    }
}

/**
 * The server answered with a non-2xx status, or with a body we could not use.
 * `status` is 0 when the body reached us without its HTTP status.
 */
export class RemoteError extends PatientSyncError {
    constructor(public readonly status: number, public readonly body: string, message?: string) {
        super('remote', message ?? `HTTP ${status}: ${body}`);
        this.name = 'RemoteError';
    }
}

/** The request never produced a response (DNS, refused connection, reset, abort). */
export class TransportError extends PatientSyncError {
    constructor(message: string, cause: unknown) {
        super('transport', message, { cause });
        this.name = 'TransportError';
    }
}

/**
 * Writing to the local store failed. After a successful remote write this
 * leaves local and remote out of step, so it is always reported.
 */
export class PersistenceError extends PatientSyncError {
    constructor(message: string, cause?: unknown) {
        super('persistence', message, { cause });
        this.name = 'PersistenceError';
    }
}

export class SyncConflictError extends PatientSyncError {
    constructor(message: string) {
        super('conflict', message);
        this.name = 'SyncConflictError';
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
