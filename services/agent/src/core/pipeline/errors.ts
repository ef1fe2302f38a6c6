// services/agent/src/core/pipeline/errors.ts

export type ReadErrorKind = 'TransientUnavailable' | 'ProtocolError'
export type StoreErrorKind = 'StoreFull' | 'IOFailure'
export type UploadErrorKind = 'NetworkUnreachable' | 'Timeout' | 'ServerRejected' | 'ServerError'

export class ReadError extends Error {
    readonly kind: ReadErrorKind
    /** Short machine-friendly reason, e.g. 'no-new-data' or 'timeout'. */
    readonly reason: string

    constructor(kind: ReadErrorKind, message: string, opts: { reason?: string; cause?: unknown } = {}) {
        super(message, { cause: opts.cause })
        this.name = 'ReadError'
        this.kind = kind
        this.reason = opts.reason ?? kind
    }
}

export class StoreError extends Error {
    readonly kind: StoreErrorKind

    constructor(kind: StoreErrorKind, message: string, opts: { cause?: unknown } = {}) {
        super(message, { cause: opts.cause })
        this.name = 'StoreError'
        this.kind = kind
    }
}

export class UploadError extends Error {
    readonly kind: UploadErrorKind
    readonly status?: number

    constructor(kind: UploadErrorKind, message: string, opts: { status?: number; cause?: unknown } = {}) {
        super(message, { cause: opts.cause })
        this.name = 'UploadError'
        this.kind = kind
        this.status = opts.status
    }

    /** ServerRejected is the only kind that is never retried for the same batch. */
    get retryable(): boolean {
        return this.kind !== 'ServerRejected'
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

/** Anything a reader throws that is not a ReadError counts as a transient outage. */
export function toReadError(err: unknown): ReadError {
    if (err instanceof ReadError) return err
    return new ReadError('TransientUnavailable', errorMessage(err), { reason: 'unexpected', cause: err })
}

/** Anything an uploader throws that is not an UploadError counts as unreachable. */
export function toUploadError(err: unknown): UploadError {
    if (err instanceof UploadError) return err
    return new UploadError('NetworkUnreachable', errorMessage(err), { cause: err })
}
