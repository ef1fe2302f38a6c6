// services/agent/src/core/pump/types.ts

import type { UploadErrorKind } from '../pipeline/errors.js'
import type { BackoffPolicy } from './backoff.js'

/* -------------------------------------------------------------------------- */
/*  Configuration                                                             */
/* -------------------------------------------------------------------------- */

export interface PumpConfig {
    /** Fixed tick interval. */
    pollIntervalMs: number
    /** Maximum reads per tick (>= 1). */
    readsPerTick: number
    /** Bound on a single reader.read(). */
    readTimeoutMs: number
    /** Maximum measurements handed to one uploader.send(). */
    maxBatchSize: number
    /** Bound on a single uploader.send(). */
    uploadTimeoutMs: number
    backoff: BackoffPolicy
}

/* -------------------------------------------------------------------------- */
/*  State + Stats                                                             */
/* -------------------------------------------------------------------------- */

export type PumpPhase = 'Idle' | 'Polling' | 'Uploading' | 'BackingOff' | 'ShuttingDown'

export interface PumpStats {
    reads: number
    skippedReads: number
    protocolErrors: number
    appended: number
    storeFull: number
    /** Measurements lost because the store was full and the reader could not take them back. */
    dropped: number
    batchesSent: number
    acknowledged: number
    uploadFailures: number
    backoffCycles: number
    deadLettered: number
    lastAppendAt: number | null
    lastAcknowledgeAt: number | null
    lastErrorAt: number | null
}

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                  */
/* -------------------------------------------------------------------------- */

export interface PumpEventSink {
    publish(evt: PumpEvent): void
}

export type PumpEvent =
    | {
        kind: 'phase-changed'
        at: number
        from: PumpPhase
        to: PumpPhase
    }
    | {
        kind: 'read-skipped'
        at: number
        reason: string
        error: string
    }
    | {
        kind: 'read-protocol-error'
        at: number
        error: string
    }
    | {
        kind: 'appended'
        at: number
        sequence: number
        pending: number
    }
    | {
        kind: 'store-full'
        at: number
        sequence: number
        pushedBack: boolean
    }
    | {
        kind: 'batch-acknowledged'
        at: number
        firstSequence: number
        lastSequence: number
        count: number
        pending: number
    }
    | {
        kind: 'receipt-not-prefix'
        at: number
        expected: number[]
        accepted: number[]
    }
    | {
        kind: 'upload-failed'
        at: number
        errorKind: UploadErrorKind
        status?: number
        error: string
        retryable: boolean
        batchSize: number
    }
    | {
        kind: 'backoff-started'
        at: number
        attempt: number
        delayMs: number
    }
    | {
        kind: 'dead-lettered'
        at: number
        firstSequence: number
        lastSequence: number
        count: number
        reason: string
    }
    | {
        kind: 'stop-requested'
        at: number
        phase: PumpPhase
    }
    | {
        kind: 'stopped'
        at: number
    }
    | {
        kind: 'fatal-error'
        at: number
        error: string
    }
