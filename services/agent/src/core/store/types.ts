// services/agent/src/core/store/types.ts

import type { Measurement, ResumePoint } from '../pipeline/types.js'

/**
 * Durable buffer of measurements that the endpoint has not confirmed yet.
 *
 * Every mutation is a single SQLite transaction, so a crash leaves either the
 * state before or the state after the call. Failures surface as StoreError.
 */
export interface SampleStore {
    /** Durable on return. Throws StoreError('StoreFull') at the capacity ceiling. */
    append(measurement: Measurement): void
    /** Oldest-first, at most maxCount. */
    peekBatch(maxCount: number): Measurement[]
    /** Drops every pending measurement with sequence <= upTo. Idempotent. */
    acknowledge(upToSequence: number): number
    pendingCount(): number

    /** Highest sequence ever appended (any sensor), 0 for a fresh store. */
    lastSequence(): number
    resumePoint(sensorId: string): ResumePoint | null

    /** Moves measurements out of the pending queue into the dead-letter table. */
    deadLetter(measurements: readonly Measurement[], reason: string): number
    deadLetterCount(): number

    close(): void
}

export interface SampleStoreOptions {
    /** ':memory:' or a file path; parent directories are created. */
    path: string
    /** pendingCount ceiling; append fails with StoreFull once it is reached. */
    capacity: number
}
