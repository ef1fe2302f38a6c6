// services/agent/src/core/pipeline/types.ts

import type { UploadError } from './errors.js'

/* -------------------------------------------------------------------------- */
/*  Measurements                                                              */
/* -------------------------------------------------------------------------- */

export type MetricValue = number | null

/** Metric name -> reading, in the order the instrument reports them. */
export type MetricMap = Record<string, MetricValue>

export interface MeasurementTimestamp {
    /** Acquisition instant, ISO-8601 with the instrument's UTC offset. */
    wall: string
    /** Process monotonic clock (ms) when the reader produced the value. */
    monotonicMs: number
}

export interface Measurement {
    sensorId: string
    /** Strictly increasing per sensorId; never reused across restarts. */
    sequence: number
    timestamp: MeasurementTimestamp
    values: MetricMap
}

/** Last measurement ever appended for a sensor. */
export interface ResumePoint {
    sequence: number
    wall: string
}

/* -------------------------------------------------------------------------- */
/*  Delivery                                                                  */
/* -------------------------------------------------------------------------- */

export type DeliveryReceipt =
    | {
        ok: true
        /** Sequence numbers accepted: the whole batch or a strict prefix of it. */
        accepted: number[]
    }
    | {
        ok: false
        error: UploadError
    }

/* -------------------------------------------------------------------------- */
/*  Capabilities                                                              */
/* -------------------------------------------------------------------------- */

/**
 * Produces one measurement per call, or throws a ReadError.
 * The reader owns the sequence counter for its sensor.
 */
export interface InstrumentReader {
    readonly sensorId: string
    read(signal?: AbortSignal): Promise<Measurement>
    /** Take back a measurement the store refused; it is returned by the next read(). */
    pushBack?(measurement: Measurement): void
    close?(): Promise<void>
}

/** Transmits a batch and reports the outcome. Never touches the store. */
export interface Uploader {
    readonly id: string
    send(batch: readonly Measurement[], signal?: AbortSignal): Promise<DeliveryReceipt>
    close?(): Promise<void>
}

/** Omit applied to each member of a union (events are built without `at`). */
export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never
