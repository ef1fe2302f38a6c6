// services/agent/src/sinks/citiesair/citiesair.payload.ts

import type { UploadErrorKind } from '../../core/pipeline/errors.js'
import type { Measurement, MetricValue } from '../../core/pipeline/types.js'

/** One element of the JSON array POSTed to CITIESair. */
export interface CitiesAirMeasurement {
    /** ISO-8601 with the instrument's offset. */
    ts: string
    /** Temperature (°C). */
    t: MetricValue
    /** Relative humidity (%). */
    h: MetricValue
    /** Pressure in Pa (the instrument reports hPa). */
    p: MetricValue
    p1: MetricValue
    p25: MetricValue
    p10: MetricValue
}

export function toCitiesAirMeasurement(m: Measurement): CitiesAirMeasurement {
    const v = (name: string): MetricValue => m.values[name] ?? null
    const hPa = v('p')

    return {
        ts: m.timestamp.wall,
        t: v('T'),
        h: v('rH'),
        p: hPa === null ? null : Math.round(hPa * 100),
        p1: v('PM1'),
        p25: v('PM2.5'),
        p10: v('PM10'),
    }
}

export type StatusClass = { accepted: true } | { accepted: false; kind: UploadErrorKind }

/**
 * 200 and 207 accept the whole batch.
 * 408 is a timeout and 429 a busy server (both retried); other 4xx are final;
 * 5xx and anything unexpected are retried.
 */
export function classifyStatus(status: number): StatusClass {
    if (status === 200 || status === 207) return { accepted: true }
    if (status === 408) return { accepted: false, kind: 'Timeout' }
    if (status === 429) return { accepted: false, kind: 'ServerError' }
    if (status >= 400 && status < 500) return { accepted: false, kind: 'ServerRejected' }
    return { accepted: false, kind: 'ServerError' }
}
