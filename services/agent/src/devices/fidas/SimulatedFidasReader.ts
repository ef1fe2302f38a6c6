// services/agent/src/devices/fidas/SimulatedFidasReader.ts

import { performance } from 'node:perf_hooks'

import type { InstrumentReader, Measurement } from '../../core/pipeline/types.js'
import { formatWithOffset } from './utils.js'

// Deterministic PRNG so a given sensor id always produces the same series.
function hashString(s: string): number {
    let h = 0
    for (let i = 0; i < s.length; i++) h = (h * 131 + s.charCodeAt(i)) >>> 0
    return h >>> 0
}

function mulberry32(seed: number): () => number {
    return function () {
        let t = (seed += 0x6D2B79F5)
        t = Math.imul(t ^ (t >>> 15), t | 1)
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    }
}

const round1 = (n: number): number => Math.round(n * 10) / 10

export interface SimulatedReaderOptions {
    sensorId: string
    tzOffsetHours: number
    /** Highest sequence already used. */
    lastSequence: number
    now?: () => number
}

/**
 * Synthetic Fidas readings for running the agent without an instrument.
 * Values drift around a per-sensor baseline; PM1 <= PM2.5 <= PM10 always holds.
 */
export class SimulatedFidasReader implements InstrumentReader {
    readonly sensorId: string

    private readonly tzOffsetHours: number
    private readonly now: () => number
    private readonly rng: () => number
    private readonly pushedBack: Measurement[] = []
    private nextSequence: number

    constructor(opts: SimulatedReaderOptions) {
        this.sensorId = opts.sensorId
        this.tzOffsetHours = opts.tzOffsetHours
        this.now = opts.now ?? Date.now
        this.nextSequence = Math.max(0, opts.lastSequence) + 1
        this.rng = mulberry32(hashString(opts.sensorId) ^ 0x9E3779B9)
    }

    async read(): Promise<Measurement> {
        const back = this.pushedBack.shift()
        if (back) return back

        const pm25 = 8 + this.rng() * 30
        const pm1 = pm25 * (0.6 + this.rng() * 0.2)
        const pm10 = pm25 * (1.3 + this.rng() * 0.7)

        return {
            sensorId: this.sensorId,
            sequence: this.nextSequence++,
            timestamp: { wall: formatWithOffset(this.now(), this.tzOffsetHours), monotonicMs: performance.now() },
            values: {
                PM1: round1(pm1),
                'PM2.5': round1(pm25),
                PM10: round1(pm10),
                rH: round1(35 + this.rng() * 40),
                T: round1(18 + this.rng() * 15),
                p: round1(1000 + this.rng() * 25),
            },
        }
    }

    pushBack(measurement: Measurement): void {
        this.pushedBack.unshift(measurement)
    }
}
