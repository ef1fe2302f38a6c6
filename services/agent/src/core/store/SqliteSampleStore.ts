import type Database from 'better-sqlite3'

import { StoreError, errorMessage } from '../pipeline/errors.js'
import type { Measurement, MetricMap, ResumePoint } from '../pipeline/types.js'
import { createStoreDatabase } from './schema.js'
import type { SampleStore, SampleStoreOptions } from './types.js'

interface MeasurementRow {
    sequence: number
    sensor_id: string
    wall: string
    monotonic_ms: number
    metric_values: string
}

interface CountRow {
    c: number
}

interface MaxRow {
    m: number | null
}

interface ResumeRow {
    sequence: number
    wall: string
}

/**
 * SQLite-backed SampleStore (better-sqlite3).
 *
 * - pending_measurements is the queue, keyed and ordered by sequence
 * - resume_points remembers the last appended measurement per sensor, so the
 *   reader can continue after everything has been acknowledged and deleted
 * - failed_measurements holds batches the endpoint rejected for good
 *
 * The store is owned by the pump; nothing else writes to the database.
 */
export class SqliteSampleStore implements SampleStore {
    private readonly db: Database.Database
    private readonly capacity: number

    private constructor(db: Database.Database, capacity: number) {
        this.db = db
        this.capacity = capacity
    }

    /** Opens (or creates) the store. Throws StoreError('IOFailure') if the file cannot be used. */
    static open(opts: SampleStoreOptions): SqliteSampleStore {
        if (!Number.isInteger(opts.capacity) || opts.capacity < 1) {
            throw new StoreError('IOFailure', `invalid store capacity ${opts.capacity}`)
        }
        try {
            return new SqliteSampleStore(createStoreDatabase(opts.path), opts.capacity)
        } catch (err) {
            throw new StoreError('IOFailure', `cannot open sample store path=${opts.path}: ${errorMessage(err)}`, { cause: err })
        }
    }

    append(measurement: Measurement): void {
        this.guard('append', () => {
            const tx = this.db.transaction((m: Measurement) => {
                const pending = this.countPending()
                if (pending >= this.capacity) {
                    throw new StoreError('StoreFull', `sample store full pending=${pending} capacity=${this.capacity}`)
                }

                const last = this.maxSequence()
                if (m.sequence <= last) {
                    throw new StoreError(
                        'IOFailure',
                        `sequence ${m.sequence} is not after last appended sequence ${last} sensor=${m.sensorId}`
                    )
                }

                this.db
                    .prepare<[number, string, string, number, string]>(
                        `INSERT INTO pending_measurements (sequence, sensor_id, wall, monotonic_ms, metric_values)
                         VALUES (?, ?, ?, ?, ?)`
                    )
                    .run(m.sequence, m.sensorId, m.timestamp.wall, m.timestamp.monotonicMs, JSON.stringify(m.values))

                this.db
                    .prepare<[string, number, string]>(
                        `INSERT INTO resume_points (sensor_id, sequence, wall) VALUES (?, ?, ?)
                         ON CONFLICT(sensor_id) DO UPDATE SET sequence = excluded.sequence, wall = excluded.wall`
                    )
                    .run(m.sensorId, m.sequence, m.timestamp.wall)
            })
            tx(measurement)
        })
    }

    peekBatch(maxCount: number): Measurement[] {
        if (maxCount <= 0) return []
        return this.guard('peekBatch', () => {
            const rows = this.db
                .prepare<[number], MeasurementRow>(
                    `SELECT sequence, sensor_id, wall, monotonic_ms, metric_values
                     FROM pending_measurements ORDER BY sequence ASC LIMIT ?`
                )
                .all(Math.floor(maxCount))
            return rows.map(rowToMeasurement)
        })
    }

    acknowledge(upToSequence: number): number {
        return this.guard('acknowledge', () => {
            const res = this.db
                .prepare<[number]>('DELETE FROM pending_measurements WHERE sequence <= ?')
                .run(upToSequence)
            return res.changes
        })
    }

    pendingCount(): number {
        return this.guard('pendingCount', () => this.countPending())
    }

    lastSequence(): number {
        return this.guard('lastSequence', () => this.maxSequence())
    }

    resumePoint(sensorId: string): ResumePoint | null {
        return this.guard('resumePoint', () => {
            const row = this.db
                .prepare<[string], ResumeRow>('SELECT sequence, wall FROM resume_points WHERE sensor_id = ?')
                .get(sensorId)
            return row ? { sequence: row.sequence, wall: row.wall } : null
        })
    }

    deadLetter(measurements: readonly Measurement[], reason: string): number {
        if (measurements.length === 0) return 0
        return this.guard('deadLetter', () => {
            const tx = this.db.transaction((batch: readonly Measurement[]) => {
                const insert = this.db.prepare<[number, string, string, number, string, string]>(
                    `INSERT OR REPLACE INTO failed_measurements (sequence, sensor_id, wall, monotonic_ms, metric_values, reason)
                     VALUES (?, ?, ?, ?, ?, ?)`
                )
                const remove = this.db.prepare<[number]>('DELETE FROM pending_measurements WHERE sequence = ?')

                let moved = 0
                for (const m of batch) {
                    const res = remove.run(m.sequence)
                    // already acknowledged or already moved: nothing to do
                    if (res.changes === 0) continue
                    insert.run(m.sequence, m.sensorId, m.timestamp.wall, m.timestamp.monotonicMs, JSON.stringify(m.values), reason)
                    moved++
                }
                return moved
            })
            return tx(measurements)
        })
    }

    deadLetterCount(): number {
        return this.guard('deadLetterCount', () => {
            const row = this.db.prepare<[], CountRow>('SELECT COUNT(*) AS c FROM failed_measurements').get()
            return row ? row.c : 0
        })
    }

    close(): void {
        if (!this.db.open) return
        this.guard('close', () => {
            this.db.pragma('wal_checkpoint(TRUNCATE)')
            this.db.close()
        })
    }

    /* ---------------------------------------------------------------------- */

    private countPending(): number {
        const row = this.db.prepare<[], CountRow>('SELECT COUNT(*) AS c FROM pending_measurements').get()
        return row ? row.c : 0
    }

    private maxSequence(): number {
        const pending = this.db.prepare<[], MaxRow>('SELECT MAX(sequence) AS m FROM pending_measurements').get()
        const resumed = this.db.prepare<[], MaxRow>('SELECT MAX(sequence) AS m FROM resume_points').get()
        return Math.max(pending?.m ?? 0, resumed?.m ?? 0)
    }

    private guard<T>(op: string, fn: () => T): T {
        try {
            return fn()
        } catch (err) {
            if (err instanceof StoreError) throw err
            throw new StoreError('IOFailure', `${op} failed: ${errorMessage(err)}`, { cause: err })
        }
    }
}

function rowToMeasurement(row: MeasurementRow): Measurement {
    return {
        sensorId: row.sensor_id,
        sequence: row.sequence,
        timestamp: { wall: row.wall, monotonicMs: row.monotonic_ms },
        values: parseMetricMap(row.metric_values, row.sequence),
    }
}

function parseMetricMap(text: string, sequence: number): MetricMap {
    const raw: unknown = JSON.parse(text)
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new StoreError('IOFailure', `corrupt metric values for sequence ${sequence}`)
    }
    const out: MetricMap = {}
    for (const [name, value] of Object.entries(raw)) {
        if (value === null || typeof value === 'number') out[name] = value
        else throw new StoreError('IOFailure', `corrupt metric ${name} for sequence ${sequence}`)
    }
    return out
}
