// services/agent/src/devices/fidas/FidasFtpReader.ts

import { performance } from 'node:perf_hooks'

import { ReadError, errorMessage } from '../../core/pipeline/errors.js'
import type { DistributiveOmit, InstrumentReader, Measurement, ResumePoint } from '../../core/pipeline/types.js'
import type {
    FidasConfig,
    FidasEvent,
    FidasEventSink,
    FidasFileSource,
    FidasRow,
} from './types.js'
import { extractYearMonth, parseFidasTable, selectFilesToProcess } from './utils.js'

export interface FidasFtpReaderDeps {
    source: FidasFileSource
    /** Last measurement the store holds for this sensor; rows up to it are not read again. */
    resume: ResumePoint | null
    /** Highest sequence already used; the reader continues after it. */
    lastSequence: number
    events?: FidasEventSink
}

/**
 * FidasFtpReader
 *
 * Reads DUSTMONITOR text exports from the instrument's FTP server and hands
 * out one Measurement per row, oldest first.
 *
 * - Rows are buffered; the server is only contacted when the buffer is empty.
 * - The watermark is the newest row instant handed to the buffer. Files whose
 *   modification time is not after it are not downloaded again.
 * - A file that fails to parse is remembered by name + mtime and skipped until
 *   the instrument rewrites it.
 * - Sequence numbers are assigned when a row leaves the reader, so they stay
 *   contiguous across push-backs.
 */
export class FidasFtpReader implements InstrumentReader {
    readonly sensorId: string

    private readonly config: FidasConfig
    private readonly source: FidasFileSource
    private readonly events: FidasEventSink | null

    private readonly buffered: FidasRow[] = []
    private readonly pushedBack: Measurement[] = []
    private readonly rejectedVersions = new Map<string, number>()

    private watermarkMs: number | null
    private nextSequence: number

    constructor(config: FidasConfig, deps: FidasFtpReaderDeps) {
        this.config = config
        this.sensorId = config.sensorId
        this.source = deps.source
        this.events = deps.events ?? null
        this.nextSequence = Math.max(0, deps.lastSequence) + 1

        const resumed = deps.resume ? Date.parse(deps.resume.wall) : Number.NaN
        this.watermarkMs = Number.isFinite(resumed) ? resumed : null
    }

    /** Rows waiting in memory (not counting pushed-back measurements). */
    get bufferedCount(): number {
        return this.buffered.length
    }

    async read(signal?: AbortSignal): Promise<Measurement> {
        const back = this.pushedBack.shift()
        if (back) return back

        if (this.buffered.length === 0) await this.refresh(signal)

        const row = this.buffered.shift()
        if (!row) {
            throw new ReadError('TransientUnavailable', 'no new rows on the instrument', { reason: 'no-new-data' })
        }

        return {
            sensorId: this.sensorId,
            sequence: this.nextSequence++,
            timestamp: { wall: row.wall, monotonicMs: performance.now() },
            values: row.values,
        }
    }

    pushBack(measurement: Measurement): void {
        this.pushedBack.unshift(measurement)
    }

    /* ---------------------------------------------------------------------- */

    private async refresh(signal?: AbortSignal): Promise<void> {
        const since = this.watermarkMs
        const { rows, rejection } = await this.source.session(async (session) => {
            const { selected, withoutMtime } = selectFilesToProcess(await session.list(), since)

            for (const name of withoutMtime) this.emit({ kind: 'file-skipped', name, reason: 'no-mtime' })
            if (selected.length > 0) {
                this.emit({
                    kind: 'files-selected',
                    names: selected.map(f => f.name),
                    since: since === null ? null : new Date(since).toISOString(),
                })
            }

            const collected: FidasRow[] = []
            let rejected: ReadError | null = null
            for (const entry of selected) {
                const mtime = entry.modifiedAt ? entry.modifiedAt.getTime() : 0
                if (this.rejectedVersions.get(entry.name) === mtime) {
                    this.emit({ kind: 'file-skipped', name: entry.name, reason: 'rejected-version' })
                    continue
                }

                const text = await session.download(entry.name)

                let parsed: FidasRow[]
                try {
                    parsed = parseFidasTable(text, this.config.tzOffsetHours, entry.name)
                } catch (err) {
                    if (!(err instanceof ReadError)) throw err
                    this.rejectedVersions.set(entry.name, mtime)
                    this.emit({ kind: 'file-rejected', name: entry.name, error: errorMessage(err) })
                    rejected = err
                    continue
                }
                this.rejectedVersions.delete(entry.name)

                const fresh = since === null ? parsed : parsed.filter(r => r.instantMs > since)
                const ym = extractYearMonth(entry.name)
                this.emit({
                    kind: 'file-read',
                    name: entry.name,
                    month: ym ? `${ym.year}-${String(ym.month).padStart(2, '0')}` : null,
                    rows: parsed.length,
                    newRows: fresh.length,
                })
                collected.push(...fresh)
            }
            return { rows: collected, rejection: rejected }
        }, signal)

        rows.sort((a, b) => a.instantMs - b.instantMs)
        let last: number | null = null
        for (const row of rows) {
            // the same instant exported twice (overlapping files) is read once
            if (row.instantMs === last) continue
            this.buffered.push(row)
            last = row.instantMs
        }

        const newest = this.buffered[this.buffered.length - 1]
        if (newest) {
            this.watermarkMs = newest.instantMs
            this.emit({ kind: 'rows-buffered', count: this.buffered.length, newest: newest.wall })
            return
        }

        if (rejection) throw rejection
    }

    private emit(evt: DistributiveOmit<FidasEvent, 'at'>): void {
        this.events?.publish({ ...evt, at: Date.now() })
    }
}
