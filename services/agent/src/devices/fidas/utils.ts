// services/agent/src/devices/fidas/utils.ts

import { ReadError } from '../../core/pipeline/errors.js'
import type { MetricMap, MetricValue } from '../../core/pipeline/types.js'
import {
    clampInt,
    clampNumber,
    parseIntSafe,
    parseNumberSafe,
    parseOptionalString,
} from '../../core/config/env.js'
import type {
    FidasConfig,
    FidasFileEntry,
    FidasReaderKind,
    FidasRow,
} from './types.js'

/* -------------------------------------------------------------------------- */
/*  Config                                                                    */
/* -------------------------------------------------------------------------- */

export function buildFidasConfigFromEnv(env: NodeJS.ProcessEnv = process.env): FidasConfig {
    return {
        kind: parseReaderKind(env.READER_KIND, 'ftp'),
        sensorId: parseOptionalString(env.FIDAS_SENSOR_ID) ?? 'fidas-1',
        tzOffsetHours: clampNumber(parseNumberSafe(env.FIDAS_TZ_OFFSET_HOURS, 0), -14, 14),
        ftp: {
            host: parseOptionalString(env.FTP_HOST),
            port: clampInt(parseIntSafe(env.FTP_PORT, 21), 1, 65_535),
            username: parseOptionalString(env.FTP_USERNAME),
            password: parseOptionalString(env.FTP_PASSWORD),
            homeDir: parseOptionalString(env.FTP_HOME_DIR),
            timeoutMs: clampInt(parseIntSafe(env.FTP_TIMEOUT_MS, 30_000), 1_000, 600_000),
        },
    }
}

function parseReaderKind(v: string | undefined, def: FidasReaderKind): FidasReaderKind {
    const n = (v ?? '').trim().toLowerCase()
    if (n === 'ftp' || n === 'simulated') return n
    return def
}

/** Returns every problem; an empty list means the reader can start. */
export function validateFidasConfig(cfg: FidasConfig, rawKind: string | undefined): string[] {
    const errors: string[] = []
    const kind = (rawKind ?? '').trim().toLowerCase()
    if (kind !== '' && kind !== 'ftp' && kind !== 'simulated') {
        errors.push(`READER_KIND must be "ftp" or "simulated" (got "${rawKind}")`)
    }
    if (cfg.kind === 'ftp' && !cfg.ftp.host) {
        errors.push('FTP_HOST is required when READER_KIND=ftp')
    }
    return errors
}

/* -------------------------------------------------------------------------- */
/*  File names + selection                                                    */
/* -------------------------------------------------------------------------- */

const FILENAME_RE = /^DUSTMONITOR_\d+_(\d{4})_(\d{2})\.txt$/i

/** (year, month) from DUSTMONITOR_<id>_<YYYY>_<MM>.txt, ignoring any directory part. */
export function extractYearMonth(filename: string): { year: number; month: number } | null {
    const base = filename.split('/').pop() ?? filename
    const m = FILENAME_RE.exec(base)
    if (!m) return null
    return { year: Number(m[1]), month: Number(m[2]) }
}

export function isExportFile(name: string): boolean {
    return name.toLowerCase().endsWith('.txt')
}

export interface FileSelection {
    /** Files to read, in file-name order. */
    selected: FidasFileEntry[]
    /** .txt files the server gave no modification time for. */
    withoutMtime: string[]
}

/**
 * Pick the export files that may hold rows newer than `sinceMs`.
 * Everything is selected when there is no watermark yet.
 */
export function selectFilesToProcess(entries: readonly FidasFileEntry[], sinceMs: number | null): FileSelection {
    const selected: FidasFileEntry[] = []
    const withoutMtime: string[] = []

    for (const entry of entries) {
        if (!isExportFile(entry.name)) continue
        if (entry.modifiedAt === null) {
            withoutMtime.push(entry.name)
            continue
        }
        if (sinceMs === null || entry.modifiedAt.getTime() > sinceMs) selected.push(entry)
    }

    selected.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    return { selected, withoutMtime }
}

/* -------------------------------------------------------------------------- */
/*  Timestamps                                                                */
/* -------------------------------------------------------------------------- */

const TIMESTAMP_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})\s+(\d{1,2}):(\d{2}):(\d{2})\s*([AP]M)$/i

const HOUR_MS = 3_600_000

/**
 * Parse the export's `MM/DD/YYYY hh:mm:ss AM|PM` local time into UTC epoch ms.
 * Returns null for anything that is not a real calendar instant.
 */
export function parseFidasTimestamp(date: string, time: string, tzOffsetHours: number): number | null {
    const m = TIMESTAMP_RE.exec(`${date.trim()} ${time.trim()}`)
    if (!m) return null

    const month = Number(m[1])
    const day = Number(m[2])
    const year = Number(m[3])
    const hour12 = Number(m[4])
    const minute = Number(m[5])
    const second = Number(m[6])
    const pm = m[7].toUpperCase() === 'PM'

    if (hour12 < 1 || hour12 > 12 || minute > 59 || second > 59) return null
    const hour = (hour12 % 12) + (pm ? 12 : 0)

    const localMs = Date.UTC(year, month - 1, day, hour, minute, second)
    const check = new Date(localMs)
    if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
        return null
    }

    return localMs - Math.round(tzOffsetHours * HOUR_MS)
}

const pad2 = (n: number): string => String(n).padStart(2, '0')

/** ISO-8601 in the given offset, seconds precision: 2025-11-26T09:45:12+04:00 */
export function formatWithOffset(instantMs: number, tzOffsetHours: number): string {
    const offsetMin = Math.round(tzOffsetHours * 60)
    const local = new Date(instantMs + offsetMin * 60_000)

    const sign = offsetMin < 0 ? '-' : '+'
    const abs = Math.abs(offsetMin)

    return (
        `${local.getUTCFullYear()}-${pad2(local.getUTCMonth() + 1)}-${pad2(local.getUTCDate())}` +
        `T${pad2(local.getUTCHours())}:${pad2(local.getUTCMinutes())}:${pad2(local.getUTCSeconds())}` +
        `${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`
    )
}

/* -------------------------------------------------------------------------- */
/*  Table parsing                                                             */
/* -------------------------------------------------------------------------- */

/** Metrics carried on every measurement, in this order. */
export const FIDAS_METRICS = ['PM1', 'PM2.5', 'PM10', 'rH', 'T', 'p'] as const

export const FIDAS_REQUIRED_COLUMNS = ['date', 'time', ...FIDAS_METRICS] as const

function safeNumber(cell: string | undefined): MetricValue {
    if (cell === undefined) return null
    const v = cell.trim()
    if (v === '' || v.toLowerCase() === 'nan') return null
    const n = Number(v)
    return Number.isFinite(n) ? n : null
}

/**
 * Parse a tab-separated DUSTMONITOR export.
 *
 * Blank lines are ignored and an empty file yields no rows. A missing
 * required column or an unparsable timestamp throws
 * ReadError('ProtocolError'). Rows come back sorted by time.
 */
export function parseFidasTable(text: string, tzOffsetHours: number, fileName = 'export'): FidasRow[] {
    const lines = text
        .replace(/^\uFEFF/, '')
        .split(/\r?\n/)
        .filter(l => l.trim() !== '')

    if (lines.length === 0) return []

    const header = lines[0].split('\t').map(h => h.trim())
    const index = new Map<string, number>()
    header.forEach((h, i) => {
        if (!index.has(h)) index.set(h, i)
    })

    const missing = FIDAS_REQUIRED_COLUMNS.filter(c => !index.has(c))
    if (missing.length > 0) {
        throw new ReadError('ProtocolError', `missing required column(s) ${missing.join(', ')} in ${fileName}`, {
            reason: 'missing-column',
        })
    }

    const col = (cells: string[], name: string): string | undefined => {
        const i = index.get(name)
        return i === undefined ? undefined : cells[i]
    }

    const rows: FidasRow[] = []
    for (let li = 1; li < lines.length; li++) {
        const cells = lines[li].split('\t')
        const date = col(cells, 'date') ?? ''
        const time = col(cells, 'time') ?? ''

        const instantMs = parseFidasTimestamp(date, time, tzOffsetHours)
        if (instantMs === null) {
            throw new ReadError('ProtocolError', `unparsable timestamp "${date} ${time}" at line ${li + 1} of ${fileName}`, {
                reason: 'bad-timestamp',
            })
        }

        const values: MetricMap = {}
        for (const metric of FIDAS_METRICS) values[metric] = safeNumber(col(cells, metric))

        rows.push({ instantMs, wall: formatWithOffset(instantMs, tzOffsetHours), values })
    }

    return rows.sort((a, b) => a.instantMs - b.instantMs)
}
