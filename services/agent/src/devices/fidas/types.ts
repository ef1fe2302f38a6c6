// services/agent/src/devices/fidas/types.ts

import type { MetricMap } from '../../core/pipeline/types.js'

/* -------------------------------------------------------------------------- */
/*  Configuration                                                             */
/* -------------------------------------------------------------------------- */

export type FidasReaderKind = 'ftp' | 'simulated'

export type FidasFtpConfig = {
    host: string | null
    port: number
    username: string | null
    password: string | null
    /** Directory holding the .txt exports; a failed cd is only a warning. */
    homeDir: string | null
    /** Control/data socket timeout handed to the FTP client. */
    timeoutMs: number
}

export type FidasConfig = {
    kind: FidasReaderKind
    sensorId: string
    /** Offset of the instrument's local clock from UTC, in hours (may be fractional). */
    tzOffsetHours: number
    ftp: FidasFtpConfig
}

/* -------------------------------------------------------------------------- */
/*  Export files + rows                                                       */
/* -------------------------------------------------------------------------- */

export interface FidasFileEntry {
    name: string
    /** Server-reported modification time; null when the server gave none. */
    modifiedAt: Date | null
}

/** One parsed row of a DUSTMONITOR export. */
export interface FidasRow {
    /** UTC epoch ms of the acquisition instant. */
    instantMs: number
    /** ISO-8601 local time with the instrument's offset, e.g. 2025-11-26T09:45:12+04:00 */
    wall: string
    values: MetricMap
}

/** One connected session against the export server. */
export interface FidasSession {
    list(): Promise<FidasFileEntry[]>
    /** Whole file as text. */
    download(name: string): Promise<string>
}

/**
 * Where export files come from. `session` connects, runs `fn`, and always
 * disconnects afterwards. Failures surface as ReadError('TransientUnavailable').
 */
export interface FidasFileSource {
    session<T>(fn: (session: FidasSession) => Promise<T>, signal?: AbortSignal): Promise<T>
}

/* -------------------------------------------------------------------------- */
/*  Events                                                                    */
/* -------------------------------------------------------------------------- */

export interface FidasEventSink {
    publish(evt: FidasEvent): void
}

export type FidasEvent =
    | {
        kind: 'ftp-connected'
        at: number
        host: string
        port: number
        user: string
    }
    | {
        kind: 'ftp-home-dir-unavailable'
        at: number
        dir: string
        error: string
    }
    | {
        kind: 'files-selected'
        at: number
        names: string[]
        since: string | null
    }
    | {
        kind: 'file-skipped'
        at: number
        name: string
        reason: 'no-mtime' | 'rejected-version'
    }
    | {
        kind: 'file-read'
        at: number
        name: string
        /** YYYY-MM the file covers, from its name; null when the name does not follow the pattern. */
        month: string | null
        rows: number
        newRows: number
    }
    | {
        kind: 'file-rejected'
        at: number
        name: string
        error: string
    }
    | {
        kind: 'rows-buffered'
        at: number
        count: number
        newest: string
    }
