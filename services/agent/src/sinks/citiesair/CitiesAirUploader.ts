// services/agent/src/sinks/citiesair/CitiesAirUploader.ts

import { request, type Dispatcher } from 'undici'

import { UploadError, errorMessage } from '../../core/pipeline/errors.js'
import type { DeliveryReceipt, DistributiveOmit, Measurement, Uploader } from '../../core/pipeline/types.js'
import type { CitiesAirConfig } from './citiesair.config.js'
import { classifyStatus, toCitiesAirMeasurement } from './citiesair.payload.js'

export interface CitiesAirEventSink {
    publish(evt: CitiesAirEvent): void
}

export type CitiesAirEvent =
    | {
        kind: 'batch-posted'
        at: number
        count: number
        status: number
        durationMs: number
    }
    | {
        kind: 'batch-rejected'
        at: number
        count: number
        status: number
        bodyPreview: string
    }
    | {
        kind: 'request-failed'
        at: number
        count: number
        code: string | null
        error: string
    }
    | {
        kind: 'dry-run'
        at: number
        count: number
        first: string
        last: string
    }

const TIMEOUT_CODES = new Set(['UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT'])

function errorCode(err: unknown): string | null {
    if (typeof err !== 'object' || err === null) return null
    if ('code' in err && typeof err.code === 'string') return err.code
    if ('cause' in err) return errorCode(err.cause)
    return null
}

/**
 * Maps a failed request (no HTTP status) to an UploadError kind.
 * Undici timeouts and aborts are timeouts; everything else means the
 * endpoint could not be reached.
 */
export function classifyRequestError(err: unknown, aborted: boolean): UploadError {
    const code = errorCode(err)
    const isAbort = aborted || (err instanceof Error && err.name === 'AbortError') || code === 'UND_ERR_ABORTED'

    if (isAbort || (code !== null && TIMEOUT_CODES.has(code))) {
        return new UploadError('Timeout', `request timed out: ${errorMessage(err)}`, { cause: err })
    }
    return new UploadError('NetworkUnreachable', `request failed${code ? ` code=${code}` : ''}: ${errorMessage(err)}`, { cause: err })
}

export interface CitiesAirUploaderDeps {
    /** Undici dispatcher (a MockAgent in tests); the global one by default. */
    dispatcher?: Dispatcher
    events?: CitiesAirEventSink
}

/**
 * CitiesAirUploader
 *
 * POSTs a batch as one JSON array. The endpoint accepts or refuses the batch
 * as a whole, so a successful receipt always covers every measurement sent.
 */
export class CitiesAirUploader implements Uploader {
    readonly id = 'citiesair'

    private readonly config: CitiesAirConfig
    private readonly dispatcher: Dispatcher | undefined
    private readonly events: CitiesAirEventSink | null

    constructor(config: CitiesAirConfig, deps: CitiesAirUploaderDeps = {}) {
        this.config = config
        this.dispatcher = deps.dispatcher
        this.events = deps.events ?? null
    }

    async send(batch: readonly Measurement[], signal?: AbortSignal): Promise<DeliveryReceipt> {
        const accepted = batch.map(m => m.sequence)
        if (batch.length === 0) return { ok: true, accepted }

        const payload = batch.map(toCitiesAirMeasurement)

        if (this.config.dryRun) {
            this.publish({
                kind: 'dry-run',
                count: payload.length,
                first: payload[0].ts,
                last: payload[payload.length - 1].ts,
            })
            return { ok: true, accepted }
        }

        const url = this.config.apiUrl
        if (!url) {
            return { ok: false, error: new UploadError('NetworkUnreachable', 'CITIESAIR_API_URL is not configured') }
        }

        const started = Date.now()
        let statusCode: number
        let text: string
        try {
            const res = await request(url, {
                method: 'POST',
                headers: this.headers(),
                body: JSON.stringify(payload),
                signal,
                dispatcher: this.dispatcher,
                headersTimeout: this.config.timeoutMs,
                bodyTimeout: this.config.timeoutMs,
            })
            statusCode = res.statusCode
            text = await res.body.text().catch(() => '')
        } catch (err) {
            const error = classifyRequestError(err, signal?.aborted ?? false)
            this.publish({ kind: 'request-failed', count: batch.length, code: errorCode(err), error: error.message })
            return { ok: false, error }
        }

        const verdict = classifyStatus(statusCode)
        if (verdict.accepted) {
            this.publish({ kind: 'batch-posted', count: batch.length, status: statusCode, durationMs: Date.now() - started })
            return { ok: true, accepted }
        }

        const bodyPreview = text.slice(0, this.config.bodyPreviewChars)
        this.publish({ kind: 'batch-rejected', count: batch.length, status: statusCode, bodyPreview })
        return {
            ok: false,
            error: new UploadError(verdict.kind, `HTTP ${statusCode}${bodyPreview ? `: ${bodyPreview}` : ''}`, { status: statusCode }),
        }
    }

    private headers(): Record<string, string> {
        const headers: Record<string, string> = {
            'content-type': 'application/json',
            accept: 'application/json',
        }
        const key = this.config.apiKey
        if (key) {
            const scheme = this.config.authScheme
            headers[this.config.authHeader.toLowerCase()] = scheme ? `${scheme} ${key}` : key
        }
        return headers
    }

    private publish(evt: DistributiveOmit<CitiesAirEvent, 'at'>): void {
        this.events?.publish({ ...evt, at: Date.now() })
    }
}
