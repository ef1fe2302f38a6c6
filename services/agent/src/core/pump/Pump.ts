import {
    ReadError,
    StoreError,
    UploadError,
    errorMessage,
    toReadError,
    toUploadError,
} from '../pipeline/errors.js'
import type {
    DeliveryReceipt,
    DistributiveOmit,
    InstrumentReader,
    Measurement,
    Uploader,
} from '../pipeline/types.js'
import type { SampleStore } from '../store/types.js'
import { ExponentialBackoff } from './backoff.js'
import { abortableSleep, withTimeout, type Sleeper } from './sleep.js'
import type {
    PumpConfig,
    PumpEvent,
    PumpEventSink,
    PumpPhase,
    PumpStats,
} from './types.js'

interface PumpDeps {
    store: SampleStore
    reader: InstrumentReader
    uploader: Uploader
    events?: PumpEventSink
    /** Injected for tests; defaults to a real, abortable setTimeout. */
    sleep?: Sleeper
    /** Jitter source for the backoff; defaults to Math.random. */
    random?: () => number
}

const noopEvents: PumpEventSink = { publish: () => undefined }

/**
 * Pump
 *
 * The single loop that moves measurements from the reader, through the store,
 * to the uploader:
 *
 *   Idle -> Polling -> Uploading (-> BackingOff -> Uploading)* -> Idle
 *
 * - Only one step runs at a time; store mutations never overlap.
 * - A measurement is appended before any network attempt and acknowledged only
 *   for the prefix a receipt confirms.
 * - requestStop() cancels sleeps and reads at once. An append or a
 *   send+acknowledge already in progress is allowed to finish; nothing new
 *   starts afterwards.
 * - StoreError('IOFailure') is fatal: run() rejects with it.
 */
export class Pump {
    private readonly store: SampleStore
    private readonly reader: InstrumentReader
    private readonly uploader: Uploader
    private readonly events: PumpEventSink
    private readonly sleep: Sleeper
    private readonly config: PumpConfig
    private readonly backoff: ExponentialBackoff

    private phase: PumpPhase = 'Idle'
    private stats: PumpStats = {
        reads: 0,
        skippedReads: 0,
        protocolErrors: 0,
        appended: 0,
        storeFull: 0,
        dropped: 0,
        batchesSent: 0,
        acknowledged: 0,
        uploadFailures: 0,
        backoffCycles: 0,
        deadLettered: 0,
        lastAppendAt: null,
        lastAcknowledgeAt: null,
        lastErrorAt: null,
    }

    private readonly abort = new AbortController()
    private running = false
    private stopped: Promise<void> = Promise.resolve()

    constructor(config: PumpConfig, deps: PumpDeps) {
        this.config = config
        this.store = deps.store
        this.reader = deps.reader
        this.uploader = deps.uploader
        this.events = deps.events ?? noopEvents
        this.sleep = deps.sleep ?? abortableSleep
        this.backoff = new ExponentialBackoff(config.backoff, deps.random)
    }

    /* ---------------------------------------------------------------------- */
    /*  Public API                                                            */
    /* ---------------------------------------------------------------------- */

    getPhase(): PumpPhase {
        return this.phase
    }

    getStats(): PumpStats {
        return { ...this.stats }
    }

    get stopRequested(): boolean {
        return this.abort.signal.aborted
    }

    isRunning(): boolean {
        return this.running
    }

    /**
     * Runs ticks every pollIntervalMs until requestStop(). The first tick runs
     * immediately. Resolves after a clean stop; rejects on a fatal store error.
     */
    async run(): Promise<void> {
        if (this.running) throw new Error('pump is already running')
        this.running = true

        let markStopped: () => void = () => undefined
        this.stopped = new Promise<void>((resolve) => { markStopped = resolve })

        try {
            while (!this.stopRequested) {
                await this.tick()
                if (this.stopRequested) break
                await this.sleep(this.config.pollIntervalMs, this.abort.signal)
            }
        } catch (err) {
            this.stats.lastErrorAt = Date.now()
            this.emit({ kind: 'fatal-error', error: errorMessage(err) })
            throw err
        } finally {
            this.setPhase('ShuttingDown')
            this.running = false
            this.emit({ kind: 'stopped' })
            markStopped()
        }
    }

    /** Stop accepting ticks; an in-flight append or send finishes, reads and sleeps end now. */
    requestStop(): void {
        if (this.stopRequested) return
        this.emit({ kind: 'stop-requested', phase: this.phase })
        this.abort.abort()
    }

    /** Resolves once run() has returned (immediately if it is not running). */
    whenStopped(): Promise<void> {
        return this.stopped
    }

    /**
     * One scheduling tick: poll the reader, then drain the store while the
     * endpoint keeps accepting. Returns to Idle unless a stop was requested.
     */
    async tick(): Promise<void> {
        this.setPhase('Polling')
        await this.poll()

        if (!this.stopRequested && this.store.pendingCount() > 0) {
            await this.drain()
        }

        if (!this.stopRequested) this.setPhase('Idle')
    }

    /* ---------------------------------------------------------------------- */
    /*  Polling                                                               */
    /* ---------------------------------------------------------------------- */

    private async poll(): Promise<void> {
        const reads = Math.max(1, this.config.readsPerTick)

        for (let i = 0; i < reads && !this.stopRequested; i++) {
            let measurement: Measurement
            try {
                measurement = await withTimeout(
                    this.config.readTimeoutMs,
                    (signal) => this.reader.read(signal),
                    () => new ReadError('TransientUnavailable', `read timed out after ${this.config.readTimeoutMs}ms`, { reason: 'timeout' }),
                    // a read is not an atomic step; a stop request cancels it
                    {
                        signal: this.abort.signal,
                        onCancel: () => new ReadError('TransientUnavailable', 'read cancelled by stop request', { reason: 'aborted' }),
                    }
                )
            } catch (err) {
                this.onReadError(toReadError(err))
                return
            }

            this.stats.reads++
            if (!this.appendOrPushBack(measurement)) return
        }
    }

    private onReadError(err: ReadError): void {
        this.stats.lastErrorAt = Date.now()
        if (err.kind === 'ProtocolError') {
            this.stats.protocolErrors++
            this.emit({ kind: 'read-protocol-error', error: err.message })
            return
        }
        this.stats.skippedReads++
        this.emit({ kind: 'read-skipped', reason: err.reason, error: err.message })
    }

    /** Returns false when the store refused the measurement (StoreFull). */
    private appendOrPushBack(measurement: Measurement): boolean {
        try {
            this.store.append(measurement)
        } catch (err) {
            if (!(err instanceof StoreError) || err.kind !== 'StoreFull') throw err

            this.stats.storeFull++
            let pushedBack = false
            if (this.reader.pushBack) {
                this.reader.pushBack(measurement)
                pushedBack = true
            } else {
                this.stats.dropped++
            }

            this.emit({ kind: 'store-full', sequence: measurement.sequence, pushedBack })
            return false
        }

        this.stats.appended++
        this.stats.lastAppendAt = Date.now()
        this.emit({ kind: 'appended', sequence: measurement.sequence, pending: this.store.pendingCount() })
        return true
    }

    /* ---------------------------------------------------------------------- */
    /*  Uploading + BackingOff                                                */
    /* ---------------------------------------------------------------------- */

    private async drain(): Promise<void> {
        while (!this.stopRequested) {
            this.setPhase('Uploading')

            const batch = this.store.peekBatch(this.config.maxBatchSize)
            if (batch.length === 0) return

            const receipt = await this.send(batch)

            if (receipt.ok) {
                const acceptedCount = this.acceptedPrefixLength(batch, receipt.accepted)
                if (acceptedCount > 0) {
                    this.acknowledgePrefix(batch, acceptedCount)
                    continue
                }
                // accepted nothing: no progress, so treat it like a retryable failure
                this.stats.uploadFailures++
                if (!(await this.backOff())) return
                continue
            }

            const error = receipt.error
            this.stats.uploadFailures++
            this.stats.lastErrorAt = Date.now()
            this.emit({
                kind: 'upload-failed',
                errorKind: error.kind,
                status: error.status,
                error: error.message,
                retryable: error.retryable,
                batchSize: batch.length,
            })

            if (!error.retryable) {
                this.deadLetter(batch, error)
                continue
            }

            if (!(await this.backOff())) return
        }
    }

    private async send(batch: Measurement[]): Promise<DeliveryReceipt> {
        try {
            return await withTimeout(
                this.config.uploadTimeoutMs,
                (signal) => this.uploader.send(batch, signal),
                () => new UploadError('Timeout', `send timed out after ${this.config.uploadTimeoutMs}ms`)
            )
        } catch (err) {
            return { ok: false, error: toUploadError(err) }
        }
    }

    private acceptedPrefixLength(batch: Measurement[], accepted: number[]): number {
        let n = 0
        while (n < accepted.length && n < batch.length && accepted[n] === batch[n].sequence) n++

        if (n !== accepted.length) {
            this.emit({
                kind: 'receipt-not-prefix',
                expected: batch.slice(0, accepted.length).map(m => m.sequence),
                accepted: [...accepted],
            })
        }
        return n
    }

    private acknowledgePrefix(batch: Measurement[], count: number): void {
        const first = batch[0].sequence
        const last = batch[count - 1].sequence
        this.store.acknowledge(last)
        this.backoff.reset()

        this.stats.batchesSent++
        this.stats.acknowledged += count
        this.stats.lastAcknowledgeAt = Date.now()
        this.emit({
            kind: 'batch-acknowledged',
            firstSequence: first,
            lastSequence: last,
            count,
            pending: this.store.pendingCount(),
        })
    }

    private deadLetter(batch: Measurement[], error: UploadError): void {
        const reason = error.status !== undefined
            ? `${error.kind} status=${error.status}: ${error.message}`
            : `${error.kind}: ${error.message}`
        const moved = this.store.deadLetter(batch, reason)
        this.stats.deadLettered += moved
        this.emit({
            kind: 'dead-lettered',
            firstSequence: batch[0].sequence,
            lastSequence: batch[batch.length - 1].sequence,
            count: moved,
            reason,
        })
    }

    /** Returns false if the wait was cut short by a stop request. */
    private async backOff(): Promise<boolean> {
        this.setPhase('BackingOff')
        const delayMs = this.backoff.next()
        this.stats.backoffCycles++
        this.emit({ kind: 'backoff-started', attempt: this.backoff.attempts, delayMs })
        return await this.sleep(delayMs, this.abort.signal)
    }

    /* ---------------------------------------------------------------------- */

    private setPhase(next: PumpPhase): void {
        if (this.phase === next) return
        const from = this.phase
        this.phase = next
        this.emit({ kind: 'phase-changed', from, to: next })
    }

    private emit(evt: DistributiveOmit<PumpEvent, 'at'>): void {
        this.events.publish({ ...evt, at: Date.now() })
    }
}
