import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, expect, it } from 'vitest'

import { ReadError, StoreError } from '../../pipeline/errors.js'
import type { DeliveryReceipt, InstrumentReader, Measurement, Uploader } from '../../pipeline/types.js'
import { SqliteSampleStore } from '../../store/SqliteSampleStore.js'
import type { SampleStore } from '../../store/types.js'
import { Pump } from '../Pump.js'
import type { PumpConfig } from '../types.js'
import {
    FakeReader,
    FakeUploader,
    RecordingEvents,
    SENSOR,
    deferred,
    failure,
    measurement,
    pumpConfig,
    recordingSleeper,
} from './fakes.js'

const stores: SampleStore[] = []

function memoryStore(capacity = 1000): SqliteSampleStore {
    const store = SqliteSampleStore.open({ path: ':memory:', capacity })
    stores.push(store)
    return store
}

function build(opts: {
    config?: Partial<PumpConfig>
    store?: SampleStore
    reader: InstrumentReader
    uploader: Uploader
    onSleep?: (ms: number) => void
}) {
    const store = opts.store ?? memoryStore()
    const events = new RecordingEvents()
    const sleeper = recordingSleeper(opts.onSleep)
    const pump = new Pump(pumpConfig(opts.config), {
        store,
        reader: opts.reader,
        uploader: opts.uploader,
        events,
        sleep: sleeper.sleep,
        random: () => 0,
    })
    return { pump, store, events, delays: sleeper.delays }
}

afterEach(() => {
    for (const s of stores.splice(0)) s.close()
})

describe('Pump tick', () => {
    it('delivers five readings in one batch when the endpoint is healthy', async () => {
        const uploader = new FakeUploader()
        const { pump, store } = build({ config: { readsPerTick: 5 }, reader: new FakeReader(5), uploader })

        await pump.tick()

        expect(uploader.batches).toEqual([[1, 2, 3, 4, 5]])
        expect(store.pendingCount()).toBe(0)
        expect(pump.getPhase()).toBe('Idle')
        expect(pump.getStats()).toMatchObject({ reads: 5, appended: 5, batchesSent: 1, acknowledged: 5 })
    })

    it('retries through two timeouts with growing delays and delivers each reading once', async () => {
        const uploader = new FakeUploader([failure('Timeout'), failure('Timeout')])
        const { pump, store, delays, events } = build({ config: { readsPerTick: 3 }, reader: new FakeReader(3), uploader })

        await pump.tick()

        expect(uploader.batches).toEqual([[1, 2, 3], [1, 2, 3], [1, 2, 3]])
        expect(uploader.received).toEqual([1, 2, 3])
        expect(delays).toEqual([1000, 2000])
        expect(pump.getStats().backoffCycles).toBe(2)
        expect(events.ofKind('backoff-started').map(e => e.attempt)).toEqual([1, 2])
        expect(store.pendingCount()).toBe(0)
    })

    it('resets the backoff after a successful delivery', async () => {
        const uploader = new FakeUploader([failure('ServerError', 503), 'accept-all', failure('ServerError', 503)])
        const { pump, delays } = build({ reader: new FakeReader(2), uploader })

        await pump.tick()
        await pump.tick()

        expect(delays).toEqual([1000, 1000])
    })

    it('classifies a send that never settles as a timeout', async () => {
        let calls = 0
        const uploader: Uploader = {
            id: 'hangs-once',
            send: (batch) => {
                calls++
                if (calls === 1) return new Promise<DeliveryReceipt>(() => undefined)
                return Promise.resolve({ ok: true, accepted: batch.map(m => m.sequence) })
            },
        }
        const { pump, store, events } = build({ config: { uploadTimeoutMs: 20 }, reader: new FakeReader(1), uploader })

        await pump.tick()

        expect(events.ofKind('upload-failed').map(e => e.errorKind)).toEqual(['Timeout'])
        expect(calls).toBe(2)
        expect(store.pendingCount()).toBe(0)
    })

    it('skips the tick on a transient read failure without touching the uploader', async () => {
        const uploader = new FakeUploader()
        const { pump, events } = build({ reader: new FakeReader(0), uploader })

        await pump.tick()

        expect(uploader.batches).toEqual([])
        expect(pump.getStats().skippedReads).toBe(1)
        expect(events.ofKind('read-skipped').map(e => e.reason)).toEqual(['no-new-data'])
        expect(pump.getPhase()).toBe('Idle')
    })

    it('treats a read that never settles as a skipped tick', async () => {
        const reader: InstrumentReader = {
            sensorId: SENSOR,
            read: () => new Promise<Measurement>(() => undefined),
        }
        const { pump, events } = build({ config: { readTimeoutMs: 20 }, reader, uploader: new FakeUploader() })

        await pump.tick()

        expect(events.ofKind('read-skipped').map(e => e.reason)).toEqual(['timeout'])
    })

    it('counts protocol errors and reads again on the next tick', async () => {
        const reader = new FakeReader(1, [new ReadError('ProtocolError', 'bad row')])
        const uploader = new FakeUploader()
        const { pump } = build({ reader, uploader })

        await pump.tick()
        expect(pump.getStats()).toMatchObject({ protocolErrors: 1, appended: 0 })

        await pump.tick()
        expect(pump.getStats()).toMatchObject({ protocolErrors: 1, appended: 1, acknowledged: 1 })
        expect(uploader.batches).toEqual([[1]])
    })

    it('drains a backlog even when the read is skipped', async () => {
        const store = memoryStore()
        store.append(measurement(1))
        store.append(measurement(2))
        const uploader = new FakeUploader()
        const { pump } = build({ store, reader: new FakeReader(0, [], 2), uploader })

        await pump.tick()

        expect(uploader.batches).toEqual([[1, 2]])
        expect(store.pendingCount()).toBe(0)
    })

    it('splits the backlog into batches of maxBatchSize', async () => {
        const uploader = new FakeUploader()
        const { pump } = build({ config: { readsPerTick: 5, maxBatchSize: 2 }, reader: new FakeReader(5), uploader })

        await pump.tick()

        expect(uploader.batches).toEqual([[1, 2], [3, 4], [5]])
    })

    it('dead-letters a rejected batch and carries on with the next one', async () => {
        const uploader = new FakeUploader([failure('ServerRejected', 400)])
        const { pump, store, events, delays } = build({
            config: { readsPerTick: 4, maxBatchSize: 2 },
            reader: new FakeReader(4),
            uploader,
        })

        await pump.tick()

        expect(uploader.batches).toEqual([[1, 2], [3, 4]])
        expect(store.pendingCount()).toBe(0)
        expect(store.deadLetterCount()).toBe(2)
        expect(delays).toEqual([])
        expect(pump.getStats()).toMatchObject({ deadLettered: 2, acknowledged: 2 })
        expect(events.ofKind('dead-lettered')).toEqual([
            expect.objectContaining({
                firstSequence: 1,
                lastSequence: 2,
                count: 2,
                reason: 'ServerRejected status=400: simulated ServerRejected',
            }),
        ])
    })

    it('acknowledges only the matching prefix of a scattered receipt', async () => {
        const uploader = new FakeUploader([{ ok: true, accepted: [1, 3] }])
        const { pump, store, events } = build({ config: { readsPerTick: 3 }, reader: new FakeReader(3), uploader })

        await pump.tick()

        expect(uploader.batches).toEqual([[1, 2, 3], [2, 3]])
        expect(events.ofKind('receipt-not-prefix')).toEqual([
            expect.objectContaining({ expected: [1, 2], accepted: [1, 3] }),
        ])
        expect(store.pendingCount()).toBe(0)
    })

    it('backs off when a receipt accepts nothing', async () => {
        const uploader = new FakeUploader([{ ok: true, accepted: [] }])
        const { pump, delays, store } = build({ reader: new FakeReader(1), uploader })

        await pump.tick()

        expect(delays).toEqual([1000])
        expect(uploader.batches).toEqual([[1], [1]])
        expect(store.pendingCount()).toBe(0)
    })

    it('hands a refused reading back to the reader when the store is full', async () => {
        const store = memoryStore(2)
        const uploader = new FakeUploader([failure('NetworkUnreachable')])
        const { pump, events } = build({ store, config: { readsPerTick: 3 }, reader: new FakeReader(3), uploader })

        await pump.tick()

        expect(pump.getStats()).toMatchObject({ storeFull: 1, dropped: 0, acknowledged: 2 })
        expect(events.ofKind('store-full')).toEqual([expect.objectContaining({ sequence: 3, pushedBack: true })])

        await pump.tick()

        expect(uploader.batches).toEqual([[1, 2], [1, 2], [3]])
        expect(store.pendingCount()).toBe(0)
    })

    it('counts a refused reading as dropped when the reader cannot take it back', async () => {
        const store = memoryStore(2)
        store.append(measurement(1))
        store.append(measurement(2))
        const reader: InstrumentReader = { sensorId: SENSOR, read: async () => measurement(3) }
        const { pump, events } = build({ store, reader, uploader: new FakeUploader() })

        await pump.tick()

        expect(pump.getStats()).toMatchObject({ storeFull: 1, dropped: 1, acknowledged: 2 })
        expect(events.ofKind('store-full')).toEqual([expect.objectContaining({ sequence: 3, pushedBack: false })])
    })

    it('delivers every reading exactly once under random partial receipts and failures', async () => {
        let seed = 11
        const random = (): number => {
            seed = (seed * 48271) % 2147483647
            return seed / 2147483647
        }
        const received: number[] = []
        const uploader: Uploader = {
            id: 'flaky',
            send: async (batch) => {
                const r = random()
                if (r < 0.25) return failure('NetworkUnreachable')
                const accepted = batch.slice(0, Math.max(1, Math.ceil(r * batch.length))).map(m => m.sequence)
                received.push(...accepted)
                return { ok: true, accepted }
            },
        }
        const { pump, store } = build({
            config: { readsPerTick: 7, maxBatchSize: 5 },
            reader: new FakeReader(40),
            uploader,
        })

        for (let i = 0; i < 10; i++) await pump.tick()

        expect(received).toEqual(Array.from({ length: 40 }, (_, i) => i + 1))
        expect(store.pendingCount()).toBe(0)
    })
})

describe('Pump run', () => {
    it('finishes an in-flight send after a stop request, then stops', async () => {
        const started = deferred<void>()
        const release = deferred<DeliveryReceipt>()
        const uploader: Uploader = {
            id: 'slow',
            send: () => {
                started.resolve()
                return release.promise
            },
        }
        const { pump, store, events } = build({ reader: new FakeReader(1), uploader })

        const running = pump.run()
        await started.promise

        pump.requestStop()
        expect(pump.isRunning()).toBe(true)

        release.resolve({ ok: true, accepted: [1] })
        await running

        expect(store.pendingCount()).toBe(0)
        expect(pump.isRunning()).toBe(false)
        expect(pump.getPhase()).toBe('ShuttingDown')
        expect(events.ofKind('stop-requested').map(e => e.phase)).toEqual(['Uploading'])
        expect(events.events[events.events.length - 1].kind).toBe('stopped')
    })

    it('cancels a read in progress on stop instead of waiting for the read timeout', async () => {
        const started = deferred<void>()
        let readSignal: AbortSignal | undefined
        const reader: InstrumentReader = {
            sensorId: SENSOR,
            read: (signal) => {
                readSignal = signal
                started.resolve()
                return new Promise<Measurement>((_resolve, reject) => {
                    signal?.addEventListener('abort', () => reject(new Error('socket closed')), { once: true })
                })
            },
        }
        const uploader = new FakeUploader()
        const { pump, events } = build({ config: { readTimeoutMs: 60_000 }, reader, uploader })

        const running = pump.run()
        await started.promise

        const stopAt = Date.now()
        pump.requestStop()
        await running

        expect(Date.now() - stopAt).toBeLessThan(1000)
        expect(readSignal?.aborted).toBe(true)
        expect(events.ofKind('read-skipped').map(e => e.reason)).toEqual(['aborted'])
        expect(events.ofKind('stop-requested').map(e => e.phase)).toEqual(['Polling'])
        expect(uploader.batches).toEqual([])
        expect(pump.getStats().skippedReads).toBe(1)
    })

    it('cuts a backoff wait short on stop and keeps the batch pending', async () => {
        const uploader = new FakeUploader([failure('ServerError', 500)])
        let stop = (): void => undefined
        const { pump, store } = build({ reader: new FakeReader(1), uploader, onSleep: () => stop() })
        stop = () => pump.requestStop()

        await pump.run()

        expect(uploader.batches).toEqual([[1]])
        expect(store.pendingCount()).toBe(1)
        expect(pump.getPhase()).toBe('ShuttingDown')
    })

    it('sleeps pollIntervalMs between ticks', async () => {
        let sleeps = 0
        let stop = (): void => undefined
        const { pump, delays } = build({
            config: { pollIntervalMs: 60_000 },
            reader: new FakeReader(3),
            uploader: new FakeUploader(),
            onSleep: () => { if (++sleeps === 3) stop() },
        })
        stop = () => pump.requestStop()

        await pump.run()

        expect(delays).toEqual([60_000, 60_000, 60_000])
        expect(pump.getStats().acknowledged).toBe(3)
    })

    it('rejects when the store fails, and still reports the stop', async () => {
        const inner = memoryStore()
        const broken: SampleStore = {
            append: () => { throw new StoreError('IOFailure', 'disk gone') },
            peekBatch: (n) => inner.peekBatch(n),
            acknowledge: (s) => inner.acknowledge(s),
            pendingCount: () => inner.pendingCount(),
            lastSequence: () => inner.lastSequence(),
            resumePoint: (id) => inner.resumePoint(id),
            deadLetter: (ms, reason) => inner.deadLetter(ms, reason),
            deadLetterCount: () => inner.deadLetterCount(),
            close: () => inner.close(),
        }
        const { pump, events } = build({ store: broken, reader: new FakeReader(1), uploader: new FakeUploader() })

        await expect(pump.run()).rejects.toThrow('disk gone')

        expect(events.ofKind('fatal-error').map(e => e.error)).toEqual(['disk gone'])
        expect(pump.getPhase()).toBe('ShuttingDown')
        await expect(pump.whenStopped()).resolves.toBeUndefined()
    })

    it('refuses to run twice at once', async () => {
        let stop = (): void => undefined
        const { pump } = build({ reader: new FakeReader(0), uploader: new FakeUploader(), onSleep: () => stop() })
        stop = () => pump.requestStop()

        const first = pump.run()
        await expect(pump.run()).rejects.toThrow('pump is already running')
        await first
    })
})

describe('Pump restart', () => {
    let dir = ''

    afterEach(() => {
        if (dir) rmSync(dir, { recursive: true, force: true })
    })

    it('replays the backlog after a restart without duplicates', async () => {
        dir = mkdtempSync(join(tmpdir(), 'pump-restart-'))
        const path = join(dir, 'agent.db')

        const first = SqliteSampleStore.open({ path, capacity: 100 })
        const down = new FakeUploader([failure('NetworkUnreachable')])
        let stop = (): void => undefined
        const before = build({ store: first, config: { readsPerTick: 3 }, reader: new FakeReader(3), uploader: down, onSleep: () => stop() })
        stop = () => before.pump.requestStop()
        await before.pump.run()
        first.close()

        const second = SqliteSampleStore.open({ path, capacity: 100 })
        const uploader = new FakeUploader()
        const after = build({
            store: second,
            config: { readsPerTick: 2 },
            reader: new FakeReader(2, [], second.lastSequence()),
            uploader,
        })
        await after.pump.tick()

        expect(uploader.batches).toEqual([[1, 2, 3, 4, 5]])
        expect(second.pendingCount()).toBe(0)
        second.close()
    })
})
