import { afterEach, describe, expect, it } from 'vitest'
import type { FastifyInstance } from 'fastify'

import { LogChannel, makeClientBuffer, type ClientLogBuffer } from '@fidas-agent/logging'

import { buildApp } from '../app.js'
import { createAgentStatusSource, type PumpView } from '../plugins/status.js'
import type { PumpStats } from '../core/pump/types.js'

const stats: PumpStats = {
    reads: 7,
    skippedReads: 1,
    protocolErrors: 0,
    appended: 6,
    storeFull: 0,
    dropped: 0,
    batchesSent: 2,
    acknowledged: 5,
    uploadFailures: 1,
    backoffCycles: 1,
    deadLettered: 0,
    lastAppendAt: null,
    lastAcknowledgeAt: null,
    lastErrorAt: null,
}

const pump: PumpView = {
    getPhase: () => 'Idle',
    getStats: () => stats,
    stopRequested: false,
}

function logBuffer(count: number): ClientLogBuffer {
    const buf = makeClientBuffer(1000)
    for (let i = 1; i <= count; i++) {
        buf.push({ ts: i, channel: LogChannel.pump, emoji: '', color: 'cyan', level: 'info', message: `line ${i}` })
    }
    return buf
}

describe('status app', () => {
    let app: FastifyInstance

    function build(buf: ClientLogBuffer = logBuffer(0)): FastifyInstance {
        app = buildApp({
            clientBuf: buf,
            status: createAgentStatusSource({
                pump,
                store: { pendingCount: () => 1, deadLetterCount: () => 3 },
                sensorId: 'fidas-roof',
                reader: 'ftp',
                uploader: 'citiesair',
                dryRun: false,
                startedAt: Date.UTC(2025, 10, 26, 5, 0, 0),
                now: () => Date.UTC(2025, 10, 26, 5, 1, 0),
            }),
        })
        return app
    }

    afterEach(async () => {
        await app.close()
    })

    it('answers /health', async () => {
        const res = await build().inject({ method: 'GET', url: '/health' })

        expect(res.statusCode).toBe(200)
        expect(res.json()).toEqual({ status: 'ok' })
    })

    it('reports pump state and store counts on /status', async () => {
        const res = await build().inject({ method: 'GET', url: '/status' })

        expect(res.statusCode).toBe(200)
        expect(res.json()).toEqual({
            phase: 'Idle',
            stopping: false,
            sensorId: 'fidas-roof',
            reader: 'ftp',
            uploader: 'citiesair',
            dryRun: false,
            pending: 1,
            deadLettered: 3,
            stats,
            startedAt: '2025-11-26T05:00:00.000Z',
            uptimeMs: 60_000,
        })
    })

    it('exposes the status source it serves on the instance', async () => {
        const instance = build()
        await instance.ready()

        expect(instance.agentStatus.snapshot()).toMatchObject({ sensorId: 'fidas-roof', pending: 1, uptimeMs: 60_000 })
    })

    it('returns the newest 100 log entries by default', async () => {
        const res = await build(logBuffer(150)).inject({ method: 'GET', url: '/api/logs' })
        const logs: Array<{ message: string }> = res.json<{ logs: Array<{ message: string }> }>().logs

        expect(logs.length).toBe(100)
        expect(logs[0].message).toBe('line 51')
        expect(logs[99].message).toBe('line 150')
    })

    it('honours n and caps it at 500', async () => {
        const buf = logBuffer(600)

        const few = await build(buf).inject({ method: 'GET', url: '/api/logs?n=2' })
        expect(few.json<{ logs: Array<{ message: string }> }>().logs.map(l => l.message)).toEqual(['line 599', 'line 600'])

        const many = await app.inject({ method: 'GET', url: '/api/logs?n=9999' })
        expect(many.json<{ logs: unknown[] }>().logs.length).toBe(500)
    })
})
