// services/agent/src/plugins/status.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import type { ClientLog, ClientLogBuffer } from '@fidas-agent/logging'

import { clampInt, parseIntSafe } from '../core/config/env.js'
import type { PumpPhase, PumpStats } from '../core/pump/types.js'
import type { SampleStore } from '../core/store/types.js'

declare module 'fastify' {
    interface FastifyInstance {
        clientBuf: ClientLogBuffer
        agentStatus: AgentStatusSource
    }
}

export interface AgentStatus {
    phase: PumpPhase
    stopping: boolean
    sensorId: string
    reader: string
    uploader: string
    dryRun: boolean
    pending: number
    deadLettered: number
    stats: PumpStats
    startedAt: string
    uptimeMs: number
}

export interface AgentStatusSource {
    snapshot(): AgentStatus
}

/** What the status source needs from the pump. */
export interface PumpView {
    getPhase(): PumpPhase
    getStats(): PumpStats
    readonly stopRequested: boolean
}

export function createAgentStatusSource(deps: {
    pump: PumpView
    store: Pick<SampleStore, 'pendingCount' | 'deadLetterCount'>
    sensorId: string
    reader: string
    uploader: string
    dryRun: boolean
    startedAt?: number
    now?: () => number
}): AgentStatusSource {
    const now = deps.now ?? Date.now
    const startedAt = deps.startedAt ?? now()

    return {
        snapshot: () => ({
            phase: deps.pump.getPhase(),
            stopping: deps.pump.stopRequested,
            sensorId: deps.sensorId,
            reader: deps.reader,
            uploader: deps.uploader,
            dryRun: deps.dryRun,
            pending: deps.store.pendingCount(),
            deadLettered: deps.store.deadLetterCount(),
            stats: deps.pump.getStats(),
            startedAt: new Date(startedAt).toISOString(),
            uptimeMs: now() - startedAt,
        }),
    }
}

export interface StatusPluginOptions {
    source: AgentStatusSource
}

interface LogsQuery {
    n?: string
}

const LOGS_DEFAULT = 100
const LOGS_MAX = 500

/**
 * status plugin
 *
 *   GET /status        pump phase, counters, pending + dead-letter counts
 *   GET /api/logs?n=   newest n buffered log entries (default 100, max 500)
 *
 * Read-only; app.ts must decorate app.clientBuf before registering it.
 */
const statusPlugin: FastifyPluginAsync<StatusPluginOptions> = async (app: FastifyInstance, opts) => {
    if (!app.clientBuf) {
        throw new Error('status plugin: app.clientBuf missing; decorate it before registering the plugin')
    }

    app.decorate('agentStatus', opts.source)

    app.get('/status', async (): Promise<AgentStatus> => app.agentStatus.snapshot())

    app.get<{ Querystring: LogsQuery }>('/api/logs', async (req): Promise<{ logs: ClientLog[] }> => {
        const n = clampInt(parseIntSafe(req.query.n, LOGS_DEFAULT), 1, LOGS_MAX)
        return { logs: app.clientBuf.getLatest(n) }
    })
}

export default fp(statusPlugin, { name: 'agent-status' })
