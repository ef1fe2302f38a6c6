// services/agent/src/app.ts

import Fastify, {
    type FastifyInstance,
    type FastifyServerOptions,
    type FastifyRequest,
    type FastifyReply,
} from 'fastify'

import {
    createLogger,
    LogChannel,
    type ClientLogBuffer,
} from '@fidas-agent/logging'

import statusPlugin, { type AgentStatusSource } from './plugins/status.js'

export interface BuildAppDeps {
    clientBuf: ClientLogBuffer
    status: AgentStatusSource
}

/**
 * Status HTTP surface. Nothing here mutates the pump or the store; the agent
 * runs the same with or without it.
 */
export function buildApp(deps: BuildAppDeps, opts: FastifyServerOptions = {}): FastifyInstance {
    const { channel } = createLogger('fidas-agent', deps.clientBuf)
    const logHttp = channel(LogChannel.http)

    const startedAt = new Map<string, number>()

    const app = Fastify({ logger: false, ...opts })
    app.decorate('clientBuf', deps.clientBuf)

    // ---------- Request/Response logging hooks ----------
    app.addHook('onRequest', async (req: FastifyRequest) => {
        startedAt.set(req.id, Date.now())
    })

    app.addHook('onResponse', async (req: FastifyRequest, reply: FastifyReply) => {
        const start = startedAt.get(req.id)
        startedAt.delete(req.id)
        const ms = start !== undefined ? Date.now() - start : undefined

        logHttp.debug(`${req.method} ${req.url} → ${reply.statusCode}${ms !== undefined ? ` (${ms} ms)` : ''}`)
    })
    // ---------------------------------------------------

    app.get('/health', async () => ({ status: 'ok' }))

    void app.register(statusPlugin, { source: deps.status })

    return app
}
