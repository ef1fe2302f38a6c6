// services/agent/src/server.ts

import type { FastifyInstance } from 'fastify'

import {
    createLogger,
    LogChannel,
    makeClientBuffer,
} from '@fidas-agent/logging'

import { buildApp } from './app.js'
import { createAgentStatusSource } from './plugins/status.js'
import { loadEnv } from './core/config/loadEnv.js'
import {
    buildAgentConfigFromEnv,
    summarizeAgentConfig,
    validateAgentConfig,
    type AgentConfig,
} from './core/config/agentConfig.js'
import { errorMessage } from './core/pipeline/errors.js'
import type { InstrumentReader } from './core/pipeline/types.js'
import { SqliteSampleStore } from './core/store/SqliteSampleStore.js'
import { Pump } from './core/pump/Pump.js'
import { LifecycleController, type FlushStep } from './core/lifecycle/LifecycleController.js'
import { FidasFtpReader } from './devices/fidas/FidasFtpReader.js'
import { FtpFileSource } from './devices/fidas/ftpSource.js'
import { SimulatedFidasReader } from './devices/fidas/SimulatedFidasReader.js'
import { CitiesAirUploader } from './sinks/citiesair/CitiesAirUploader.js'
import { PumpLoggerEventSink } from './adapters/pump.adapter.js'
import { FidasLoggerEventSink } from './adapters/fidas.adapter.js'
import { CitiesAirLoggerEventSink } from './adapters/citiesair.adapter.js'

const loadedEnvFiles = loadEnv()

function createReader(cfg: AgentConfig, store: SqliteSampleStore, fidasEvents: FidasLoggerEventSink): InstrumentReader {
    const lastSequence = store.lastSequence()

    if (cfg.fidas.kind === 'simulated') {
        return new SimulatedFidasReader({
            sensorId: cfg.fidas.sensorId,
            tzOffsetHours: cfg.fidas.tzOffsetHours,
            lastSequence,
        })
    }

    return new FidasFtpReader(cfg.fidas, {
        source: new FtpFileSource(cfg.fidas.ftp, { events: fidasEvents }),
        resume: store.resumePoint(cfg.fidas.sensorId),
        lastSequence,
        events: fidasEvents,
    })
}

async function start(): Promise<void> {
    const clientBuf = makeClientBuffer()
    const { channel } = createLogger('fidas-agent', clientBuf)
    const logAgent = channel(LogChannel.agent)
    const logLifecycle = channel(LogChannel.lifecycle)

    if (loadedEnvFiles.length > 0) {
        logAgent.debug(`kind=env-loaded files=${loadedEnvFiles.join(',')}`)
    }

    // 1) Config
    const cfg = buildAgentConfigFromEnv(process.env)
    const validation = validateAgentConfig(cfg, process.env)
    if (!validation.ok) {
        for (const e of validation.errors) logAgent.fatal(`kind=config-invalid error=${JSON.stringify(e)}`)
        process.exit(1)
    }
    logAgent.info('kind=config-loaded', summarizeAgentConfig(cfg))

    if (!cfg.citiesair.dryRun && cfg.citiesair.apiKey === null) {
        logAgent.warn('kind=no-api-key note=requests-are-sent-unauthenticated')
    }

    // 2) Store
    let store: SqliteSampleStore
    try {
        store = SqliteSampleStore.open(cfg.store)
    } catch (err) {
        logAgent.fatal(`kind=store-open-failed error=${JSON.stringify(errorMessage(err))}`)
        process.exit(1)
    }
    channel(LogChannel.store).info(
        `kind=store-opened path=${cfg.store.path} pending=${store.pendingCount()} deadLettered=${store.deadLetterCount()} lastSequence=${store.lastSequence()}`
    )

    // 3) Reader, uploader, pump
    const reader = createReader(cfg, store, new FidasLoggerEventSink(channel(LogChannel.fidas)))
    const uploader = new CitiesAirUploader(cfg.citiesair, {
        events: new CitiesAirLoggerEventSink(channel(LogChannel.citiesair)),
    })
    const pump = new Pump(cfg.pump, {
        store,
        reader,
        uploader,
        events: new PumpLoggerEventSink(channel(LogChannel.pump)),
    })

    // 4) Optional status server
    let app: FastifyInstance | null = null
    if (cfg.status.port > 0) {
        app = buildApp({
            clientBuf,
            status: createAgentStatusSource({
                pump,
                store,
                sensorId: cfg.fidas.sensorId,
                reader: cfg.fidas.kind,
                uploader: uploader.id,
                dryRun: cfg.citiesair.dryRun,
            }),
        })
        try {
            await app.listen({ port: cfg.status.port, host: cfg.status.host })
            logAgent.info(`kind=status-listening host=${cfg.status.host} port=${cfg.status.port}`)
        } catch (err) {
            // status is read-only; the pump runs without it
            logAgent.error(`kind=status-listen-failed error=${JSON.stringify(errorMessage(err))}`)
            app = null
        }
    }

    // 5) Lifecycle
    const flush: FlushStep[] = []
    const statusApp = app
    if (statusApp) flush.push({ name: 'status-server', run: () => statusApp.close() })
    if (reader.close) {
        const closeReader = reader.close.bind(reader)
        flush.push({ name: 'reader', run: closeReader })
    }
    flush.push({ name: 'store', run: () => store.close() })

    const lifecycle = new LifecycleController({
        pump,
        log: logLifecycle,
        graceMs: cfg.shutdownGraceMs,
        flush,
    })
    lifecycle.installSignalHandlers()

    logAgent.info(
        `kind=agent-started sensor=${cfg.fidas.sensorId} reader=${cfg.fidas.kind} uploader=${uploader.id} dryRun=${cfg.citiesair.dryRun}`
    )
    await lifecycle.supervise(pump.run())
}

start().catch((err: unknown) => {
    process.stderr.write(`fidas-agent failed to start: ${errorMessage(err)}\n`)
    process.exit(1)
})
