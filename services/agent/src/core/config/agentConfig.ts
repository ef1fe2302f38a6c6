// services/agent/src/core/config/agentConfig.ts

import type { PumpConfig } from '../pump/types.js'
import type { SampleStoreOptions } from '../store/types.js'
import type { FidasConfig } from '../../devices/fidas/types.js'
import { buildFidasConfigFromEnv, validateFidasConfig } from '../../devices/fidas/utils.js'
import {
    buildCitiesAirConfigFromEnv,
    validateCitiesAirConfig,
    type CitiesAirConfig,
    type ReadTextFile,
} from '../../sinks/citiesair/citiesair.config.js'
import {
    clampInt,
    clampNumber,
    parseIntSafe,
    parseNumberSafe,
    parseOptionalString,
} from './env.js'

export type StatusServerConfig = {
    /** 0 disables the status server. */
    port: number
    host: string
}

export type AgentConfig = {
    pump: PumpConfig
    store: SampleStoreOptions
    shutdownGraceMs: number
    fidas: FidasConfig
    citiesair: CitiesAirConfig
    status: StatusServerConfig
}

export function buildAgentConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    readFile?: ReadTextFile
): AgentConfig {
    return {
        pump: {
            pollIntervalMs: clampInt(parseIntSafe(env.POLL_INTERVAL_MS, 60_000), 1_000, 86_400_000),
            readsPerTick: clampInt(parseIntSafe(env.READS_PER_TICK, 1), 1, 10_000),
            readTimeoutMs: clampInt(parseIntSafe(env.READ_TIMEOUT_MS, 30_000), 1_000, 600_000),
            maxBatchSize: clampInt(parseIntSafe(env.UPLOAD_MAX_BATCH, 500), 1, 10_000),
            uploadTimeoutMs: clampInt(parseIntSafe(env.UPLOAD_TIMEOUT_MS, 30_000), 1_000, 600_000),
            backoff: {
                baseDelayMs: clampInt(parseIntSafe(env.BACKOFF_BASE_MS, 1_000), 100, 3_600_000),
                maxDelayMs: clampInt(parseIntSafe(env.BACKOFF_MAX_MS, 300_000), 100, 86_400_000),
                jitter: clampNumber(parseNumberSafe(env.BACKOFF_JITTER, 0.2), 0, 1),
            },
        },
        store: {
            path: parseOptionalString(env.STORE_PATH) ?? './data/fidas-agent.db',
            capacity: clampInt(parseIntSafe(env.STORE_CAPACITY, 100_000), 1, 10_000_000),
        },
        shutdownGraceMs: clampInt(parseIntSafe(env.SHUTDOWN_GRACE_MS, 10_000), 0, 600_000),
        fidas: buildFidasConfigFromEnv(env),
        citiesair: buildCitiesAirConfigFromEnv(env, readFile),
        status: {
            port: clampInt(parseIntSafe(env.STATUS_PORT, 0), 0, 65_535),
            host: parseOptionalString(env.STATUS_HOST) ?? '127.0.0.1',
        },
    }
}

export type AgentConfigValidation = { ok: true } | { ok: false; errors: string[] }

/** Collects every problem so one restart fixes them all. */
export function validateAgentConfig(cfg: AgentConfig, env: NodeJS.ProcessEnv = process.env): AgentConfigValidation {
    const errors: string[] = []

    const { baseDelayMs, maxDelayMs } = cfg.pump.backoff
    if (maxDelayMs < baseDelayMs) {
        errors.push(`BACKOFF_MAX_MS (${maxDelayMs}) must not be below BACKOFF_BASE_MS (${baseDelayMs})`)
    }

    errors.push(...validateFidasConfig(cfg.fidas, env.READER_KIND))
    errors.push(...validateCitiesAirConfig(cfg.citiesair))

    return errors.length === 0 ? { ok: true } : { ok: false, errors }
}

/** Loggable view of the config: credentials are reduced to whether they are set. */
export function summarizeAgentConfig(cfg: AgentConfig): Record<string, unknown> {
    return {
        pump: cfg.pump,
        store: cfg.store,
        shutdownGraceMs: cfg.shutdownGraceMs,
        reader: {
            kind: cfg.fidas.kind,
            sensorId: cfg.fidas.sensorId,
            tzOffsetHours: cfg.fidas.tzOffsetHours,
            ftpHost: cfg.fidas.ftp.host,
            ftpPort: cfg.fidas.ftp.port,
            ftpUser: cfg.fidas.ftp.username,
            ftpPasswordSet: cfg.fidas.ftp.password !== null,
            ftpHomeDir: cfg.fidas.ftp.homeDir,
        },
        uploader: {
            apiUrl: cfg.citiesair.apiUrl,
            apiKeySource: cfg.citiesair.apiKeySource,
            authHeader: cfg.citiesair.authHeader,
            dryRun: cfg.citiesair.dryRun,
        },
        status: cfg.status,
    }
}
