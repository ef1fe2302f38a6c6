// services/agent/src/sinks/citiesair/citiesair.config.ts

import { readFileSync } from 'node:fs'

import {
    clampInt,
    parseBool,
    parseIntSafe,
    parseOptionalString,
} from '../../core/config/env.js'
import { errorMessage } from '../../core/pipeline/errors.js'

export type CitiesAirConfig = {
    apiUrl: string | null
    /** Credential value; never logged. */
    apiKey: string | null
    apiKeySource: 'env' | 'file' | null
    /** Set when CITIESAIR_API_KEY_FILE could not be read. */
    apiKeyError: string | null
    authHeader: string
    /** Prefix before the key ('' sends the bare key). */
    authScheme: string
    dryRun: boolean
    timeoutMs: number
    /** How much of a rejection body ends up in the error message. */
    bodyPreviewChars: number
}

export type ReadTextFile = (path: string) => string

const readUtf8: ReadTextFile = (path) => readFileSync(path, 'utf8')

/**
 * Build CitiesAirConfig from environment.
 *
 * Does not throw: a missing URL or an unreadable key file is reported by
 * validateCitiesAirConfig().
 */
export function buildCitiesAirConfigFromEnv(
    env: NodeJS.ProcessEnv = process.env,
    readFile: ReadTextFile = readUtf8
): CitiesAirConfig {
    let apiKey = parseOptionalString(env.CITIESAIR_API_KEY)
    let apiKeySource: CitiesAirConfig['apiKeySource'] = apiKey ? 'env' : null
    let apiKeyError: string | null = null

    const keyFile = parseOptionalString(env.CITIESAIR_API_KEY_FILE)
    if (!apiKey && keyFile) {
        try {
            apiKey = readFile(keyFile).trim() || null
            apiKeySource = apiKey ? 'file' : null
            if (!apiKey) apiKeyError = `CITIESAIR_API_KEY_FILE ${keyFile} is empty`
        } catch (err) {
            apiKeyError = `cannot read CITIESAIR_API_KEY_FILE ${keyFile}: ${errorMessage(err)}`
        }
    }

    return {
        apiUrl: parseOptionalString(env.CITIESAIR_API_URL),
        apiKey,
        apiKeySource,
        apiKeyError,
        authHeader: parseOptionalString(env.CITIESAIR_AUTH_HEADER) ?? 'Authorization',
        authScheme: env.CITIESAIR_AUTH_SCHEME === undefined ? 'Bearer' : env.CITIESAIR_AUTH_SCHEME.trim(),
        dryRun: parseBool(env.CITIESAIR_DRY_RUN, false),
        timeoutMs: clampInt(parseIntSafe(env.UPLOAD_TIMEOUT_MS, 30_000), 1_000, 600_000),
        bodyPreviewChars: 300,
    }
}

/** Returns every problem; dry-run needs no endpoint or credential. */
export function validateCitiesAirConfig(cfg: CitiesAirConfig): string[] {
    const errors: string[] = []
    if (cfg.dryRun) return errors

    if (!cfg.apiUrl) {
        errors.push('CITIESAIR_API_URL is required unless CITIESAIR_DRY_RUN=true')
    } else if (!isHttpUrl(cfg.apiUrl)) {
        errors.push(`CITIESAIR_API_URL must be an http(s) URL (got "${cfg.apiUrl}")`)
    }

    if (cfg.apiKeyError) errors.push(cfg.apiKeyError)
    return errors
}

function isHttpUrl(v: string): boolean {
    try {
        const u = new URL(v)
        return u.protocol === 'http:' || u.protocol === 'https:'
    } catch {
        return false
    }
}
