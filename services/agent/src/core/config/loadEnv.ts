// services/agent/src/core/config/loadEnv.ts

import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones. Returns the files that were applied.
 */
export function loadEnv(
    cwd: string = process.cwd(),
    nodeEnv: string = String(process.env.NODE_ENV || 'production'),
    target: NodeJS.ProcessEnv = process.env
): string[] {
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${nodeEnv}`),
        path.resolve(cwd, '.env.local'),
    ]

    const loaded: string[] = []
    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true, processEnv: target })
            loaded.push(file)
        }
    }
    return loaded
}
