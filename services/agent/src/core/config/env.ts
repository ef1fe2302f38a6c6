// services/agent/src/core/config/env.ts
//
// Small, non-throwing env parsers shared by the config builders.

export function parseBool(v: string | undefined, def: boolean): boolean {
    if (v === undefined) return def
    const n = v.trim().toLowerCase()
    if (n === 'true' || n === '1' || n === 'yes') return true
    if (n === 'false' || n === '0' || n === 'no') return false
    return def
}

export function parseIntSafe(v: string | undefined, def: number): number {
    if (v === undefined || v.trim() === '') return def
    const n = Number.parseInt(v, 10)
    return Number.isFinite(n) ? n : def
}

/** Floats stay floats (e.g. 0.2 jitter, 5.5 hour offsets). */
export function parseNumberSafe(v: string | undefined, def: number): number {
    if (v === undefined || v.trim() === '') return def
    const n = Number(v)
    return Number.isFinite(n) ? n : def
}

export function clampInt(n: number, min: number, max: number): number {
    if (!Number.isFinite(n)) return min
    if (n < min) return min
    if (n > max) return max
    return Math.trunc(n)
}

export function clampNumber(n: number, min: number, max: number): number {
    if (!Number.isFinite(n)) return min
    return Math.min(max, Math.max(min, n))
}

/** Trimmed value, or null when unset or blank. */
export function parseOptionalString(v: string | undefined): string | null {
    return (v ?? '').trim() || null
}
