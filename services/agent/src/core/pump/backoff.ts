// services/agent/src/core/pump/backoff.ts

export interface BackoffPolicy {
    /** First delay in ms. */
    baseDelayMs: number
    /** Ceiling in ms. */
    maxDelayMs: number
    /** Fraction (0..1) of each delay that is randomised away. */
    jitter: number
}

/**
 * Nominal exponential delay for the given 1-based attempt:
 * base * 2^(attempt-1), clamped to [base, max].
 */
export function computeBackoffDelay(policy: BackoffPolicy, attempt: number): number {
    let baseDelayMs = policy.baseDelayMs
    let maxDelayMs = policy.maxDelayMs
    if (baseDelayMs <= 0) baseDelayMs = 1000
    if (maxDelayMs < baseDelayMs) maxDelayMs = baseDelayMs

    const exp = Math.pow(2, Math.max(0, attempt - 1))
    let candidate = baseDelayMs * exp

    if (candidate > maxDelayMs) candidate = maxDelayMs
    if (candidate < baseDelayMs) candidate = baseDelayMs

    return candidate
}

/**
 * Stateful backoff for one retry episode.
 *
 * Jitter shaves up to `jitter * nominal` off each delay, but a delay is never
 * shorter than the one before it and never longer than the ceiling.
 */
export class ExponentialBackoff {
    private readonly policy: BackoffPolicy
    private readonly random: () => number

    private attempt = 0
    private previousDelayMs = 0

    constructor(policy: BackoffPolicy, random: () => number = Math.random) {
        this.policy = policy
        this.random = random
    }

    get attempts(): number {
        return this.attempt
    }

    next(): number {
        this.attempt += 1

        const nominal = computeBackoffDelay(this.policy, this.attempt)
        const jitter = Math.min(1, Math.max(0, this.policy.jitter))
        const jittered = Math.round(nominal * (1 - jitter * this.random()))

        const ceiling = Math.max(this.policy.maxDelayMs, this.policy.baseDelayMs)
        const delay = Math.min(ceiling, Math.max(this.previousDelayMs, jittered))

        this.previousDelayMs = delay
        return delay
    }

    reset(): void {
        this.attempt = 0
        this.previousDelayMs = 0
    }
}
