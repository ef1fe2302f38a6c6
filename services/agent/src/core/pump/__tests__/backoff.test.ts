import { describe, expect, it } from 'vitest'

import { ExponentialBackoff, computeBackoffDelay } from '../backoff.js'

describe('computeBackoffDelay', () => {
    const policy = { baseDelayMs: 1000, maxDelayMs: 8000, jitter: 0 }

    it('doubles per attempt and stops at the ceiling', () => {
        expect([1, 2, 3, 4, 5, 6].map(a => computeBackoffDelay(policy, a))).toEqual([1000, 2000, 4000, 8000, 8000, 8000])
    })

    it('falls back to a 1s base when the base is not positive', () => {
        expect(computeBackoffDelay({ baseDelayMs: 0, maxDelayMs: 500, jitter: 0 }, 3)).toBe(1000)
    })
})

describe('ExponentialBackoff', () => {
    it('returns the nominal delays when the random source yields 0', () => {
        const b = new ExponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 8000, jitter: 0.2 }, () => 0)
        expect([b.next(), b.next(), b.next(), b.next(), b.next()]).toEqual([1000, 2000, 4000, 8000, 8000])
        expect(b.attempts).toBe(5)
    })

    it('shaves jitter off each delay', () => {
        const b = new ExponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 8000, jitter: 0.5 }, () => 1)
        expect([b.next(), b.next(), b.next()]).toEqual([500, 1000, 2000])
    })

    it('never returns a delay shorter than the previous one', () => {
        const randoms = [0, 1]
        const b = new ExponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 1000, jitter: 0.5 }, () => randoms.shift() ?? 0)
        expect(b.next()).toBe(1000)
        expect(b.next()).toBe(1000)
    })

    it('stays non-decreasing and within the ceiling for arbitrary jitter', () => {
        let seed = 7
        const random = (): number => {
            seed = (seed * 48271) % 2147483647
            return seed / 2147483647
        }
        const b = new ExponentialBackoff({ baseDelayMs: 100, maxDelayMs: 3000, jitter: 0.9 }, random)

        let previous = 0
        for (let i = 0; i < 50; i++) {
            const d = b.next()
            expect(d).toBeGreaterThanOrEqual(previous)
            expect(d).toBeLessThanOrEqual(3000)
            previous = d
        }
    })

    it('starts over after reset()', () => {
        const b = new ExponentialBackoff({ baseDelayMs: 1000, maxDelayMs: 8000, jitter: 0 })
        b.next()
        b.next()
        b.reset()
        expect(b.attempts).toBe(0)
        expect(b.next()).toBe(1000)
    })
})
