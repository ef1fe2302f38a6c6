import { describe, expect, it } from 'vitest'

import { makeClientBuffer } from '../buffer.js'
import { LogChannel, type ClientLog } from '../types.js'

function entry(message: string): ClientLog {
    return {
        ts: 0,
        channel: LogChannel.pump,
        emoji: '🔁',
        color: 'cyan',
        level: 'info',
        message,
    }
}

describe('makeClientBuffer', () => {
    it('keeps only the most recent entries up to the limit', () => {
        const buf = makeClientBuffer(3)
        for (const m of ['a', 'b', 'c', 'd', 'e']) buf.push(entry(m))

        expect(buf.getLatest(10).map(l => l.message)).toEqual(['c', 'd', 'e'])
        expect(buf.getLatest(2).map(l => l.message)).toEqual(['d', 'e'])
        expect(buf.getLatest(0)).toEqual([])
    })

    it('falls back to 500 entries for an unusable limit', () => {
        const buf = makeClientBuffer(Number.NaN)
        for (let i = 1; i <= 501; i++) buf.push(entry(`m${i}`))

        const latest = buf.getLatest(1000)
        expect(latest.length).toBe(500)
        expect(latest[0].message).toBe('m2')
    })
})
