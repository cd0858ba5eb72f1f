import { describe, it, expect } from 'vitest'

import Util from './Utils'

const util = new Util()

describe('Util', () => {
    it('mapWithConcurrency keeps input order and respects the limit', async () => {
        let running = 0
        let peak = 0

        const results = await util.mapWithConcurrency([30, 5, 15, 1], 2, async (ms, index) => {
            running++
            peak = Math.max(peak, running)
            await util.wait(ms)
            running--
            return `${index}:${ms}`
        })

        expect(results).toEqual(['0:30', '1:5', '2:15', '3:1'])
        expect(peak).toBe(2)
    })

    it('mapWithConcurrency handles an empty list', async () => {
        await expect(util.mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([])
    })

    it('stringToMs accepts numbers, digit strings and durations', () => {
        expect(util.stringToMs(250)).toBe(250)
        expect(util.stringToMs('1500')).toBe(1500)
        expect(util.stringToMs('2s')).toBe(2000)
        expect(() => util.stringToMs('later')).toThrow('Invalid duration: later')
    })

    it('origin returns null for unparsable URLs', () => {
        expect(util.origin('https://quiz.test:8080/quiz/1?x=1')).toBe('https://quiz.test:8080')
        expect(util.origin('not a url')).toBeNull()
    })
})
