import { describe, it, expect } from 'vitest'

import { cleanModelText, degradedPlan, normalizePlan, salvagePlan } from './ResponseSalvage'

describe('salvagePlan', () => {
    it('parses a bare JSON object directly', () => {
        const result = salvagePlan('{"analysis": "sum the column", "answer_type": "number", "final_answer": 12}')

        expect(result.strategy).toBe('direct')
        expect(result.plan.analysis).toBe('sum the column')
        expect(result.plan.answerType).toBe('number')
        expect(result.plan.finalAnswer).toBe(12)
        expect(result.plan.degraded).toBe(false)
    })

    it('cuts the object out of fenced output', () => {
        const result = salvagePlan('Here you go:\n```json\n{"analysis": "x"}\n```')

        expect(result.strategy).toBe('outermost-braces')
        expect(result.plan.analysis).toBe('x')
    })

    it('reads a plan out of a fenced json block', () => {
        const result = salvagePlan('```json\n{"analysis":"x","answer_type":"number","steps":[]}\n```')

        expect(result.plan.analysis).toBe('x')
        expect(result.plan.answerType).toBe('number')
        expect(result.plan.steps).toEqual([])
        expect(result.plan.degraded).toBe(false)
    })

    it('straightens smart quotes and flattens raw newlines', () => {
        const result = salvagePlan('{\u201Canalysis\u201D: "line one\nline two"}')

        expect(result.strategy).toBe('cleaned')
        expect(result.plan.analysis).toBe('line one line two')
    })

    it('falls back to a degraded plan that keeps the raw text', () => {
        const text = 'The answer is probably 42'

        const result = salvagePlan(text)

        expect(result.strategy).toBeNull()
        expect(result.plan).toEqual({
            analysis: 'Failed to parse JSON. Raw response: The answer is probably 42',
            dataNeeded: [],
            steps: ['Manual parsing required'],
            answerType: 'string',
            solutionCode: null,
            finalAnswer: null,
            degraded: true,
            solution: text
        })
    })

    it('ignores JSON that is not an object', () => {
        expect(salvagePlan('[1, 2, 3]').plan.degraded).toBe(true)
    })
})

describe('normalizePlan', () => {
    it('defaults unknown answer types to string', () => {
        expect(normalizePlan({ answer_type: 'integer' }).answerType).toBe('string')
        expect(normalizePlan({ answer_type: ' Boolean ' }).answerType).toBe('boolean')
    })

    it('turns list fields into string lists', () => {
        const plan = normalizePlan({ data_needed: 'the CSV', steps: [1, { n: 2 }] })

        expect(plan.dataNeeded).toEqual(['the CSV'])
        expect(plan.steps).toEqual(['1', '{"n":2}'])
    })

    it('drops blank solution code and keeps a missing final answer as null', () => {
        const plan = normalizePlan({ solution_code: '   ' })

        expect(plan.solutionCode).toBeNull()
        expect(plan.finalAnswer).toBeNull()
        expect(plan.solution).toBeUndefined()
    })
})

describe('response helpers', () => {
    it('cleanModelText removes fences and control characters', () => {
        expect(cleanModelText('```json\n{"a":\t\u2018b\u2019}\u0007\n```')).toBe('{"a": \'b\'}')
    })

    it('degradedPlan previews only the first 200 characters', () => {
        const text = 'x'.repeat(250)

        expect(degradedPlan(text).analysis).toBe(`Failed to parse JSON. Raw response: ${'x'.repeat(200)}`)
        expect(degradedPlan(text).solution).toBe(text)
    })
})
