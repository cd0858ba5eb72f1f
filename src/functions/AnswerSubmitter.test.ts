import { describe, it, expect } from 'vitest'

import { resolveSubmissionUrl, wireAnswer } from './AnswerSubmitter'
import { QuestionRecord } from '../interface/Question'
import { SubmissionError } from '../errors'
import { STUDENT_EMAIL, STUDENT_SECRET, fakeHttp, makeBot, testConfig } from '../test/helpers'

const credentials = { email: STUDENT_EMAIL, secret: STUDENT_SECRET }

function record(submissionUrl: string | null): QuestionRecord {
    return { questionText: 'q', submissionUrl, resourceUrls: [], tableFragments: [], rawHtml: '' }
}

describe('resolveSubmissionUrl', () => {
    it('uses the endpoint named on the page first', () => {
        expect(resolveSubmissionUrl(record('https://quiz.test/answers'), 'https://quiz.test/quiz/1', 'https://override.test/submit')).toBe('https://quiz.test/answers')
    })

    it('then the configured override', () => {
        expect(resolveSubmissionUrl(record(null), 'https://quiz.test/quiz/1', 'https://override.test/submit')).toBe('https://override.test/submit')
    })

    it('then swaps the first /quiz for /submit', () => {
        expect(resolveSubmissionUrl(record(null), 'https://quiz.test/quiz/quiz-2', null)).toBe('https://quiz.test/submit/quiz-2')
    })

    it('only swaps a whole /quiz segment', () => {
        expect(resolveSubmissionUrl(record(null), 'https://quiz.test/quiz', null)).toBe('https://quiz.test/submit')
        expect(resolveSubmissionUrl(record(null), 'https://quiz.test/quiz-7?step=2', null)).toBe('https://quiz.test/submit-7?step=2')
        expect(resolveSubmissionUrl(record(null), 'https://x.test/quizzes/7', null)).toBe('https://x.test/submit')
    })

    it('then posts to /submit on the question origin', () => {
        expect(resolveSubmissionUrl(record(null), 'https://quiz.test:8443/demo?step=2', null)).toBe('https://quiz.test:8443/submit')
    })
})

describe('wireAnswer', () => {
    it('sends primitives unchanged and objects as JSON text', () => {
        expect(wireAnswer(12)).toBe(12)
        expect(wireAnswer(false)).toBe(false)
        expect(wireAnswer({ a: [1, 2] })).toBe('{"a":[1,2]}')
    })
})

describe('AnswerSubmitter', () => {
    it('posts the payload and returns the verdict', async () => {
        const http = fakeHttp(() => ({ status: 200, data: { correct: true, url: 'https://quiz.test/quiz/2', reason: null, extra: 1 } }))
        const bot = makeBot(testConfig(), { adapter: http.adapter })

        const verdict = await bot.submitter.submit(record('https://quiz.test/submit'), 'https://quiz.test/quiz/1', 99, credentials)

        expect(verdict).toEqual({ correct: true, url: 'https://quiz.test/quiz/2' })
        expect(http.requests).toEqual([{
            method: 'POST',
            url: 'https://quiz.test/submit',
            data: { email: STUDENT_EMAIL, secret: STUDENT_SECRET, url: 'https://quiz.test/quiz/1', answer: 99 }
        }])
    })

    it('keeps the reason of an incorrect verdict', async () => {
        const http = fakeHttp(() => ({ status: 200, data: { correct: false, reason: 'Off by one' } }))
        const bot = makeBot(testConfig(), { adapter: http.adapter })

        const verdict = await bot.submitter.submit(record(null), 'https://quiz.test/quiz/1', 'x', credentials)

        expect(verdict).toEqual({ correct: false, reason: 'Off by one' })
        expect(http.requests[0]?.url).toBe('https://quiz.test/submit/1')
    })

    it('fails on a non-2xx status', async () => {
        const http = fakeHttp(() => ({ status: 502, data: 'Bad gateway' }))
        const bot = makeBot(testConfig(), { adapter: http.adapter })

        const promise = bot.submitter.submit(record('https://quiz.test/submit'), 'https://quiz.test/quiz/1', 'x', credentials)

        await expect(promise).rejects.toBeInstanceOf(SubmissionError)
        await expect(promise).rejects.toThrow('HTTP error 502: Bad gateway')
    })

    it('fails on a body without a boolean verdict', async () => {
        const http = fakeHttp(() => ({ status: 200, data: { correct: 'yes' } }))
        const bot = makeBot(testConfig(), { adapter: http.adapter })

        await expect(bot.submitter.submit(record('https://quiz.test/submit'), 'https://quiz.test/quiz/1', 'x', credentials))
            .rejects.toThrow(/^Invalid verdict from https:\/\/quiz\.test\/submit: correct /)
    })

    it('wraps transport errors', async () => {
        const http = fakeHttp(() => {
            throw new Error('socket hang up')
        })
        const bot = makeBot(testConfig(), { adapter: http.adapter })

        await expect(bot.submitter.submit(record('https://quiz.test/submit'), 'https://quiz.test/quiz/1', 'x', credentials))
            .rejects.toThrow('Submit error: socket hang up')
    })
})
