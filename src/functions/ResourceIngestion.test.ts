import { describe, it, expect } from 'vitest'

import { classifyResource } from './ResourceIngestion'
import { FakeSpeech, fakeHttp, makeBot, testConfig } from '../test/helpers'

describe('classifyResource', () => {
    it('prefers the content type over the extension', () => {
        expect(classifyResource('https://quiz.test/data.txt', 'text/csv; charset=utf-8')).toBe('tabular')
        expect(classifyResource('https://quiz.test/download', 'application/pdf')).toBe('document')
        expect(classifyResource('https://quiz.test/track', 'audio/mpeg')).toBe('audio')
    })

    it('falls back to the extension', () => {
        expect(classifyResource('https://quiz.test/clip.opus?v=2', 'application/octet-stream')).toBe('audio')
        expect(classifyResource('https://quiz.test/data.json', '')).toBe('structured')
        expect(classifyResource('https://quiz.test/notes.txt', '')).toBe('text')
        expect(classifyResource('https://quiz.test/image.png', 'image/png')).toBe('binary')
    })
})

describe('ResourceIngestion', () => {
    it('retries transient failures and succeeds on the third attempt', async () => {
        const statuses = [500, 500, 200]
        const http = fakeHttp(() => {
            const status = statuses.shift() ?? 200
            return { status, data: Buffer.from('a,b\n1,2\n'), headers: { 'content-type': 'text/csv' } }
        })
        const bot = makeBot(testConfig(), { adapter: http.adapter })

        const resources = await bot.ingestion.ingest(['https://quiz.test/data.csv'])

        expect(http.requests).toHaveLength(3)
        expect(resources.get('https://quiz.test/data.csv')).toEqual({
            url: 'https://quiz.test/data.csv',
            kind: 'tabular',
            columns: ['a', 'b'],
            rows: [{ a: '1', b: '2' }],
            rowCount: 1
        })
    })

    it('records a failed payload after the attempts run out', async () => {
        const http = fakeHttp(() => ({ status: 500, data: Buffer.from('oops') }))
        const bot = makeBot(testConfig(), { adapter: http.adapter })

        const resources = await bot.ingestion.ingest(['https://quiz.test/data.csv'])

        expect(http.requests).toHaveLength(3)
        expect(resources.get('https://quiz.test/data.csv')).toEqual({
            url: 'https://quiz.test/data.csv',
            kind: 'failed',
            errorKind: 'transient',
            error: 'HTTP 500',
            attempts: 3
        })
    })

    it('treats an empty body as a transient failure', async () => {
        const http = fakeHttp(() => ({ status: 200, data: Buffer.alloc(0) }))
        const bot = makeBot(testConfig({ resources: { maxAttempts: 2 } }), { adapter: http.adapter })

        const payload = await bot.ingestion.ingestOne('https://quiz.test/empty.txt')

        expect(payload).toEqual({ url: 'https://quiz.test/empty.txt', kind: 'failed', errorKind: 'transient', error: 'Empty response', attempts: 2 })
    })

    it('records a parse failure without aborting the batch', async () => {
        const http = fakeHttp(({ url }) => url.endsWith('.json')
            ? { status: 200, data: Buffer.from('{not json'), headers: { 'content-type': 'application/json' } }
            : { status: 200, data: Buffer.from('hello world'), headers: { 'content-type': 'text/plain' } })
        const bot = makeBot(testConfig(), { adapter: http.adapter })

        const resources = await bot.ingestion.ingest(['https://quiz.test/bad.json', 'https://quiz.test/notes.txt'])

        const bad = resources.get('https://quiz.test/bad.json')
        expect(bad?.kind).toBe('failed')
        if (bad?.kind === 'failed') {
            expect(bad.errorKind).toBe('parse')
            expect(bad.attempts).toBe(1)
            expect(bad.error).toMatch(/^JSON parse error: /)
        }
        expect(resources.get('https://quiz.test/notes.txt')).toEqual({ url: 'https://quiz.test/notes.txt', kind: 'text', content: 'hello world' })
    })

    it('keeps the input order in the map whatever order downloads finish in', async () => {
        const delays: Record<string, number> = {
            'https://quiz.test/slow.txt': 40,
            'https://quiz.test/fast.txt': 0,
            'https://quiz.test/medium.txt': 10
        }
        const http = fakeHttp(async ({ url }) => {
            await new Promise(resolve => setTimeout(resolve, delays[url] ?? 0))
            return { status: 200, data: Buffer.from(url), headers: { 'content-type': 'text/plain' } }
        })
        const bot = makeBot(testConfig({ resources: { concurrency: 3 } }), { adapter: http.adapter })

        const resources = await bot.ingestion.ingest(Object.keys(delays))

        expect([...resources.keys()]).toEqual(Object.keys(delays))
    })

    it('truncates text bodies and parses JSON documents', async () => {
        const http = fakeHttp(({ url }) => url.endsWith('.json')
            ? { status: 200, data: Buffer.from('{"total": 7}'), headers: { 'content-type': 'application/json' } }
            : { status: 200, data: Buffer.from('abcdefghij'), headers: { 'content-type': 'text/plain' } })
        const bot = makeBot(testConfig({ resources: { maxTextChars: 4 } }), { adapter: http.adapter })

        const resources = await bot.ingestion.ingest(['https://quiz.test/a.json', 'https://quiz.test/b.txt'])

        expect(resources.get('https://quiz.test/a.json')).toEqual({ url: 'https://quiz.test/a.json', kind: 'structured', json: { total: 7 } })
        expect(resources.get('https://quiz.test/b.txt')).toEqual({ url: 'https://quiz.test/b.txt', kind: 'text', content: 'abcd' })
    })

    it('stores unknown content as binary with its size', async () => {
        const http = fakeHttp(() => ({ status: 200, data: Buffer.from([1, 2, 3, 4, 5]), headers: { 'content-type': 'image/png' } }))
        const bot = makeBot(testConfig(), { adapter: http.adapter })

        const payload = await bot.ingestion.ingestOne('https://quiz.test/pic.png')

        expect(payload).toEqual({ url: 'https://quiz.test/pic.png', kind: 'binary', sizeBytes: 5 })
    })

    it('uses a placeholder transcript when transcription is disabled', async () => {
        const bytes = Buffer.from('not really audio')
        const http = fakeHttp(() => ({ status: 200, data: bytes, headers: { 'content-type': 'audio/ogg' } }))
        const bot = makeBot(testConfig(), { adapter: http.adapter, transcriber: new FakeSpeech('unused') })

        const payload = await bot.ingestion.ingestOne('https://quiz.test/media/clue.ogg')

        expect(payload).toEqual({
            url: 'https://quiz.test/media/clue.ogg',
            kind: 'audio',
            transcript: 'Transcription disabled: clue.ogg',
            encodedBytes: bytes.toString('base64')
        })
    })
})
