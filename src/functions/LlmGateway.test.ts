import { describe, it, expect } from 'vitest'
import { AxiosAdapter, InternalAxiosRequestConfig } from 'axios'

import { LlmGateway } from './LlmGateway'
import AxiosClient from '../util/Axios'
import { LlmGatewayError } from '../errors'
import { fakeHttp, testConfig } from '../test/helpers'

function gateway(adapter: AxiosAdapter, token = 'test-token'): LlmGateway {
    const config = testConfig({ llm: { token } })
    return new LlmGateway(new AxiosClient({ adapter }), config.llm, config.transcription)
}

describe('LlmGateway.complete', () => {
    it('posts an OpenAI-style chat request and returns the trimmed content', async () => {
        const http = fakeHttp(() => ({ status: 200, data: { choices: [{ message: { role: 'assistant', content: '  {"a": 1}\n' } }] } }))

        const content = await gateway(http.adapter).complete([{ role: 'user', content: 'hi' }], 64)

        expect(content).toBe('{"a": 1}')
        expect(http.requests).toEqual([{
            method: 'POST',
            url: 'https://llm.test/v1/chat/completions',
            data: { model: 'openai/gpt-4o-mini', messages: [{ role: 'user', content: 'hi' }], temperature: 0, max_tokens: 64 }
        }])
    })

    it('sends the token as a bearer credential', async () => {
        let authorization: unknown
        const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
            authorization = config.headers.get('Authorization')
            return { status: 200, statusText: 'OK', headers: {}, config, data: { choices: [{ message: { content: 'ok' } }] } }
        }

        await gateway(adapter).complete([], 8)

        expect(authorization).toBe('Bearer test-token')
    })

    it('refuses to call without a token', async () => {
        const http = fakeHttp(() => ({ status: 200 }))

        await expect(gateway(http.adapter, '').complete([], 8)).rejects.toThrow('LLM token not configured')
        expect(http.requests).toEqual([])
    })

    it('reports the status and body of a failed call', async () => {
        const http = fakeHttp(() => ({ status: 401, data: { error: 'bad token' } }))

        const promise = gateway(http.adapter).complete([], 8)

        await expect(promise).rejects.toBeInstanceOf(LlmGatewayError)
        await expect(promise).rejects.toThrow('Chat completion failed: HTTP 401: {"error":"bad token"}')
    })

    it('rejects empty content', async () => {
        const http = fakeHttp(() => ({ status: 200, data: { choices: [{ message: { content: '   ' } }] } }))

        await expect(gateway(http.adapter).complete([], 8)).rejects.toThrow('Chat completion returned empty content')
    })

    it('rejects a response without choices', async () => {
        const http = fakeHttp(() => ({ status: 200, data: { choices: [] } }))

        await expect(gateway(http.adapter).complete([], 8)).rejects.toThrow(/^Unexpected chat completion response: /)
    })
})

describe('LlmGateway.transcribe', () => {
    it('uploads the WAV as multipart form data', async () => {
        const http = fakeHttp(() => ({ status: 200, data: { text: ' the answer is blue ' } }))

        const text = await gateway(http.adapter).transcribe(Buffer.from('RIFF'), 'clue.wav')

        expect(text).toBe('the answer is blue')
        expect(http.requests[0]?.url).toBe('https://llm.test/v1/audio/transcriptions')
        const form = http.requests[0]?.data
        expect(form).toBeInstanceOf(FormData)
        if (form instanceof FormData) {
            expect(form.get('model')).toBe('whisper-1')
            expect(form.get('file')).toBeInstanceOf(Blob)
        }
    })

    it('fails on a non-200 status', async () => {
        const http = fakeHttp(() => ({ status: 413, data: 'too large' }))

        await expect(gateway(http.adapter).transcribe(Buffer.from('RIFF'), 'clue.wav')).rejects.toThrow('Transcription failed: HTTP 413: too large')
    })
})
