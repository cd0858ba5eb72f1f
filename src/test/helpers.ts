import { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios'

import { QuizChainBot, QuizChainDeps } from '../index'
import { PageRenderer } from '../browser/BrowserFunc'
import { ChatGateway, ChatMessage, SpeechGateway } from '../functions/LlmGateway'
import { Config } from '../interface/Config'
import { normalizeConfig } from '../util/Load'

export const STUDENT_EMAIL = 'student@example.com'
export const STUDENT_SECRET = 'test-secret'

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K] }

/**
 * Config with fast retries, no transcription and the running Node binary as sandbox interpreter.
 */
export function testConfig(overrides: DeepPartial<Config> = {}): Config {
    const base: Record<string, Record<string, unknown>> = {
        student: { email: STUDENT_EMAIL, secret: STUDENT_SECRET },
        llm: { token: 'test-token', baseUrl: 'https://llm.test/v1' },
        transcription: { enabled: false, baseUrl: 'https://llm.test/v1' },
        resources: { retryDelay: 1, timeoutRetryDelay: 1, concurrency: 2 },
        sandbox: { interpreter: process.execPath, extension: '.js', language: 'JavaScript', timeout: 5000 },
        browser: { settleDelay: 0 },
        server: { host: '127.0.0.1', port: 0, taskRetention: 60000 },
        logging: { excludeFunc: [] }
    }
    for (const [key, value] of Object.entries(overrides)) {
        base[key] = { ...base[key], ...value }
    }
    return normalizeConfig(base)
}

export interface FakeReply {
    status: number
    data?: unknown
    headers?: Record<string, string>
}

export interface RecordedRequest {
    method: string
    url: string
    data: unknown
}

/**
 * In-process axios transport. `handler` sees every request; `requests` keeps them in order.
 */
export function fakeHttp(handler: (request: RecordedRequest) => FakeReply | Promise<FakeReply>): { adapter: AxiosAdapter, requests: RecordedRequest[] } {
    const requests: RecordedRequest[] = []
    const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
        const request: RecordedRequest = {
            method: (config.method ?? 'get').toUpperCase(),
            url: config.url ?? '',
            data: typeof config.data === 'string' ? safeJson(config.data) : config.data
        }
        requests.push(request)
        const reply = await handler(request)
        const response: AxiosResponse = {
            data: reply.data ?? '',
            status: reply.status,
            statusText: String(reply.status),
            headers: reply.headers ?? {},
            config
        }
        return response
    }
    return { adapter, requests }
}

function safeJson(text: string): unknown {
    try {
        return JSON.parse(text)
    } catch {
        return text
    }
}

export class FakeRenderer implements PageRenderer {
    readonly visited: string[] = []
    private pages: Record<string, string>
    private onRender?: (url: string) => void

    constructor(pages: Record<string, string>, onRender?: (url: string) => void) {
        this.pages = pages
        this.onRender = onRender
    }

    async render(url: string): Promise<string> {
        this.visited.push(url)
        this.onRender?.(url)
        const html = this.pages[url]
        if (html === undefined) throw new Error(`No page for ${url}`)
        return html
    }
}

/**
 * Chat gateway answering from a function. Context calls (the small token budget) get `context`
 * unless the function handles them itself.
 */
export class FakeChat implements ChatGateway {
    readonly calls: { messages: ChatMessage[], maxTokens: number }[] = []
    private reply: (messages: ChatMessage[], maxTokens: number) => string | Promise<string>

    constructor(reply: (messages: ChatMessage[], maxTokens: number) => string | Promise<string>) {
        this.reply = reply
    }

    async complete(messages: ChatMessage[], maxTokens: number): Promise<string> {
        this.calls.push({ messages, maxTokens })
        return this.reply(messages, maxTokens)
    }

    /** Analysis replies in order; the context call always answers '{}' */
    static scripted(analysis: string[], contextMaxTokens = 512): FakeChat {
        const queue = [...analysis]
        return new FakeChat((_, maxTokens) => {
            if (maxTokens === contextMaxTokens) return '{}'
            const next = queue.shift()
            if (next === undefined) throw new Error('No scripted analysis left')
            return next
        })
    }
}

export class FakeSpeech implements SpeechGateway {
    readonly received: { wav: Buffer, fileName: string }[] = []
    private text: string

    constructor(text: string) {
        this.text = text
    }

    async transcribe(wav: Buffer, fileName: string): Promise<string> {
        this.received.push({ wav, fileName })
        return this.text
    }
}

export function makeBot(config: Config = testConfig(), deps: QuizChainDeps = {}): QuizChainBot {
    return new QuizChainBot(config, {
        renderer: new FakeRenderer({}),
        gateway: new FakeChat(() => {
            throw new Error('unexpected LLM call')
        }),
        transcriber: new FakeSpeech(''),
        adapter: fakeHttp(() => ({ status: 404 })).adapter,
        ...deps
    })
}

export function planJson(plan: Record<string, unknown>): string {
    return JSON.stringify({
        analysis: 'test analysis',
        data_needed: [],
        steps: ['solve'],
        answer_type: 'string',
        solution_code: null,
        final_answer: null,
        ...plan
    })
}
