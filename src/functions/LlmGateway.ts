import { z } from 'zod'
import { AxiosResponse } from 'axios'

import AxiosClient, { JsonResponse, isTimeoutError } from '../util/Axios'
import { ConfigLlm, ConfigTranscription } from '../interface/Config'
import { LlmGatewayError, errorMessage } from '../errors'

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant'
    content: string
}

/** Chat completion capability the planner depends on */
export interface ChatGateway {
    complete(messages: ChatMessage[], maxTokens: number): Promise<string>
}

/** Speech-to-text capability used for audio resources */
export interface SpeechGateway {
    transcribe(wav: Buffer, fileName: string): Promise<string>
}

const completionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({
            content: z.string().nullable().optional()
        }).passthrough()
    }).passthrough()).min(1)
}).passthrough()

const transcriptionSchema = z.object({
    text: z.string()
}).passthrough()

function describeStatus(status: number, data: unknown): string {
    if (typeof data === 'string' && data.trim()) return `HTTP ${status}: ${data.trim().slice(0, 200)}`
    if (data && typeof data === 'object') return `HTTP ${status}: ${JSON.stringify(data).slice(0, 200)}`
    return `HTTP ${status}`
}

/**
 * OpenAI-compatible gateway: `POST {baseUrl}/chat/completions` and `POST {baseUrl}/audio/transcriptions`.
 */
export class LlmGateway implements ChatGateway, SpeechGateway {
    private http: AxiosClient
    private llm: ConfigLlm
    private speech: ConfigTranscription

    constructor(http: AxiosClient, llm: ConfigLlm, speech: ConfigTranscription) {
        this.http = http
        this.llm = llm
        this.speech = speech
    }

    async complete(messages: ChatMessage[], maxTokens: number): Promise<string> {
        if (!this.llm.token) {
            throw new LlmGatewayError('LLM token not configured')
        }

        let response: JsonResponse
        try {
            response = await this.http.postJson(`${this.llm.baseUrl}/chat/completions`, {
                model: this.llm.model,
                messages,
                temperature: 0,
                max_tokens: maxTokens
            }, {
                timeout: this.llm.timeout,
                headers: { Authorization: `Bearer ${this.llm.token}` }
            })
        } catch (error) {
            const reason = isTimeoutError(error) ? `timed out after ${this.llm.timeout}ms` : errorMessage(error)
            throw new LlmGatewayError(`Chat completion request failed: ${reason}`, { cause: error })
        }

        if (response.status !== 200) {
            throw new LlmGatewayError(`Chat completion failed: ${describeStatus(response.status, response.data)}`, { status: response.status })
        }

        const parsed = completionSchema.safeParse(response.data)
        if (!parsed.success) {
            throw new LlmGatewayError(`Unexpected chat completion response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`)
        }

        const content = parsed.data.choices[0]?.message.content
        if (!content || !content.trim()) {
            throw new LlmGatewayError('Chat completion returned empty content')
        }
        return content.trim()
    }

    async transcribe(wav: Buffer, fileName: string): Promise<string> {
        if (!this.llm.token) {
            throw new LlmGatewayError('LLM token not configured')
        }

        const form = new FormData()
        form.append('file', new Blob([new Uint8Array(wav)], { type: 'audio/wav' }), fileName)
        form.append('model', this.speech.model)

        let response: AxiosResponse<unknown>
        try {
            response = await this.http.request<unknown>({
                method: 'POST',
                url: `${this.speech.baseUrl}/audio/transcriptions`,
                data: form,
                timeout: this.llm.timeout,
                headers: { Authorization: `Bearer ${this.llm.token}` }
            })
        } catch (error) {
            throw new LlmGatewayError(`Transcription request failed: ${errorMessage(error)}`, { cause: error })
        }

        if (response.status !== 200) {
            throw new LlmGatewayError(`Transcription failed: ${describeStatus(response.status, response.data)}`, { status: response.status })
        }

        const parsed = transcriptionSchema.safeParse(response.data)
        if (!parsed.success) {
            throw new LlmGatewayError('Unexpected transcription response')
        }
        return parsed.data.text.trim()
    }
}
