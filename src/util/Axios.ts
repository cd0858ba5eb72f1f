import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse, isAxiosError } from 'axios'

import { BROWSER } from '../constants'

export interface AxiosClientOptions {
    /** Replaces the network transport; tests pass an in-process adapter here */
    adapter?: AxiosAdapter
    userAgent?: string
}

export interface BinaryResponse {
    status: number
    contentType: string
    body: Buffer
}

export interface JsonResponse {
    status: number
    data: unknown
}

function toBuffer(data: unknown): Buffer {
    if (Buffer.isBuffer(data)) return data
    if (data instanceof ArrayBuffer) return Buffer.from(data)
    if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength)
    if (typeof data === 'string') return Buffer.from(data)
    if (data === undefined || data === null) return Buffer.alloc(0)
    return Buffer.from(JSON.stringify(data))
}

function headerValue(response: AxiosResponse, name: string): string {
    const value: unknown = response.headers[name]
    return typeof value === 'string' ? value : Array.isArray(value) ? value.join(', ') : ''
}

function errorCode(value: unknown): string | undefined {
    if (typeof value !== 'object' || value === null || !('code' in value)) return undefined
    return typeof value.code === 'string' ? value.code : undefined
}

/**
 * True for axios timeouts (ECONNABORTED / ETIMEDOUT) and for errors that wrap one.
 */
export function isTimeoutError(error: unknown): boolean {
    if (isAxiosError(error)) {
        return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || /timeout/i.test(error.message)
    }
    const code = errorCode(error) || errorCode(error instanceof Error ? error.cause : undefined)
    return code === 'ETIMEDOUT' || code === 'ECONNABORTED'
}

/**
 * Thin axios wrapper shared by downloads, LLM calls and submissions.
 * Statuses are never turned into exceptions here: callers inspect `status` and apply
 * their own policy (the resource layer retries, the submitter fails fast).
 */
class AxiosClient {
    private instance: AxiosInstance

    constructor(options: AxiosClientOptions = {}) {
        this.instance = axios.create({
            adapter: options.adapter,
            headers: { 'User-Agent': options.userAgent ?? BROWSER.USER_AGENT },
            validateStatus: () => true
        })

        // no proxy handling for the solver; keep axios from reading HTTP(S)_PROXY on its own
        this.instance.defaults.proxy = false
    }

    // Generic method to make any Axios request
    public async request<T = unknown>(config: AxiosRequestConfig): Promise<AxiosResponse<T>> {
        return this.instance.request<T>(config)
    }

    public async getBinary(url: string, timeout: number): Promise<BinaryResponse> {
        const response = await this.instance.request<unknown>({
            method: 'GET',
            url,
            timeout,
            responseType: 'arraybuffer'
        })
        return {
            status: response.status,
            contentType: headerValue(response, 'content-type').toLowerCase(),
            body: toBuffer(response.data)
        }
    }

    public async postJson(url: string, body: unknown, options: { timeout: number, headers?: Record<string, string> }): Promise<JsonResponse> {
        const response = await this.instance.request<unknown>({
            method: 'POST',
            url,
            data: body,
            timeout: options.timeout,
            headers: { 'Content-Type': 'application/json', ...options.headers }
        })
        return { status: response.status, data: response.data }
    }
}

export default AxiosClient
