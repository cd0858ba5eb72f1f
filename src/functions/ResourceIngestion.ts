import type { QuizChainBot } from '../index'
import { ResourceMap, ResourcePayload } from '../interface/Question'
import { BinaryResponse, isTimeoutError } from '../util/Axios'
import Retry from '../util/Retry'
import { parseCsv } from './resources/Tabular'
import { parsePdf } from './resources/Document'
import { EXTENSIONS } from '../constants'
import { ParseError, TransientFetchError, errorMessage } from '../errors'

export type ResourceKind = 'audio' | 'tabular' | 'document' | 'structured' | 'text' | 'binary'

function extensionOf(url: string): string {
    let pathname: string
    try {
        pathname = new URL(url).pathname
    } catch {
        pathname = url.split(/[?#]/)[0] ?? url
    }
    const match = /\.([a-z0-9]+)$/i.exec(pathname)
    return match?.[1]?.toLowerCase() ?? ''
}

/**
 * Content type decides first, the URL extension second.
 */
export function classifyResource(url: string, contentType: string): ResourceKind {
    const type = contentType.toLowerCase()
    const ext = extensionOf(url)

    if (type.startsWith('audio/') || EXTENSIONS.AUDIO.includes(ext)) return 'audio'
    if (type.includes('csv') || ext === 'csv') return 'tabular'
    if (type.includes('pdf') || ext === 'pdf') return 'document'
    if (type.includes('json') || ext === 'json') return 'structured'
    if (type.startsWith('text/') || type.includes('xml') || type.includes('javascript') || ext === 'txt') return 'text'
    return 'binary'
}

export class ResourceIngestion {
    private bot: QuizChainBot

    constructor(bot: QuizChainBot) {
        this.bot = bot
    }

    /**
     * Downloads and decodes every URL. Failures are recorded per URL; the batch itself never fails.
     * The map is filled in `urls` order whatever order the downloads finish in.
     */
    async ingest(urls: readonly string[], scope = 'main'): Promise<ResourceMap> {
        const resources: ResourceMap = new Map()
        if (urls.length === 0) return resources

        const settings = this.bot.config.resources
        this.bot.log(scope, 'RESOURCES', `Downloading ${urls.length} resource(s) with concurrency ${settings.concurrency}`)

        const payloads = await this.bot.utils.mapWithConcurrency(urls, settings.concurrency, url => this.ingestOne(url, scope))

        payloads.forEach(payload => resources.set(payload.url, payload))

        const failed = payloads.filter(p => p.kind === 'failed').length
        this.bot.log(scope, 'RESOURCES', `Download complete: ${payloads.length - failed} ok, ${failed} failed`, failed > 0 ? 'warn' : 'log')
        return resources
    }

    async ingestOne(url: string, scope = 'main'): Promise<ResourcePayload> {
        const settings = this.bot.config.resources
        const retry = new Retry({
            maxAttempts: settings.maxAttempts,
            delay: (error) => error instanceof TransientFetchError && error.timedOut ? settings.timeoutRetryDelay : settings.retryDelay
        }, (ms) => this.bot.utils.wait(ms))

        const outcome = await retry.run(
            (attempt) => {
                this.bot.log(scope, 'DOWNLOAD', `${url} (attempt ${attempt}/${settings.maxAttempts})`)
                return this.download(url)
            },
            (error, attempt, delayMs) => {
                this.bot.log(scope, 'DOWNLOAD', `Attempt ${attempt} for ${url} failed: ${errorMessage(error)}; retrying in ${delayMs}ms`, 'warn')
            }
        )

        if (!outcome.ok) {
            const error = errorMessage(outcome.error)
            this.bot.log(scope, 'DOWNLOAD', `FAILED after ${outcome.attempts} attempts: ${url} (${error})`, 'warn')
            return { url, kind: 'failed', errorKind: 'transient', error, attempts: outcome.attempts }
        }

        this.bot.log(scope, 'DOWNLOAD', `Downloaded ${outcome.value.body.length} bytes from ${url}`)

        try {
            return await this.decode(url, outcome.value, scope)
        } catch (error) {
            this.bot.log(scope, 'RESOURCES', `Could not decode ${url}: ${errorMessage(error)}`, 'warn')
            return { url, kind: 'failed', errorKind: 'parse', error: errorMessage(error), attempts: outcome.attempts }
        }
    }

    private async download(url: string): Promise<BinaryResponse> {
        let response: BinaryResponse
        try {
            response = await this.bot.axios.getBinary(url, this.bot.config.resources.requestTimeout)
        } catch (error) {
            const timedOut = isTimeoutError(error)
            throw new TransientFetchError(timedOut ? 'Timeout' : errorMessage(error), { timedOut, cause: error })
        }

        if (response.status !== 200) {
            throw new TransientFetchError(`HTTP ${response.status}`, { status: response.status })
        }
        if (response.body.length === 0) {
            throw new TransientFetchError('Empty response', { status: response.status })
        }
        return response
    }

    private async decode(url: string, response: BinaryResponse, scope: string): Promise<ResourcePayload> {
        const kind = classifyResource(url, response.contentType)
        const body = response.body

        switch (kind) {
            case 'audio': {
                const transcript = await this.bot.audio.transcribe(body, url, scope)
                return { url, kind: 'audio', transcript, encodedBytes: body.toString('base64') }
            }

            case 'tabular': {
                const table = parseCsv(body)
                this.bot.log(scope, 'RESOURCES', `CSV loaded: ${table.rows.length} rows, ${table.columns.length} columns`)
                return { url, kind: 'tabular', columns: table.columns, rows: table.rows, rowCount: table.rows.length }
            }

            case 'document': {
                const pages = await parsePdf(body)
                this.bot.log(scope, 'RESOURCES', `PDF parsed: ${pages.length} pages`)
                return { url, kind: 'document', pages }
            }

            case 'structured': {
                let json: unknown
                try {
                    json = JSON.parse(body.toString('utf-8').replace(/^\uFEFF/, ''))
                } catch (error) {
                    throw new ParseError(`JSON parse error: ${errorMessage(error)}`, { cause: error })
                }
                return { url, kind: 'structured', json }
            }

            case 'text':
                return { url, kind: 'text', content: this.bot.utils.truncate(body.toString('utf-8'), this.bot.config.resources.maxTextChars) }

            case 'binary':
                return { url, kind: 'binary', sizeBytes: body.length }
        }
    }
}
