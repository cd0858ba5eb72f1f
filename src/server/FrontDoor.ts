import http, { IncomingMessage, ServerResponse } from 'http'
import { AddressInfo } from 'net'
import { z } from 'zod'

import type { QuizChainBot } from '../index'
import { LIMITS } from '../constants'
import { AuthorizationError, errorMessage } from '../errors'

const MAX_BODY_BYTES = 1024 * 1024

export const solveRequestSchema = z.object({
    email: z.string().trim().toLowerCase().refine(value => value.includes('@'), { message: 'Invalid email format' }),
    secret: z.string().min(1, 'Secret is required'),
    url: z.string().trim().refine(value => value.startsWith('http://') || value.startsWith('https://'), { message: 'URL must start with http:// or https://' })
})

class HttpError extends Error {
    readonly status: number

    constructor(status: number, message: string) {
        super(message)
        this.status = status
    }
}

function timestamp(): string {
    return new Date().toISOString()
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
    const text = JSON.stringify(body)
    res.writeHead(status, {
        'Content-Type': 'application/json',
        'Content-Length': Buffer.byteLength(text)
    })
    res.end(text)
}

function readBody(req: IncomingMessage): Promise<string> {
    return new Promise<string>((resolve, reject) => {
        const chunks: Buffer[] = []
        let size = 0
        req.on('data', (chunk: Buffer) => {
            size += chunk.length
            if (size > MAX_BODY_BYTES) {
                reject(new HttpError(413, 'Request body too large'))
                req.destroy()
                return
            }
            chunks.push(chunk)
        })
        req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')))
        req.on('error', reject)
    })
}

/**
 * HTTP entry point: starts solve tasks and exposes logs, task status and health.
 */
export class FrontDoor {
    private bot: QuizChainBot
    private server: http.Server

    constructor(bot: QuizChainBot) {
        this.bot = bot
        this.server = http.createServer((req, res) => {
            this.handle(req, res).catch((error: unknown) => {
                this.bot.log('main', 'SERVER', `Unhandled request error: ${errorMessage(error)}`, 'warn')
                if (!res.headersSent) sendJson(res, 500, { detail: 'Internal server error', timestamp: timestamp() })
            })
        })
    }

    listen(port = this.bot.config.server.port, host = this.bot.config.server.host): Promise<AddressInfo> {
        return new Promise<AddressInfo>((resolve, reject) => {
            this.server.once('error', reject)
            this.server.listen(port, host, () => {
                this.server.off('error', reject)
                const address = this.server.address()
                if (address === null || typeof address === 'string') {
                    reject(new Error('Server is not listening on a TCP port'))
                    return
                }
                this.bot.log('main', 'SERVER', `Listening on http://${address.address}:${address.port}`)
                resolve(address)
            })
        })
    }

    close(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (!this.server.listening) {
                resolve()
                return
            }
            this.server.close(error => error ? reject(error) : resolve())
        })
    }

    async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const url = new URL(req.url ?? '/', 'http://localhost')
        const route = `${req.method ?? 'GET'} ${url.pathname.replace(/\/+$/, '') || '/'}`

        switch (route) {
            case 'POST /quiz':
                return this.handleQuiz(req, res)
            case 'GET /logs':
                return this.handleLogs(url, res)
            case 'DELETE /logs':
                this.bot.logs.clear()
                this.bot.log('main', 'SERVER', 'Logs cleared via API')
                return sendJson(res, 200, { message: 'Logs cleared', timestamp: timestamp() })
            case 'GET /status':
                return sendJson(res, 200, {
                    active_tasks: this.bot.tasks.snapshot(),
                    total_logs: this.bot.logs.size,
                    recent_logs: this.bot.logs.recent(LIMITS.RECENT_LOGS),
                    timestamp: timestamp()
                })
            case 'GET /health':
                return sendJson(res, 200, {
                    status: 'healthy',
                    timestamp: timestamp(),
                    config: {
                        email: this.bot.config.student.email,
                        has_llm_token: this.bot.config.llm.token.length > 0,
                        llm_model: this.bot.config.llm.model,
                        timeout_seconds: this.bot.config.chain.timeoutSeconds
                    },
                    active_tasks: this.bot.tasks.size,
                    total_logs: this.bot.logs.size
                })
            default:
                return sendJson(res, 404, { detail: 'Not found' })
        }
    }

    private async handleQuiz(req: IncomingMessage, res: ServerResponse): Promise<void> {
        let raw: unknown
        try {
            raw = JSON.parse(await readBody(req))
        } catch (error) {
            const status = error instanceof HttpError ? error.status : 400
            const detail = error instanceof HttpError ? error.message : 'Invalid JSON or request body'
            this.bot.log('main', 'SERVER', `Rejected request: ${detail}`, 'warn')
            return sendJson(res, status, { detail, timestamp: timestamp() })
        }

        const parsed = solveRequestSchema.safeParse(raw)
        if (!parsed.success) {
            const errors = parsed.error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
            this.bot.log('main', 'SERVER', `Rejected request: ${errors.join('; ')}`, 'warn')
            return sendJson(res, 400, { detail: 'Invalid JSON or request body', errors, timestamp: timestamp() })
        }

        try {
            this.bot.authorize(parsed.data)
        } catch (error) {
            if (error instanceof AuthorizationError) {
                return sendJson(res, 403, { detail: error.message, timestamp: timestamp() })
            }
            throw error
        }

        const task = this.bot.startTask(parsed.data)
        return sendJson(res, 200, {
            status: 'received',
            message: `Quiz processing started for ${parsed.data.url}`,
            task_id: task.id,
            timestamp: timestamp()
        })
    }

    private handleLogs(url: URL, res: ServerResponse): void {
        const param = url.searchParams.get('limit')
        const limit = param === null ? LIMITS.LOG_QUERY_DEFAULT : Number(param)
        if (!Number.isInteger(limit) || limit < 0) {
            return sendJson(res, 400, { detail: 'limit must be a non-negative integer', timestamp: timestamp() })
        }
        sendJson(res, 200, this.bot.logs.recent(limit))
    }
}
