import chalk from 'chalk'

import { ConfigLogging } from '../interface/Config'
import { LogEntry, LogLevel } from '../interface/Chain'

export type LogType = 'log' | 'warn' | 'error'

export type LogColor = 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'gray'

export interface LogSink {
    push(entry: LogEntry): void
}

/**
 * Signature shared by every component: `scope` is 'main' or a task id, `title` a short category.
 * Returns an Error when type === 'error' so callers can `throw log(...)`.
 */
export type LogFn = (scope: string, title: string, message: string, type?: LogType, color?: LogColor) => Error | void

const LEVELS: Record<LogType, LogLevel> = {
    log: 'info',
    warn: 'warning',
    error: 'error'
}

// ASCII-safe icon map for PowerShell compatibility
const ICONS: Array<[RegExp, string]> = [
    [/error|fail/i, '[ERROR]'],
    [/warn/i, '[WARN]'],
    [/success|complet|correct/i, '[OK]'],
    [/submit/i, '[SUBMIT]'],
    [/sandbox|exec/i, '[EXEC]'],
    [/llm|plan/i, '[LLM]'],
    [/resource|download/i, '[FILES]'],
    [/browser|render/i, '[BROWSER]'],
    [/chain|question/i, '[CHAIN]'],
    [/server|main/i, '[MAIN]']
]

export class Logger {
    private settings: ConfigLogging
    private secrets: string[]
    private sinks: LogSink[] = []

    /**
     * @param secrets values masked as *** in every line (the student secret, the LLM token)
     */
    constructor(settings: ConfigLogging, secrets: string[] = []) {
        this.settings = settings
        this.secrets = secrets.filter(s => s.length > 0)
        this.log = this.log.bind(this)
    }

    addSink(sink: LogSink): void {
        this.sinks.push(sink)
    }

    log(scope: string, title: string, message: string, type: LogType = 'log', color?: LogColor): Error | void {
        if (this.settings.excludeFunc.some(x => x.toLowerCase() === title.toLowerCase())) {
            return type === 'error' ? new Error(this.redact(message)) : undefined
        }

        const now = new Date()
        const currentTime = now.toLocaleString()
        const scopeText = scope.toUpperCase()
        const cleanMessage = this.redact(message)
        const cleanStr = `[${currentTime}] [PID: ${process.pid}] [${type.toUpperCase()}] ${scopeText} [${title}] ${cleanMessage}`

        const typeIndicator = type === 'error' ? '✗' : type === 'warn' ? '⚠' : '✓'
        const scopeColor = scope === 'main' ? chalk.cyan : chalk.magenta
        const typeColor = type === 'error' ? chalk.red : type === 'warn' ? chalk.yellow : chalk.green

        let icon = ''
        for (const [pattern, symbol] of ICONS) {
            if (pattern.test(title)) {
                icon = chalk.dim(symbol)
                break
            }
        }
        const iconPart = icon ? icon + ' ' : ''

        const formattedStr = [
            chalk.gray(`[${currentTime}]`),
            chalk.gray(`[${process.pid}]`),
            typeColor(typeIndicator),
            scopeColor(`[${scopeText}]`),
            chalk.bold(`[${title}]`),
            iconPart + cleanMessage
        ].join(' ')

        const line = color ? chalk[color](formattedStr) : formattedStr

        switch (type) {
            case 'warn':
                console.warn(line)
                break
            case 'error':
                console.error(line)
                break
            default:
                console.log(line)
                break
        }

        const entry: LogEntry = {
            timestamp: now.toISOString(),
            message: cleanMessage,
            level: LEVELS[type],
            scope,
            title
        }
        for (const sink of this.sinks) {
            try {
                sink.push(entry)
            } catch (error) {
                console.error('[Logger] Failed to push log entry to sink:', error)
            }
        }

        if (type === 'error') {
            return new Error(cleanStr)
        }
    }

    redact(text: string): string {
        let out = text
        for (const secret of this.secrets) {
            out = out.split(secret).join('***')
        }
        if (this.settings.redactEmails) {
            out = out.replace(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/ig, (m) => {
                const [u, d] = m.split('@'); return `${(u || '').slice(0, 2)}***@${d || ''}`
            })
        }
        return out
    }
}
