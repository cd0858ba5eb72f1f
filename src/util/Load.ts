import fs from 'fs'
import path from 'path'

import { Config } from '../interface/Config'
import { ConfigError } from '../errors'
import { CHAIN, DELAYS, LIMITS, RETRY_LIMITS, TIMEOUTS } from '../constants'
import Util from './Utils'

type Env = Record<string, string | undefined>
type RawSection = Record<string, unknown>

export interface LoadedConfig {
    config: Config
    /** Path of the file that was read, or '' when running on defaults */
    source: string
    warnings: string[]
}

const util = new Util()

// Basic JSON comment stripper (supports // line and /* block */ comments while preserving strings)
export function stripJsonComments(input: string): string {
    let out = ''
    let inString = false
    let stringChar = ''
    let inLine = false
    let inBlock = false
    for (let i = 0; i < input.length; i++) {
        const ch = input.charAt(i)
        const next = input.charAt(i + 1)
        if (inLine) {
            if (ch === '\n' || ch === '\r') {
                inLine = false
                out += ch
            }
            continue
        }
        if (inBlock) {
            if (ch === '*' && next === '/') {
                inBlock = false
                i++
            }
            continue
        }
        if (inString) {
            out += ch
            if (ch === '\\') { // escape next char
                i++
                if (i < input.length) out += input.charAt(i)
                continue
            }
            if (ch === stringChar) {
                inString = false
            }
            continue
        }
        if (ch === '"' || ch === '\'') {
            inString = true
            stringChar = ch
            out += ch
            continue
        }
        if (ch === '/' && next === '/') {
            inLine = true
            i++
            continue
        }
        if (ch === '/' && next === '*') {
            inBlock = true
            i++
            continue
        }
        out += ch
    }
    return out
}

function isRecord(value: unknown): value is RawSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(raw: RawSection, key: string): RawSection {
    const value = raw[key]
    return isRecord(value) ? value : {}
}

function str(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback
}

function bool(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback
}

function num(value: unknown, fallback: number, min = 0): number {
    const n = typeof value === 'number' ? value : typeof value === 'string' && value.trim() ? Number(value) : NaN
    return Number.isFinite(n) && n >= min ? n : fallback
}

function duration(value: unknown, fallback: number): number {
    if (typeof value !== 'number' && typeof value !== 'string') return fallback
    try {
        return util.stringToMs(value)
    } catch (error) {
        throw new ConfigError(`Invalid duration value: ${String(value)}`, { cause: error })
    }
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null) {
        for (const child of Object.values(value)) deepFreeze(child)
        Object.freeze(value)
    }
    return value
}

/**
 * Builds the complete Config from a parsed (possibly partial) JSON object.
 */
export function normalizeConfig(raw: unknown): Config {
    const n = isRecord(raw) ? raw : {}

    const student = section(n, 'student')
    const llm = section(n, 'llm')
    const transcription = section(n, 'transcription')
    const chain = section(n, 'chain')
    const resources = section(n, 'resources')
    const sandbox = section(n, 'sandbox')
    const submission = section(n, 'submission')
    const browser = section(n, 'browser')
    const server = section(n, 'server')
    const logging = section(n, 'logging')

    const endpointOverride = submission.endpointOverride
    const excludeFunc = Array.isArray(logging.excludeFunc)
        ? logging.excludeFunc.filter((x): x is string => typeof x === 'string')
        : []

    return {
        student: {
            email: str(student.email, '').trim(),
            secret: str(student.secret, '')
        },
        llm: {
            baseUrl: str(llm.baseUrl, 'https://aipipe.org/openrouter/v1').replace(/\/+$/, ''),
            token: str(llm.token, ''),
            model: str(llm.model, 'openai/gpt-4o-mini'),
            contextMaxTokens: num(llm.contextMaxTokens, LIMITS.CONTEXT_MAX_TOKENS, 1),
            analysisMaxTokens: num(llm.analysisMaxTokens, LIMITS.ANALYSIS_MAX_TOKENS, 1),
            contextHtmlChars: num(llm.contextHtmlChars, LIMITS.CONTEXT_HTML_CHARS, 1),
            timeout: duration(llm.timeout, TIMEOUTS.LLM)
        },
        transcription: {
            enabled: bool(transcription.enabled, true),
            baseUrl: str(transcription.baseUrl, 'https://aipipe.org/openai/v1').replace(/\/+$/, ''),
            model: str(transcription.model, 'whisper-1'),
            ffmpegPath: str(transcription.ffmpegPath, 'ffmpeg'),
            timeout: duration(transcription.timeout, TIMEOUTS.FFMPEG)
        },
        chain: {
            timeoutSeconds: num(chain.timeoutSeconds, CHAIN.DEFAULT_TIMEOUT_SECONDS),
            maxQuestions: Math.floor(num(chain.maxQuestions, CHAIN.MAX_QUESTIONS, 1))
        },
        resources: {
            maxAttempts: Math.floor(num(resources.maxAttempts, RETRY_LIMITS.RESOURCE_ATTEMPTS, 1)),
            retryDelay: duration(resources.retryDelay, DELAYS.RETRY),
            timeoutRetryDelay: duration(resources.timeoutRetryDelay, DELAYS.RETRY_AFTER_TIMEOUT),
            requestTimeout: duration(resources.requestTimeout, TIMEOUTS.DOWNLOAD),
            concurrency: Math.floor(num(resources.concurrency, 4, 1)),
            maxTextChars: Math.floor(num(resources.maxTextChars, LIMITS.TEXT_BODY_CHARS, 1))
        },
        sandbox: {
            interpreter: str(sandbox.interpreter, 'python3'),
            extension: str(sandbox.extension, '.py'),
            language: str(sandbox.language, 'Python'),
            timeout: duration(sandbox.timeout, TIMEOUTS.SANDBOX)
        },
        submission: {
            endpointOverride: typeof endpointOverride === 'string' && endpointOverride.trim() ? endpointOverride.trim() : null,
            timeout: duration(submission.timeout, TIMEOUTS.SUBMIT)
        },
        browser: {
            headless: bool(browser.headless, true),
            navigationTimeout: duration(browser.navigationTimeout, TIMEOUTS.NAVIGATION),
            settleDelay: duration(browser.settleDelay, TIMEOUTS.SETTLE)
        },
        server: {
            host: str(server.host, '0.0.0.0'),
            port: Math.floor(num(server.port, 8000)),
            logBufferSize: Math.floor(num(server.logBufferSize, LIMITS.LOG_BUFFER, 1)),
            taskRetention: duration(server.taskRetention, 5 * 60 * 1000)
        },
        logging: {
            excludeFunc,
            redactEmails: bool(logging.redactEmails, false)
        }
    }
}

/**
 * Environment overrides, applied after the file. Invalid numbers are reported and ignored.
 */
export function applyEnvOverrides(config: Config, env: Env, warnings: string[]): Config {
    const out: Config = {
        ...config,
        student: { ...config.student },
        llm: { ...config.llm },
        chain: { ...config.chain },
        resources: { ...config.resources },
        submission: { ...config.submission },
        server: { ...config.server }
    }

    const positive = (name: string, min: number): number | undefined => {
        const raw = env[name]
        if (raw === undefined || raw.trim() === '') return undefined
        const value = Number(raw)
        if (!Number.isFinite(value) || value < min) {
            warnings.push(`${name} env var invalid: ${raw}`)
            return undefined
        }
        return value
    }

    if (env.STUDENT_EMAIL) out.student.email = env.STUDENT_EMAIL.trim()
    if (env.STUDENT_SECRET) out.student.secret = env.STUDENT_SECRET
    const token = env.LLM_TOKEN || env.AIPIPE_TOKEN
    if (token) out.llm.token = token
    if (env.LLM_MODEL) out.llm.model = env.LLM_MODEL
    if (env.SUBMISSION_ENDPOINT) out.submission.endpointOverride = env.SUBMISSION_ENDPOINT.trim()

    const timeoutSeconds = positive('QUIZ_TIMEOUT_SECONDS', 1)
    if (timeoutSeconds !== undefined) out.chain.timeoutSeconds = timeoutSeconds
    // retries after the first attempt
    const maxRetries = positive('MAX_RETRIES', 0)
    if (maxRetries !== undefined) out.resources.maxAttempts = Math.floor(maxRetries) + 1
    const port = positive('PORT', 0)
    if (port !== undefined) out.server.port = Math.floor(port)

    return out
}

function configCandidates(env: Env): string[] {
    if (env.CONFIG_PATH && env.CONFIG_PATH.trim()) {
        const p = env.CONFIG_PATH.trim()
        return [path.isAbsolute(p) ? p : path.join(process.cwd(), p)]
    }
    // Resolve configuration file from common locations (supports .jsonc and .json)
    const names = ['config.jsonc', 'config.json']
    const bases = [
        path.join(__dirname, '../'),       // dist root when compiled
        path.join(__dirname, '../src'),    // fallback: running dist but config still in src
        process.cwd(),                     // repo root
        path.join(process.cwd(), 'src'),   // repo/src
        __dirname                          // dist/util
    ]
    const candidates: string[] = []
    for (const base of bases) {
        for (const name of names) {
            candidates.push(path.join(base, name))
        }
    }
    return candidates
}

/**
 * Reads config.jsonc / config.json from the first candidate location, normalizes it,
 * applies environment overrides and returns a deeply frozen value.
 * Called once at process start; the result is passed by reference from there on.
 */
export function loadConfig(env: Env = process.env): LoadedConfig {
    const warnings: string[] = []
    const candidates = configCandidates(env)

    let cfgPath = ''
    for (const p of candidates) {
        if (fs.existsSync(p)) { cfgPath = p; break }
    }

    let raw: unknown = {}
    if (cfgPath) {
        const text = fs.readFileSync(cfgPath, 'utf-8').replace(/^\uFEFF/, '') // strip BOM if present
        try {
            raw = JSON.parse(stripJsonComments(text))
        } catch (error) {
            throw new ConfigError(`Config file is not valid JSON: ${cfgPath}`, { cause: error })
        }
    } else if (env.CONFIG_PATH) {
        throw new ConfigError(`CONFIG_PATH not found: ${candidates.join(' | ')}`)
    } else {
        warnings.push(`No config file found in: ${candidates.join(' | ')}; using defaults and environment`)
    }

    const config = applyEnvOverrides(normalizeConfig(raw), env, warnings)
    return { config: deepFreeze(config), source: cfgPath, warnings }
}
