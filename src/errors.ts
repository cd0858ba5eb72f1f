export type QuizErrorKind =
    | 'transient-fetch'
    | 'parse'
    | 'planning-degraded'
    | 'execution'
    | 'submission'
    | 'authorization'
    | 'config'
    | 'llm-gateway'

/**
 * Base class for every failure the solver distinguishes.
 * `kind` lets callers branch without instanceof chains across module boundaries.
 */
export class QuizError extends Error {
    readonly kind: QuizErrorKind

    constructor(kind: QuizErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
        this.kind = kind
    }
}

/** Network/timeout/non-200/empty body while downloading a resource. Retried by the ingestion layer only. */
export class TransientFetchError extends QuizError {
    readonly timedOut: boolean
    readonly status?: number

    constructor(message: string, details: { timedOut?: boolean, status?: number, cause?: unknown } = {}) {
        super('transient-fetch', message, { cause: details.cause })
        this.timedOut = details.timedOut ?? false
        this.status = details.status
    }
}

/** Malformed CSV/PDF/JSON for a single resource. */
export class ParseError extends QuizError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('parse', message, options)
    }
}

/** Model output could not be parsed; surfaced only in logs, the planner returns a degraded plan. */
export class PlanningDegraded extends QuizError {
    readonly rawResponse: string

    constructor(rawResponse: string) {
        super('planning-degraded', 'LLM response could not be parsed as a JSON plan')
        this.rawResponse = rawResponse
    }
}

export type ExecutionFailureReason = 'exit' | 'timeout' | 'spawn' | 'leak'

/** Sandboxed code failed. Fatal for the question and therefore for the chain. */
export class ExecutionFailure extends QuizError {
    readonly reason: ExecutionFailureReason
    readonly exitCode: number | null
    readonly stderr: string

    constructor(reason: ExecutionFailureReason, message: string, details: { exitCode?: number | null, stderr?: string, cause?: unknown } = {}) {
        super('execution', message, { cause: details.cause })
        this.reason = reason
        this.exitCode = details.exitCode ?? null
        this.stderr = details.stderr ?? ''
    }
}

/** Posting the answer failed (transport, HTTP status, or an unreadable verdict). */
export class SubmissionError extends QuizError {
    readonly status?: number

    constructor(message: string, details: { status?: number, cause?: unknown } = {}) {
        super('submission', message, { cause: details.cause })
        this.status = details.status
    }
}

/** Credentials on an inbound solve request did not match the configured student. */
export class AuthorizationError extends QuizError {
    constructor(message: string) {
        super('authorization', message)
    }
}

export class ConfigError extends QuizError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('config', message, options)
    }
}

export class LlmGatewayError extends QuizError {
    readonly status?: number

    constructor(message: string, details: { status?: number, cause?: unknown } = {}) {
        super('llm-gateway', message, { cause: details.cause })
        this.status = details.status
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error)
}
