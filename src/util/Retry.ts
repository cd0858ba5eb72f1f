export interface RetryPolicy {
    maxAttempts: number // initial attempt included
    delay: (error: unknown, attempt: number) => number
}

export interface RetryOutcome<T> {
    ok: true
    value: T
    attempts: number
}

export interface RetryFailure {
    ok: false
    error: unknown
    attempts: number
}

type Sleeper = (ms: number) => Promise<void>

/**
 * Bounded retry loop. Never throws on its own: exhaustion is reported as a failure value
 * so a batch can record it and move on.
 */
export default class Retry {
    private policy: RetryPolicy
    private sleep: Sleeper

    constructor(policy: RetryPolicy, sleep: Sleeper) {
        this.policy = policy
        this.sleep = sleep
    }

    async run<T>(
        fn: (attempt: number) => Promise<T>,
        onRetry?: (error: unknown, attempt: number, delayMs: number) => void
    ): Promise<RetryOutcome<T> | RetryFailure> {
        const maxAttempts = Math.max(1, Math.floor(this.policy.maxAttempts))
        let lastError: unknown

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                const value = await fn(attempt)
                return { ok: true, value, attempts: attempt }
            } catch (error) {
                lastError = error
                if (attempt < maxAttempts) {
                    const delayMs = this.policy.delay(error, attempt)
                    onRetry?.(error, attempt, delayMs)
                    await this.sleep(delayMs)
                }
            }
        }

        return { ok: false, error: lastError, attempts: maxAttempts }
    }
}
