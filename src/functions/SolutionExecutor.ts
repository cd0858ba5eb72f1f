import type { QuizChainBot } from '../index'
import { Answer, AnswerType, SolutionPlan } from '../interface/Plan'
import { SandboxResult } from './Sandbox'
import { CODE_MARKERS } from '../constants'
import { ExecutionFailure } from '../errors'

export function isProgram(code: string): boolean {
    return CODE_MARKERS.some(marker => code.includes(marker))
}

function isAnswer(value: unknown): value is Answer {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || (typeof value === 'object' && value !== null)
}

/**
 * Applies the plan's answer type to a direct answer. Values that do not convert are returned unchanged.
 */
export function coerceAnswer(value: Answer, answerType: AnswerType): Answer {
    switch (answerType) {
        case 'number': {
            const text = String(value).replace(/,/g, '').trim()
            if (text.includes('.')) {
                const n = Number(text)
                return text !== '.' && Number.isFinite(n) ? n : value
            }
            if (!/^[+-]?\d+$/.test(text)) return value
            const n = parseInt(text, 10)
            // past 2^53 the number would no longer be the value the program printed
            return Number.isSafeInteger(n) ? n : value
        }
        case 'boolean':
            if (typeof value === 'string') {
                return ['true', 'yes', '1'].includes(value.trim().toLowerCase())
            }
            return Boolean(value)
        case 'object':
            if (typeof value === 'string') {
                try {
                    const parsed: unknown = JSON.parse(value)
                    return isAnswer(parsed) ? parsed : value
                } catch {
                    return value
                }
            }
            return value
        case 'string':
            return value
    }
}

/**
 * The direct answer when no program has to run: a literal solution_code, then final_answer,
 * then the raw text kept on a degraded plan.
 */
export function directAnswer(plan: SolutionPlan): Answer {
    if (plan.solutionCode && plan.solutionCode.trim()) return plan.solutionCode
    if (isAnswer(plan.finalAnswer)) return plan.finalAnswer
    if (plan.solution !== undefined) return plan.solution
    return ''
}

function describeFailure(result: Extract<SandboxResult, { ok: false }>, timeout: number): string {
    const output = (result.stderr || result.stdout).trim().slice(0, 500)
    switch (result.reason) {
        case 'timeout':
            return `Solution code timed out after ${timeout}ms`
        case 'spawn':
            return `Solution code could not be started: ${output}`
        case 'exit':
            return `Solution code exited with code ${result.exitCode}: ${output}`
    }
}

export class SolutionExecutor {
    private bot: QuizChainBot

    constructor(bot: QuizChainBot) {
        this.bot = bot
    }

    /**
     * Runs the plan's program in the sandbox (stdout, trimmed, is the answer) or coerces its direct answer.
     * Throws ExecutionFailure when the program fails or the answer carries the student secret.
     */
    async execute(plan: SolutionPlan, questionUrl: string, scope = 'main'): Promise<Answer> {
        let answer: Answer

        if (plan.solutionCode && isProgram(plan.solutionCode)) {
            const result = await this.bot.sandbox.run(plan.solutionCode, this.bot.utils.origin(questionUrl), scope)
            if (!result.ok) {
                const message = describeFailure(result, this.bot.config.sandbox.timeout)
                this.bot.log(scope, 'SANDBOX', message, 'warn')
                throw new ExecutionFailure(result.reason, message, { exitCode: result.exitCode, stderr: result.stderr })
            }
            answer = result.stdout.trim()
            this.bot.log(scope, 'SANDBOX', `Program finished in ${result.durationMs}ms`)
        } else {
            answer = coerceAnswer(directAnswer(plan), plan.answerType)
            this.bot.log(scope, 'EXECUTE', `Direct answer (${plan.answerType})`)
        }

        const secret = this.bot.config.student.secret
        const text = typeof answer === 'string' ? answer : JSON.stringify(answer)
        if (secret && text.includes(secret)) {
            throw new ExecutionFailure('leak', 'Answer contains the student secret and was not submitted')
        }

        return answer
    }
}
