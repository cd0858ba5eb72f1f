import type { QuizChainBot } from '../index'
import { ChainResult, ChainState, ChainStatus, TerminalChainStatus } from '../interface/Chain'
import { StudentCredentials } from '../interface/Submission'
import { errorMessage } from '../errors'

function terminalStatus(status: ChainStatus): TerminalChainStatus {
    return status === 'Running' ? 'Failed' : status
}

export class ChainDriver {
    private bot: QuizChainBot

    constructor(bot: QuizChainBot) {
        this.bot = bot
    }

    /**
     * Follows the chain of questions from `initialUrl`. The deadline is checked between questions only;
     * a question in flight always runs to the end. Never throws.
     */
    async run(initialUrl: string, credentials: StudentCredentials, scope = 'main'): Promise<ChainResult> {
        const { timeoutSeconds, maxQuestions } = this.bot.config.chain
        const state: ChainState = {
            currentUrl: initialUrl,
            questionCount: 0,
            startTime: this.bot.now(),
            deadlineSeconds: timeoutSeconds,
            status: 'Running'
        }
        let error: string | undefined

        this.bot.log(scope, 'CHAIN', `Starting quiz chain at ${initialUrl} (deadline ${timeoutSeconds}s)`)

        while (state.status === 'Running') {
            const elapsedSeconds = (this.bot.now() - state.startTime) / 1000
            if (elapsedSeconds > state.deadlineSeconds) {
                this.bot.log(scope, 'CHAIN', `Timeout reached (${state.deadlineSeconds}s)`, 'warn')
                state.status = 'TimedOut'
                break
            }
            if (state.questionCount >= maxQuestions) {
                this.bot.log(scope, 'CHAIN', `Question limit reached (${maxQuestions})`, 'warn')
                state.status = 'Exhausted'
                break
            }

            state.questionCount++
            this.bot.log(scope, 'CHAIN', `Question ${state.questionCount} (elapsed ${elapsedSeconds.toFixed(1)}s): ${state.currentUrl}`)

            try {
                const verdict = await this.bot.pipeline.solve(state.currentUrl, credentials, scope)

                if (verdict.correct) {
                    this.bot.log(scope, 'CHAIN', 'Correct answer!', 'log', 'green')
                    if (verdict.url) {
                        state.currentUrl = verdict.url
                    } else {
                        this.bot.log(scope, 'CHAIN', 'Quiz completed successfully')
                        state.status = 'Completed'
                    }
                } else {
                    this.bot.log(scope, 'CHAIN', `Incorrect answer: ${verdict.reason ?? 'no reason given'}`, 'warn')
                    if (verdict.url) {
                        this.bot.log(scope, 'CHAIN', 'Moving to next question anyway')
                        state.currentUrl = verdict.url
                    } else {
                        this.bot.log(scope, 'CHAIN', 'No more questions')
                        state.status = 'Exhausted'
                    }
                }
            } catch (err) {
                error = errorMessage(err)
                this.bot.log(scope, 'CHAIN', `Error solving question: ${error}`, 'error')
                state.status = 'Failed'
            }
        }

        const elapsedMs = this.bot.now() - state.startTime
        const status = terminalStatus(state.status)
        this.bot.log(scope, 'CHAIN', `Quiz session ended: ${status}, questions attempted: ${state.questionCount}, total time: ${(elapsedMs / 1000).toFixed(1)}s`)

        const result: ChainResult = { status, questionCount: state.questionCount, elapsedMs, lastUrl: state.currentUrl }
        if (error !== undefined) result.error = error
        return result
    }
}
