import { z } from 'zod'

import type { QuizChainBot } from '../index'
import { QuestionRecord } from '../interface/Question'
import { Answer } from '../interface/Plan'
import { StudentCredentials, SubmissionPayload, SubmissionVerdict } from '../interface/Submission'
import { JsonResponse } from '../util/Axios'
import { SubmissionError, errorMessage } from '../errors'

const verdictSchema = z.object({
    correct: z.boolean(),
    url: z.string().nullish(),
    reason: z.string().nullish()
}).passthrough()

// `/quiz` as a whole segment or a `/quiz-<id>` prefix, never `/quizzes`
const QUIZ_SEGMENT = /\/quiz(?=[/-]|$)/

/**
 * Where the answer goes: the page's own endpoint, then the configured override,
 * then the question URL with its first `/quiz` path segment swapped for `/submit`, then `<origin>/submit`.
 */
export function resolveSubmissionUrl(record: Pick<QuestionRecord, 'submissionUrl'>, questionUrl: string, endpointOverride: string | null): string {
    if (record.submissionUrl) return record.submissionUrl
    if (endpointOverride) return endpointOverride

    let parsed: URL
    try {
        parsed = new URL(questionUrl)
    } catch (error) {
        throw new SubmissionError(`Cannot derive a submission URL from ${questionUrl}`, { cause: error })
    }
    if (QUIZ_SEGMENT.test(parsed.pathname)) {
        parsed.pathname = parsed.pathname.replace(QUIZ_SEGMENT, '/submit')
        return parsed.toString()
    }
    return `${parsed.origin}/submit`
}

/** Primitives go as they are, anything else as its JSON text */
export function wireAnswer(answer: Answer): string | number | boolean {
    if (typeof answer === 'string' || typeof answer === 'number' || typeof answer === 'boolean') return answer
    return JSON.stringify(answer)
}

export class AnswerSubmitter {
    private bot: QuizChainBot

    constructor(bot: QuizChainBot) {
        this.bot = bot
    }

    async submit(record: QuestionRecord, questionUrl: string, answer: Answer, credentials: StudentCredentials, scope = 'main'): Promise<SubmissionVerdict> {
        const submitUrl = resolveSubmissionUrl(record, questionUrl, this.bot.config.submission.endpointOverride)

        const payload: SubmissionPayload = {
            email: credentials.email,
            secret: credentials.secret,
            url: questionUrl,
            answer: wireAnswer(answer)
        }

        this.bot.log(scope, 'SUBMIT', `Submitting answer to ${submitUrl}: ${JSON.stringify(payload.answer).slice(0, 200)}`)

        let response: JsonResponse
        try {
            response = await this.bot.axios.postJson(submitUrl, payload, { timeout: this.bot.config.submission.timeout })
        } catch (error) {
            throw new SubmissionError(`Submit error: ${errorMessage(error)}`, { cause: error })
        }

        if (response.status < 200 || response.status >= 300) {
            const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data)
            throw new SubmissionError(`HTTP error ${response.status}: ${(body ?? '').slice(0, 200)}`, { status: response.status })
        }

        const parsed = verdictSchema.safeParse(response.data)
        if (!parsed.success) {
            throw new SubmissionError(`Invalid verdict from ${submitUrl}: ${parsed.error.issues.map(i => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`, { status: response.status })
        }

        const verdict: SubmissionVerdict = { correct: parsed.data.correct }
        if (parsed.data.url) verdict.url = parsed.data.url
        if (parsed.data.reason) verdict.reason = parsed.data.reason

        this.bot.log(scope, 'SUBMIT', `Verdict: ${verdict.correct ? 'correct' : 'incorrect'}${verdict.reason ? ` (${verdict.reason})` : ''}`, verdict.correct ? 'log' : 'warn')
        return verdict
    }
}
