import type { QuizChainBot } from '../index'
import { StudentCredentials, SubmissionVerdict } from '../interface/Submission'

/**
 * One question end to end: render, extract, ingest, plan, execute, submit.
 * Errors that are not absorbed by a stage propagate to the caller.
 */
export class QuestionPipeline {
    private bot: QuizChainBot

    constructor(bot: QuizChainBot) {
        this.bot = bot
    }

    async solve(questionUrl: string, credentials: StudentCredentials, scope = 'main'): Promise<SubmissionVerdict> {
        this.bot.log(scope, 'QUESTION', `Fetching quiz page ${questionUrl}`)
        const html = await this.bot.browser.func.render(questionUrl, scope)

        const record = this.bot.extractor.extract(html, questionUrl, scope)
        this.bot.log(scope, 'QUESTION', `Parsed question: ${record.questionText.length} chars, ${record.resourceUrls.length} resource(s), ${record.tableFragments.length} table(s), submit=${record.submissionUrl ?? 'none'}`)

        const resources = await this.bot.ingestion.ingest(record.resourceUrls, scope)

        const plan = await this.bot.planner.plan(record, resources, questionUrl, credentials, scope)

        const answer = await this.bot.executor.execute(plan, questionUrl, scope)

        return this.bot.submitter.submit(record, questionUrl, answer, credentials, scope)
    }
}
