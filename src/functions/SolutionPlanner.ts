import type { QuizChainBot } from '../index'
import { QuestionRecord, ResourceMap, ResourcePayload } from '../interface/Question'
import { SolutionPlan } from '../interface/Plan'
import { StudentCredentials } from '../interface/Submission'
import { ChatMessage } from './LlmGateway'
import { salvagePlan } from './ResponseSalvage'
import { LIMITS } from '../constants'
import { PlanningDegraded, errorMessage } from '../errors'

const CONTEXT_SYSTEM_PROMPT = `You are an expert quiz-solving agent. Analyze the webpage you are given and extract all information needed to solve the quiz programmatically.

You will receive the QUIZ URL and the HTML CONTENT of the rendered page. The HTML may contain dynamically rendered elements, base64 encoded content or hidden instructions.

Respond with a single valid JSON object (no markdown, no explanation) with exactly these keys:
{
  "question_description": "clear description of what needs to be solved",
  "submission_url": "absolute URL where the answer must be POSTed, or null",
  "additional_links": ["absolute URLs of downloadable files"],
  "base64_decoded_texts": ["text decoded from atob(...) calls"],
  "detected_tables_html": ["outer HTML of each <table>"],
  "raw_visible_text": "visible text of the page"
}

Rules:
- Ignore <script> and <style> content when building the visible text.
- Resolve relative links against the quiz URL.
- Use null or an empty list for anything missing instead of omitting the key.`

const ANALYSIS_SYSTEM_PROMPT = 'You are an expert data analyst. Always respond with valid JSON only, no additional text.'

export interface AnalysisPromptInput {
    record: QuestionRecord
    resources: ResourceMap
    questionUrl: string
    credentials: StudentCredentials
    context: string
    language: string
}

function describeResource(payload: ResourcePayload): string[] {
    const lines = [`  - ${payload.url} (type: ${payload.kind})`]

    switch (payload.kind) {
        case 'tabular':
            lines.push(`    Columns: ${JSON.stringify(payload.columns)}`)
            lines.push(`    Rows: ${payload.rowCount}`)
            lines.push(`    Preview:\n${payload.rows.slice(0, LIMITS.PREVIEW_ROWS).map(row => '      ' + JSON.stringify(row)).join('\n')}`)
            break
        case 'document':
            lines.push(`    Pages: ${payload.pages.length}`)
            for (const page of payload.pages.slice(0, LIMITS.PREVIEW_PAGES)) {
                lines.push(`    Page ${page.pageNumber}:\n${page.text.slice(0, LIMITS.DIGEST_CHARS)}`)
            }
            break
        case 'structured':
            lines.push(`    Data: ${(JSON.stringify(payload.json, null, 2) ?? 'null').slice(0, LIMITS.DIGEST_CHARS)}`)
            break
        case 'audio':
            lines.push(`    Transcription: ${payload.transcript}`)
            break
        case 'text':
            lines.push(`    Content: ${payload.content.slice(0, LIMITS.DIGEST_CHARS)}`)
            break
        case 'binary':
            lines.push(`    Size: ${payload.sizeBytes} bytes`)
            break
        case 'failed':
            lines.push(`    Download failed (${payload.errorKind}) after ${payload.attempts} attempt(s): ${payload.error}`)
            break
    }
    return lines
}

/** Summary of every resource, in map order */
export function buildResourceDigest(resources: ResourceMap): string {
    const lines: string[] = []
    for (const payload of resources.values()) {
        lines.push(...describeResource(payload))
    }
    return lines.join('\n')
}

export function buildAnalysisPrompt(input: AnalysisPromptInput): string {
    const { record, resources, questionUrl, credentials, context, language } = input

    let prompt = `You are an expert data analyst tasked with solving a quiz question.

The email and secret below identify the student. They are context only: submission is handled separately.
STUDENT_EMAIL: ${credentials.email}
STUDENT_SECRET: ${credentials.secret}

QUESTION TEXT:
${record.questionText}

QUESTION URL:
${questionUrl}

QUESTION DETAILS:
${context || 'N/A'}
`

    if (resources.size > 0 || record.tableFragments.length > 0) {
        prompt += '\nADDITIONAL CONTEXT:\n'
        if (resources.size > 0) {
            prompt += '- Downloaded files:\n' + buildResourceDigest(resources) + '\n'
        }
        if (record.tableFragments.length > 0) {
            const tables = record.tableFragments.map((html, i) => `Table ${i + 1}:\n${html.slice(0, LIMITS.TABLE_CHARS)}`)
            prompt += '\nTABLES FOUND IN PAGE:\n' + tables.join('\n') + '\n'
        }
    }

    prompt += `
INSTRUCTIONS:
1. Analyze the question carefully
2. Identify what data or files need to be processed
3. Determine the analysis steps required
4. Provide the approach as a JSON object

Respond ONLY with a valid JSON object in this exact format:
{
    "analysis": "Detailed analysis of what needs to be done",
    "data_needed": ["list", "of", "data", "sources"],
    "steps": ["Step 1", "Step 2"],
    "answer_type": "number|string|boolean|object",
    "solution_code": "${language} code that prints the final answer, or null",
    "final_answer": "Direct answer if applicable, else null"
}

Rules for "solution_code":
- It must be valid ${language} that prints ONLY the final answer to standard output.
- Leave it null when a direct answer can be given in "final_answer".
- It must not submit anything or make POST requests; submission is handled separately.
- Wrap the body so runtime errors are caught and reported with a relevant message.
- Do not include the email or secret in it.
- Relative URLs can be resolved against the QUIZ_BASE_URL environment variable.

For numerical answers give just the number, not formatted text. Make sure the JSON is valid and properly escaped.
The downloaded files often carry the information needed: audio, PDFs and text may state the task, CSVs and tables may hold the data.
`
    return prompt
}

export class SolutionPlanner {
    private bot: QuizChainBot

    constructor(bot: QuizChainBot) {
        this.bot = bot
    }

    /**
     * Two model calls: a context pass over the raw HTML (best effort) and the analysis that produces the plan.
     * A failed analysis call propagates; unparsable output becomes a degraded plan.
     */
    async plan(record: QuestionRecord, resources: ResourceMap, questionUrl: string, credentials: StudentCredentials, scope = 'main'): Promise<SolutionPlan> {
        const context = await this.extractContext(questionUrl, record.rawHtml, scope)

        const prompt = buildAnalysisPrompt({
            record,
            resources,
            questionUrl,
            credentials,
            context,
            language: this.bot.config.sandbox.language
        })

        this.bot.log(scope, 'PLAN', `Requesting analysis (${prompt.length} chars, ${resources.size} resource(s))`)
        const raw = await this.bot.llm.complete([
            { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
            { role: 'user', content: prompt }
        ], this.bot.config.llm.analysisMaxTokens)

        const { plan, strategy } = salvagePlan(raw)
        if (strategy === null) {
            const degraded = new PlanningDegraded(raw)
            this.bot.log(scope, 'PLAN', `${degraded.message}; continuing with the raw text`, 'warn')
        } else {
            this.bot.log(scope, 'PLAN', `Plan parsed (${strategy}): answer_type=${plan.answerType}, code=${plan.solutionCode ? 'yes' : 'no'}`)
        }
        return plan
    }

    async extractContext(questionUrl: string, html: string, scope = 'main'): Promise<string> {
        const messages: ChatMessage[] = [
            { role: 'system', content: CONTEXT_SYSTEM_PROMPT },
            { role: 'user', content: `QUESTION URL:\n${questionUrl}\n\nHTML CONTENT:\n${html.slice(0, this.bot.config.llm.contextHtmlChars)}` }
        ]

        try {
            const context = await this.bot.llm.complete(messages, this.bot.config.llm.contextMaxTokens)
            this.bot.log(scope, 'PLAN', `Context extracted (${context.length} chars)`)
            return context
        } catch (error) {
            this.bot.log(scope, 'PLAN', `Context extraction failed: ${errorMessage(error)}`, 'warn')
            return 'N/A'
        }
    }
}
