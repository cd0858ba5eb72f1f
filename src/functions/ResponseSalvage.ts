import { ANSWER_TYPES, AnswerType, SolutionPlan } from '../interface/Plan'
import { LIMITS } from '../constants'

type JsonObject = Record<string, unknown>

/**
 * One way of reading a JSON object out of model output. Returns null when it does not apply.
 */
export interface SalvageStrategy {
    name: string
    apply(text: string): JsonObject | null
}

export interface SalvageResult {
    plan: SolutionPlan
    /** Name of the strategy that produced the object, null for the degraded plan */
    strategy: string | null
}

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function tryParseObject(text: string): JsonObject | null {
    try {
        const value: unknown = JSON.parse(text)
        return isObject(value) ? value : null
    } catch {
        return null
    }
}

function greedyObject(text: string): JsonObject | null {
    const start = text.indexOf('{')
    const end = text.lastIndexOf('}')
    if (start === -1 || end <= start) return null
    return tryParseObject(text.slice(start, end + 1))
}

/** Text prepared for a second parse attempt: no code fences, straight quotes, single line */
export function cleanModelText(text: string): string {
    return text
        .replace(/```(?:json)?/gi, '')
        .replace(/[\u201C\u201D]/g, '"')
        .replace(/[\u2018\u2019]/g, '\'')
        .replace(/[\r\n\t]/g, ' ')
        .replace(/[\u0000-\u001F\u007F-\u009F]/g, '')
        .trim()
}

export const SALVAGE_STRATEGIES: SalvageStrategy[] = [
    { name: 'direct', apply: (text) => tryParseObject(text.trim()) },
    { name: 'outermost-braces', apply: greedyObject },
    {
        name: 'cleaned',
        apply: (text) => {
            const cleaned = cleanModelText(text)
            return tryParseObject(cleaned) ?? greedyObject(cleaned)
        }
    }
]

function isAnswerType(value: string): value is AnswerType {
    return ANSWER_TYPES.some(type => type === value)
}

function toText(value: unknown): string {
    if (typeof value === 'string') return value
    if (value === null || value === undefined) return ''
    return typeof value === 'object' ? JSON.stringify(value) : String(value)
}

function toStringList(value: unknown): string[] {
    if (Array.isArray(value)) return value.map(toText)
    if (typeof value === 'string' && value.trim()) return [value]
    return []
}

export function normalizePlan(raw: JsonObject): SolutionPlan {
    const answerType = typeof raw.answer_type === 'string' ? raw.answer_type.trim().toLowerCase() : ''
    const code = raw.solution_code

    const plan: SolutionPlan = {
        analysis: toText(raw.analysis),
        dataNeeded: toStringList(raw.data_needed),
        steps: toStringList(raw.steps),
        answerType: isAnswerType(answerType) ? answerType : 'string',
        solutionCode: typeof code === 'string' && code.trim() ? code : null,
        finalAnswer: raw.final_answer === undefined ? null : raw.final_answer,
        degraded: false
    }
    if (typeof raw.solution === 'string') plan.solution = raw.solution
    return plan
}

export function degradedPlan(text: string): SolutionPlan {
    return {
        analysis: `Failed to parse JSON. Raw response: ${text.slice(0, LIMITS.RAW_RESPONSE_PREVIEW)}`,
        dataNeeded: [],
        steps: ['Manual parsing required'],
        answerType: 'string',
        solutionCode: null,
        finalAnswer: null,
        degraded: true,
        solution: text
    }
}

/**
 * Total: always returns a plan. The strategies run in order and the first JSON object wins.
 */
export function salvagePlan(text: string, strategies: SalvageStrategy[] = SALVAGE_STRATEGIES): SalvageResult {
    for (const strategy of strategies) {
        const parsed = strategy.apply(text)
        if (parsed) {
            return { plan: normalizePlan(parsed), strategy: strategy.name }
        }
    }
    return { plan: degradedPlan(text), strategy: null }
}
