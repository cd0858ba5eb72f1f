export const ANSWER_TYPES = ['number', 'string', 'boolean', 'object'] as const

export type AnswerType = typeof ANSWER_TYPES[number]

export interface SolutionPlan {
    analysis: string
    dataNeeded: string[]
    steps: string[]
    answerType: AnswerType
    solutionCode: string | null
    finalAnswer: unknown
    /** True when the model output could not be parsed and `solution` holds the raw text. */
    degraded: boolean
    solution?: string
}

export type Answer = string | number | boolean | object
