export interface QuestionRecord {
    /** Visible text, with any decoded embedded secrets prepended. */
    readonly questionText: string
    readonly submissionUrl: string | null
    /** Absolute, deduplicated, in order of discovery. */
    readonly resourceUrls: readonly string[]
    readonly tableFragments: readonly string[]
    readonly rawHtml: string
}

export type ResourceErrorKind = 'transient' | 'parse'

interface PayloadBase {
    url: string
}

export interface TabularPayload extends PayloadBase {
    kind: 'tabular'
    columns: string[]
    rows: Record<string, string>[]
    rowCount: number
}

export interface DocumentPage {
    pageNumber: number
    text: string
}

export interface DocumentPayload extends PayloadBase {
    kind: 'document'
    pages: DocumentPage[]
}

export interface AudioPayload extends PayloadBase {
    kind: 'audio'
    transcript: string
    /** Original bytes, base64 */
    encodedBytes: string
}

export interface StructuredPayload extends PayloadBase {
    kind: 'structured'
    json: unknown
}

export interface TextPayload extends PayloadBase {
    kind: 'text'
    content: string
}

export interface BinaryPayload extends PayloadBase {
    kind: 'binary'
    sizeBytes: number
}

export interface FailedPayload extends PayloadBase {
    kind: 'failed'
    errorKind: ResourceErrorKind
    error: string
    attempts: number
}

export type ResourcePayload =
    | TabularPayload
    | DocumentPayload
    | AudioPayload
    | StructuredPayload
    | TextPayload
    | BinaryPayload
    | FailedPayload

export type ResourceMap = Map<string, ResourcePayload>
