import { CheerioAPI, load } from 'cheerio'

import type { QuizChainBot } from '../index'
import { QuestionRecord } from '../interface/Question'
import { EXTENSIONS } from '../constants'
import { errorMessage } from '../errors'

interface ExtractionContext {
    $: CheerioAPI
    html: string
    baseUrl: string
    /** Visible text with script/style removed (before embedded secrets are prepended) */
    visibleText: string
}

/**
 * One independent heuristic. Returning null means "no match"; throwing is tolerated and
 * treated the same way by the extractor.
 */
export interface ExtractionRule<T> {
    name: string
    apply(ctx: ExtractionContext): T | null
}

// Structural view of the parsed DOM, enough to walk text in document order
interface DomNode {
    type: string
    data?: string
    children?: DomNode[]
}

const LINKABLE_EXTENSIONS = [...EXTENSIONS.AUDIO, ...EXTENSIONS.DOCUMENT]

const EMBEDDED_SECRET = /atob\(\s*['"]([A-Za-z0-9+/=]+)['"]\s*\)/g
const SUBMIT_PHRASE = /(?:POST|submit).*?\b(?:to|at)\s+(https?:\/\/[^\s'"<>]+)/i
const ANY_URL = /https?:\/\/[^\s'"<>]+/g

function trimUrl(url: string): string {
    return url.replace(/[.,;:)\]]+$/, '')
}

function collectText(nodes: DomNode[], out: string[]): void {
    for (const node of nodes) {
        if (node.type === 'text') {
            const text = (node.data ?? '').trim()
            if (text) out.push(text)
        } else if (node.children) {
            collectText(node.children, out)
        }
    }
}

/** Absolute http(s) URL for `ref` against `base`, or null */
export function resolveUrl(ref: string, base: string): string | null {
    const trimmed = ref.trim()
    if (!trimmed) return null
    try {
        const url = new URL(trimmed, base)
        return url.protocol === 'http:' || url.protocol === 'https:' ? url.href : null
    } catch {
        return null
    }
}

export function hasLinkableExtension(url: string): boolean {
    let pathname: string
    try {
        pathname = new URL(url).pathname.toLowerCase()
    } catch {
        return false
    }
    return LINKABLE_EXTENSIONS.some(ext => pathname.endsWith(`.${ext}`))
}

export function decodeEmbeddedSecrets(html: string): string[] {
    const decoder = new TextDecoder('utf-8', { fatal: true })
    const decoded: string[] = []
    for (const match of html.matchAll(EMBEDDED_SECRET)) {
        const b64 = match[1]
        if (!b64) continue
        try {
            const text = decoder.decode(Buffer.from(b64, 'base64'))
            if (text.trim()) decoded.push(text)
        } catch {
            // not UTF-8 text, so not a question payload
            continue
        }
    }
    return decoded
}

const mediaRule = (tag: 'audio' | 'video'): ExtractionRule<string[]> => ({
    name: `${tag}-sources`,
    apply: ({ $, baseUrl }) => {
        const found: string[] = []
        $(tag).each((_, el) => {
            const own = $(el).attr('src')
            if (own) found.push(own)
            $(el).find('source').each((__, source) => {
                const src = $(source).attr('src')
                if (src) found.push(src)
            })
        })
        return found.map(src => resolveUrl(src, baseUrl)).filter((u): u is string => u !== null)
    }
})

const anchorRule: ExtractionRule<string[]> = {
    name: 'file-links',
    apply: ({ $, baseUrl }) => {
        const found: string[] = []
        $('a[href]').each((_, el) => {
            const resolved = resolveUrl($(el).attr('href') ?? '', baseUrl)
            if (resolved && hasLinkableExtension(resolved)) found.push(resolved)
        })
        return found
    }
}

export const RESOURCE_RULES: ExtractionRule<string[]>[] = [mediaRule('audio'), mediaRule('video'), anchorRule]

export const SUBMISSION_RULES: ExtractionRule<string>[] = [
    {
        name: 'submit-phrase',
        apply: ({ visibleText }) => {
            const match = SUBMIT_PHRASE.exec(visibleText)
            return match?.[1] ? trimUrl(match[1]) : null
        }
    },
    {
        name: 'submit-url',
        apply: ({ visibleText }) => {
            for (const match of visibleText.matchAll(ANY_URL)) {
                const url = trimUrl(match[0])
                const lower = url.toLowerCase()
                if (lower.includes('submit') || lower.includes('/answer')) return url
            }
            return null
        }
    }
]

export const TABLE_RULE: ExtractionRule<string[]> = {
    name: 'tables',
    apply: ({ $ }) => $('table').toArray().map(el => $.html(el))
}

export const SECRET_RULE: ExtractionRule<string[]> = {
    name: 'embedded-secrets',
    apply: ({ html }) => decodeEmbeddedSecrets(html)
}

export class ContentExtractor {
    private bot: QuizChainBot

    constructor(bot: QuizChainBot) {
        this.bot = bot
    }

    /**
     * Turns rendered HTML into a QuestionRecord. Never throws: a failing rule only empties its own field.
     */
    extract(html: string, baseUrl: string, scope = 'main'): QuestionRecord {
        let $: CheerioAPI
        try {
            $ = load(html)
        } catch (error) {
            this.bot.log(scope, 'EXTRACT', `HTML could not be parsed: ${errorMessage(error)}`, 'warn')
            $ = load('')
        }

        const visibleText = this.run(scope, { name: 'visible-text', apply: () => this.visibleText($) }, null) ?? ''
        const ctx: ExtractionContext = { $, html, baseUrl, visibleText }

        const secrets = this.run(scope, SECRET_RULE, ctx) ?? []
        const questionText = secrets.length > 0 ? secrets.join('\n') + '\n' + visibleText : visibleText

        const resourceUrls: string[] = []
        const seen = new Set<string>()
        for (const rule of RESOURCE_RULES) {
            for (const url of this.run(scope, rule, ctx) ?? []) {
                if (seen.has(url)) continue
                seen.add(url)
                resourceUrls.push(url)
            }
        }

        let submissionUrl: string | null = null
        for (const rule of SUBMISSION_RULES) {
            submissionUrl = this.run(scope, rule, ctx)
            if (submissionUrl) break
        }

        const tableFragments = this.run(scope, TABLE_RULE, ctx) ?? []

        if (secrets.length > 0) {
            this.bot.log(scope, 'EXTRACT', `Decoded ${secrets.length} embedded payload(s)`)
        }

        return Object.freeze({
            questionText,
            submissionUrl,
            resourceUrls: Object.freeze(resourceUrls),
            tableFragments: Object.freeze(tableFragments),
            rawHtml: html
        })
    }

    private visibleText($: CheerioAPI): string {
        $('script, style').remove()
        const parts: string[] = []
        collectText($.root().toArray(), parts)
        return parts.join('\n')
    }

    private run<C, T>(scope: string, rule: { name: string, apply(ctx: C): T | null }, ctx: C): T | null {
        try {
            return rule.apply(ctx)
        } catch (error) {
            this.bot.log(scope, 'EXTRACT', `Rule "${rule.name}" failed: ${errorMessage(error)}`, 'warn')
            return null
        }
    }
}
