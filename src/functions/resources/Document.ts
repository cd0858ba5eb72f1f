import pdf from 'pdf-parse/lib/pdf-parse.js'

import { DocumentPage } from '../../interface/Question'
import { ParseError } from '../../errors'

/**
 * Extracts text page by page. Items on the same baseline are concatenated, a change of
 * baseline starts a new line.
 */
export async function parsePdf(body: Buffer): Promise<DocumentPage[]> {
    const pages: DocumentPage[] = []

    try {
        await pdf(body, {
            pagerender: async (pageData) => {
                const content = await pageData.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
                let lastY: number | undefined
                let text = ''
                for (const item of content.items) {
                    const y = item.transform[5]
                    if (lastY === undefined || y === lastY) {
                        text += item.str
                    } else {
                        text += '\n' + item.str
                    }
                    lastY = y
                }
                pages.push({ pageNumber: pages.length + 1, text })
                return text
            }
        })
    } catch (error) {
        throw new ParseError(`PDF parse error: ${error instanceof Error ? error.message : error}`, { cause: error })
    }

    return pages
}
