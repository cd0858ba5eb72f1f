// pdf-parse's package entry runs a self-test when loaded without a parent module, so the
// library file is imported directly. Only the surface used by the document decoder is declared.
declare module 'pdf-parse/lib/pdf-parse.js' {
    interface TextItem {
        str: string
        transform: number[]
    }

    interface PageData {
        getTextContent(options?: { normalizeWhitespace?: boolean, disableCombineTextItems?: boolean }): Promise<{ items: TextItem[] }>
    }

    interface Options {
        pagerender?: (pageData: PageData) => Promise<string> | string
        max?: number
    }

    interface Result {
        numpages: number
        text: string
    }

    function pdf(dataBuffer: Buffer, options?: Options): Promise<Result>

    export = pdf
}
