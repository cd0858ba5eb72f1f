import { parse } from 'csv-parse/sync'

import { ParseError } from '../../errors'

export interface ParsedTable {
    columns: string[]
    rows: Record<string, string>[]
}

/**
 * First record is the header. Rows shorter than the header leave the missing columns empty;
 * extra cells are dropped.
 */
export function parseCsv(body: Buffer): ParsedTable {
    let records: unknown
    try {
        records = parse(body, {
            bom: true,
            skip_empty_lines: true,
            relax_column_count: true,
            relax_quotes: true,
            trim: true
        })
    } catch (error) {
        throw new ParseError(`CSV parse error: ${error instanceof Error ? error.message : error}`, { cause: error })
    }

    if (!Array.isArray(records) || records.length === 0) {
        throw new ParseError('CSV parse error: no header row')
    }

    const cells = records.map(record => Array.isArray(record) ? record.map(cell => String(cell)) : [])
    const [header = [], ...data] = cells
    const columns = header.map((name, i) => name || `column_${i + 1}`)

    const rows = data.map(values => {
        const row: Record<string, string> = {}
        columns.forEach((column, i) => {
            row[column] = values[i] ?? ''
        })
        return row
    })

    return { columns, rows }
}
