import { readFile, writeFile } from 'fs/promises'
import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { z } from 'zod'
import type { TableRow } from '@domain/models/RecipeTable.ts'
import type { TableSink, TableSource } from '@infrastructure/table/TableSource.ts'

const recordsSchema = z.array(z.array(z.string()))

export function parseCsvRows(content: string): TableRow[] {
  const records: unknown = parse(content, {
    delimiter: ',',
    quote: '"',
    relax_column_count: true,
    skip_empty_lines: true,
  })
  return recordsSchema.parse(records)
}

export function stringifyCsvRows(rows: readonly TableRow[]): string {
  return stringify(rows.map((row) => [...row]), { delimiter: ',', quote: '"' })
}

/** Local copy of the ingredient sheet, kept as a CSV file. */
export function createCsvTableCache(filePath: string): TableSource & TableSink {
  return {
    name: `cache ${filePath}`,
    async loadRows() {
      return parseCsvRows(await readFile(filePath, 'utf-8'))
    },
    async saveRows(rows) {
      await writeFile(filePath, stringifyCsvRows(rows))
    },
  }
}
