import { google, type Auth } from 'googleapis'
import { z } from 'zod'
import type { TableRow } from '@domain/models/RecipeTable.ts'
import type { TableSource } from '@infrastructure/table/TableSource.ts'
import { readJsonFile } from '@infrastructure/config/readJsonFile.ts'
import { authorize, type AuthPaths } from './googleAuth.ts'

/** Fetches the raw cell values of a range. */
export type ValuesReader = (spreadsheetId: string, range: string) => Promise<unknown[][]>

const spreadsheetIdSchema = z.object({ id: z.string().min(1) })

export async function readSpreadsheetId(filePath: string): Promise<string> {
  const file = await readJsonFile(filePath, spreadsheetIdSchema)
  return file.id
}

export function createValuesReader(auth: Auth.OAuth2Client): ValuesReader {
  const sheets = google.sheets({ version: 'v4', auth })
  return async (spreadsheetId, range) => {
    const res = await sheets.spreadsheets.values.get({ spreadsheetId, range })
    return res.data.values ?? []
  }
}

function cellToString(cell: unknown): string {
  if (cell === null || cell === undefined) return ''
  return String(cell)
}

export function toTableRows(values: unknown[][]): TableRow[] {
  return values.map((row) => row.map(cellToString))
}

export interface GoogleSheetsSourceOptions {
  spreadsheetId: () => Promise<string>
  range: string
  values: () => Promise<ValuesReader>
}

/** Table source backed by a range of a Google spreadsheet. */
export function createGoogleSheetsSource(options: GoogleSheetsSourceOptions): TableSource {
  return {
    name: 'Google Sheets',
    async loadRows() {
      const spreadsheetId = await options.spreadsheetId()
      const read = await options.values()
      return toTableRows(await read(spreadsheetId, options.range))
    },
  }
}

export interface GoogleSheetsConfig extends AuthPaths {
  spreadsheetIdPath: string
  sheetRange: string
}

/** Wire the source to the on-disk spreadsheet id, credentials and token. */
export function googleSheetsSourceFromConfig(config: GoogleSheetsConfig): TableSource {
  return createGoogleSheetsSource({
    spreadsheetId: () => readSpreadsheetId(config.spreadsheetIdPath),
    range: config.sheetRange,
    values: async () => createValuesReader(await authorize(config)),
  })
}
