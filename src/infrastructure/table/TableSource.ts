import type { TableRow } from '@domain/models/RecipeTable.ts'

/** Anything that yields the rows of the ingredient sheet. */
export interface TableSource {
  name: string
  loadRows(): Promise<TableRow[]>
}

/** Something that can store rows for a later offline run. */
export interface TableSink {
  saveRows(rows: readonly TableRow[]): Promise<void>
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>
