import type { TableRow } from '@domain/models/RecipeTable.ts'
import type { Logger, TableSink, TableSource } from './TableSource.ts'

/**
 * Rows from the remote source, written through to the cache. Any remote
 * failure falls back to the cache with a warning; a failing cache read
 * propagates.
 */
export async function loadIngredientRows(
  remote: TableSource,
  cache: TableSource & TableSink,
  logger: Logger = console,
): Promise<TableRow[]> {
  let rows: TableRow[]
  try {
    rows = await remote.loadRows()
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.warn(`[cart] Error loading ${remote.name}. Loading ${cache.name} instead. ${message}`)
    return cache.loadRows()
  }

  await cache.saveRows(rows)
  return rows
}
