import { EmptyQueryError } from '@domain/errors.ts'
import type { TableRow } from '@domain/models/RecipeTable.ts'
import { parseIngredientTable } from '@application/table/parseIngredientTable.ts'
import { buildShoppingCart, describeUnitWarning } from '@application/cart/buildShoppingCart.ts'
import { formatCartTable, toTabSeparated } from '@application/cart/formatCartTable.ts'
import { parseQueryArguments, parseQueryText } from '@application/query/parseRecipeQuery.ts'
import type { Clipboard } from '@infrastructure/clipboard/clipboard.ts'
import type { Logger } from '@infrastructure/table/TableSource.ts'

export interface RunCartDeps {
  loadRows: () => Promise<TableRow[]>
  clipboard: Clipboard
  logger: Logger
}

/**
 * One run of the planner: resolve the query, load and parse the sheet,
 * build the cart and hand the tab-separated table to the clipboard.
 * Returns the text that was copied.
 */
export async function runCart(recipeArgs: readonly string[], deps: RunCartDeps): Promise<string> {
  const query = recipeArgs.length > 0
    ? parseQueryArguments(recipeArgs)
    : parseQueryText(await deps.clipboard.read())
  if (query.length === 0) throw new EmptyQueryError()

  deps.logger.log('Using query:')
  deps.logger.log(query.join(', '))

  const table = parseIngredientTable(await deps.loadRows())
  const cart = buildShoppingCart(query, table)
  for (const warning of cart.warnings) {
    deps.logger.warn(`[cart] ${describeUnitWarning(warning)}`)
  }

  const text = toTabSeparated(formatCartTable(cart))
  await deps.clipboard.write(text)
  deps.logger.log(text)
  deps.logger.log('Copied to clipboard')
  return text
}
