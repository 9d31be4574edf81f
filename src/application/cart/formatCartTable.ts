import type { CartEntry, ShoppingCart } from '@domain/models/ShoppingCart.ts'
import { COUNT_UNIT } from '@domain/constants/units.ts'

export const PLAN_TITLE = 'Plan 0'
export const COLUMN_HEADER = ['Ingredients', '', '', 'Pantry']

const EMPTY_CELLS = ['', '', '']

/**
 * Cells for one cart entry.
 * Examples: ["salt"], ["eggs", "3", "count"], ["flour", "1.13", "cup"]
 */
export function formatIngredientCells(entry: CartEntry): string[] {
  if (entry.unit.trim().length === 0) return [entry.name]

  const quantity = entry.unit === COUNT_UNIT
    ? String(Math.trunc(entry.quantity))
    : String(entry.quantity)

  return [entry.name, quantity, entry.unit]
}

/**
 * Lay out the cart as rows of cells: title, one row per recipe, a blank
 * row, the column header, then fresh and pantry entries side by side.
 */
export function formatCartTable(cart: ShoppingCart): string[][] {
  const rows: string[][] = [[PLAN_TITLE]]

  for (const recipe of cart.recipes) rows.push([recipe])
  rows.push([])
  rows.push([...COLUMN_HEADER])

  const fresh = cart.fresh.map(formatIngredientCells)
  const pantry = cart.pantry.map(formatIngredientCells)
  const length = Math.max(fresh.length, pantry.length)

  for (let i = 0; i < length; i++) {
    rows.push([...(fresh[i] ?? EMPTY_CELLS), ...(pantry[i] ?? EMPTY_CELLS)])
  }

  return rows
}

/** Tab-separated cells, one newline-terminated line per row. */
export function toTabSeparated(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => `${row.join('\t')}\n`).join('')
}
