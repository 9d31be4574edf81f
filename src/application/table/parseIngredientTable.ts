import { isBulkShelfLife, type Ingredient, type ShelfLife } from '@domain/models/Ingredient.ts'
import type { ParsedTable, TableRow } from '@domain/models/RecipeTable.ts'
import { TableParseError } from '@domain/errors.ts'
import { parseNumericCell } from './parseNumericCell.ts'

/** Column order of the ingredient sheet. */
export const TABLE_COLUMNS = ['recipe', 'ingredient', 'quantity', 'unit', 'location', 'duration'] as const

const INDEFINITE = 'indefinite'

function parseShelfLife(cell: string, rowNumber: number): ShelfLife {
  const trimmed = cell.trim()
  if (trimmed === INDEFINITE) return { kind: 'indefinite' }

  const duration = parseNumericCell(trimmed)
  if (duration === null) {
    throw new TableParseError(`duration "${trimmed}" is not a number or "${INDEFINITE}"`, rowNumber, 'duration')
  }
  return { kind: 'limited', duration }
}

function parseRow(row: TableRow, rowNumber: number): Ingredient {
  if (row.length < TABLE_COLUMNS.length) {
    throw new TableParseError(
      `expected ${TABLE_COLUMNS.length} cells, got ${row.length}`,
      rowNumber,
    )
  }

  const quantity = parseNumericCell(row[2])
  if (quantity === null) {
    throw new TableParseError(`quantity "${row[2].trim()}" is not a number`, rowNumber, 'quantity')
  }
  if (quantity < 0) {
    throw new TableParseError(`quantity "${row[2].trim()}" is negative`, rowNumber, 'quantity')
  }

  return {
    name: row[1].toLowerCase().trim(),
    quantity,
    unit: row[3].trim(),
    location: row[4].trim(),
    shelfLife: parseShelfLife(row[5], rowNumber),
  }
}

/**
 * Build the recipe table and bulk set from sheet rows.
 *
 * The first row is the header. A non-empty first cell starts a recipe
 * section; rows with an empty first cell belong to the section above it.
 */
export function parseIngredientTable(rows: readonly TableRow[]): ParsedTable {
  if (rows.length === 0) {
    throw new TableParseError('table is empty, expected a header row', 1)
  }

  const recipes = new Map<string, Ingredient[]>()
  const bulkItems = new Set<string>()
  let currentRecipe = ''

  rows.slice(1).forEach((row, index) => {
    const rowNumber = index + 2
    const ingredient = parseRow(row, rowNumber)

    const recipeName = row[0].trim()
    if (recipeName.length > 0) currentRecipe = recipeName

    const list = recipes.get(currentRecipe) ?? []
    list.push(ingredient)
    recipes.set(currentRecipe, list)

    if (isBulkShelfLife(ingredient.shelfLife)) {
      bulkItems.add(ingredient.name)
    }
  })

  return { recipes, bulkItems }
}
