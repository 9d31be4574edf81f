import type { Ingredient } from './Ingredient.ts'

/** One row of the ingredient sheet, as cells. */
export type TableRow = readonly string[]

/** Recipe name -> ingredients in sheet order. */
export type RecipeTable = ReadonlyMap<string, readonly Ingredient[]>

/** Names of ingredients with an indefinite shelf life. */
export type BulkSet = ReadonlySet<string>

export interface ParsedTable {
  recipes: RecipeTable
  bulkItems: BulkSet
}
