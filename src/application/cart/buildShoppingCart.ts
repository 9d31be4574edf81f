import type { Ingredient } from '@domain/models/Ingredient.ts'
import type { ParsedTable } from '@domain/models/RecipeTable.ts'
import type { CartEntry, ShoppingCart, UnitWarning } from '@domain/models/ShoppingCart.ts'
import { UnknownRecipeError } from '@domain/errors.ts'
import { convertUnits } from '@application/units/convertUnits.ts'

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100
}

/**
 * Merge the ingredients of the requested recipes into one shopping cart.
 *
 * Entries are keyed by ingredient name. The first occurrence fixes the
 * entry's unit; later occurrences are converted into it and added. Units
 * that cannot be converted produce a warning and the incoming quantity is
 * dropped.
 */
export function buildShoppingCart(query: readonly string[], table: ParsedTable): ShoppingCart {
  const selected = query.map((name) => {
    const ingredients = table.recipes.get(name)
    if (!ingredients) throw new UnknownRecipeError(name)
    return { name, ingredients }
  })

  const entries = new Map<string, CartEntry>()
  const warnings: UnitWarning[] = []

  for (const recipe of selected) {
    for (const ingredient of recipe.ingredients) {
      const existing = entries.get(ingredient.name)
      if (!existing) {
        entries.set(ingredient.name, { ...ingredient })
        continue
      }
      mergeInto(existing, ingredient, recipe.name, warnings)
    }
  }

  const fresh: CartEntry[] = []
  const pantry: CartEntry[] = []
  for (const entry of entries.values()) {
    if (table.bulkItems.has(entry.name)) pantry.push(entry)
    else fresh.push(entry)
  }

  return { recipes: [...query], fresh, pantry, warnings }
}

function mergeInto(
  existing: CartEntry,
  incoming: Ingredient,
  recipe: string,
  warnings: UnitWarning[],
): void {
  const conversion = convertUnits(existing.unit, incoming.unit)
  if (!conversion.ok) {
    warnings.push({
      recipe,
      ingredient: incoming.name,
      storedUnit: existing.unit,
      incomingUnit: incoming.unit,
    })
    return
  }

  existing.quantity += conversion.factor === 1
    ? incoming.quantity
    : roundTo2(incoming.quantity * conversion.factor)
}

export function describeUnitWarning(warning: UnitWarning): string {
  return `Incompatible units for ${warning.ingredient} in ${warning.recipe}: ${warning.storedUnit} != ${warning.incomingUnit}`
}
