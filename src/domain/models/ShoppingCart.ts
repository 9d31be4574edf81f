import type { Ingredient } from './Ingredient.ts'

export type CartEntry = Ingredient

export interface UnitWarning {
  recipe: string
  ingredient: string
  storedUnit: string
  incomingUnit: string
}

export interface ShoppingCart {
  recipes: string[]          // the query, in order
  fresh: CartEntry[]         // first-seen order
  pantry: CartEntry[]        // first-seen order
  warnings: UnitWarning[]
}
