export type ShelfLife =
  | { kind: 'indefinite' }
  | { kind: 'limited'; duration: number }

export interface Ingredient {
  name: string               // lowercased, trimmed (identity key)
  quantity: number
  unit: string               // '' means unitless
  location: string
  shelfLife: ShelfLife
}

export function isBulkShelfLife(shelfLife: ShelfLife): boolean {
  return shelfLife.kind === 'indefinite'
}
