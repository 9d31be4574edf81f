import { numericQuantity } from 'numeric-quantity'

/** Signed decimal, optionally with an exponent: "2", "+2", "1.", ".5", "-1e-3". */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i

/** Fraction or mixed number: "1/2", "1 1/2". */
const FRACTION_PATTERN = /^(\d+\s+)?\d+\/\d+$/

/** Vulgar fraction, optionally after a whole number: "½", "1½", "1 ½". */
const VULGAR_FRACTION_PATTERN = /^(\d+\s*)?[¼-¾⅐-⅞]$/

/**
 * Parse a quantity or duration cell.
 * Empty -> 0. Accepts decimals, fractions, mixed numbers and unicode
 * vulgar fractions. Returns null for anything else, including thousands
 * separators and decimal commas.
 */
export function parseNumericCell(cell: string): number | null {
  const trimmed = cell.trim()
  if (trimmed.length === 0) return 0

  if (DECIMAL_PATTERN.test(trimmed)) return Number(trimmed)

  if (FRACTION_PATTERN.test(trimmed) || VULGAR_FRACTION_PATTERN.test(trimmed)) {
    const value = numericQuantity(trimmed)
    return Number.isFinite(value) ? value : null
  }

  return null
}
