/** Volume units in liters per unit. */
export const VOLUME_TO_LITER: Readonly<Record<string, number>> = Object.freeze({
  tbsp: 0.0147868,
  tsp: 0.00492892,
  cup: 0.236588,
  oz: 0.0295735, // fluid ounce
})

/** Mass units in kilograms per unit. */
export const MASS_TO_KG: Readonly<Record<string, number>> = Object.freeze({
  g: 1e-3,
  kg: 1.0,
  lb: 0.453592,
  oz: 0.0283495, // weight ounce
})

/** Unit rendered as a whole number of items. */
export const COUNT_UNIT = 'count'

/** Check if a lowercased unit is a volume unit. */
export function isVolumeUnit(unit: string): boolean {
  return Object.hasOwn(VOLUME_TO_LITER, unit)
}

/** Check if a lowercased unit is a mass unit. */
export function isMassUnit(unit: string): boolean {
  return Object.hasOwn(MASS_TO_KG, unit)
}
