import { MASS_TO_KG, VOLUME_TO_LITER, isMassUnit, isVolumeUnit } from '@domain/constants/units.ts'

export type UnitConversion =
  | { ok: true; factor: number }
  | { ok: false; reason: 'incompatible' }

const INCOMPATIBLE: UnitConversion = { ok: false, reason: 'incompatible' }

/**
 * Factor that turns a quantity in `sourceUnit` into `targetUnit`.
 *
 * Identical names (case-insensitive) always convert with factor 1, even for
 * unknown units. Otherwise both units must sit in the same table; volume is
 * tried before mass, so "oz" means fluid ounce next to another volume unit
 * and weight ounce next to another mass unit.
 */
export function convertUnits(targetUnit: string, sourceUnit: string): UnitConversion {
  const target = targetUnit.toLowerCase()
  const source = sourceUnit.toLowerCase()

  if (target === source) return { ok: true, factor: 1 }

  if (isVolumeUnit(target) && isVolumeUnit(source)) {
    return { ok: true, factor: VOLUME_TO_LITER[source] / VOLUME_TO_LITER[target] }
  }

  if (isMassUnit(target) && isMassUnit(source)) {
    return { ok: true, factor: MASS_TO_KG[source] / MASS_TO_KG[target] }
  }

  return INCOMPATIBLE
}
