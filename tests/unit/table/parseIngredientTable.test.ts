import { describe, it, expect } from 'vitest'
import { parseIngredientTable } from '@application/table/parseIngredientTable.ts'
import { parseNumericCell } from '@application/table/parseNumericCell.ts'
import { TableParseError } from '@domain/errors.ts'

const HEADER = ['Recipe', 'Ingredient', 'Quantity', 'Unit', 'Location', 'Duration']

describe('parseIngredientTable', () => {
  const rows = [
    HEADER,
    ['Pancakes', 'Flour', '1.5', 'cup', 'pantry', 'indefinite'],
    ['', 'Eggs', '2', 'count', 'fridge', '7'],
    ['', ' Milk ', '', 'cup', 'fridge', ''],
    ['  Omelette ', 'eggs', '3', 'count', 'fridge', '7'],
    ['', 'Salt', '', '', 'pantry', 'indefinite'],
  ]

  it('carries the recipe name down to rows with an empty first cell', () => {
    const { recipes } = parseIngredientTable(rows)

    expect([...recipes.keys()]).toEqual(['Pancakes', 'Omelette'])
    expect(recipes.get('Pancakes')!.map((i) => i.name)).toEqual(['flour', 'eggs', 'milk'])
    expect(recipes.get('Omelette')!.map((i) => i.name)).toEqual(['eggs', 'salt'])
  })

  it('builds ingredient records from the cells', () => {
    const { recipes } = parseIngredientTable(rows)
    const [flour, eggs, milk] = recipes.get('Pancakes')!

    expect(flour).toEqual({
      name: 'flour',
      quantity: 1.5,
      unit: 'cup',
      location: 'pantry',
      shelfLife: { kind: 'indefinite' },
    })
    expect(eggs.shelfLife).toEqual({ kind: 'limited', duration: 7 })
    expect(milk.quantity).toBe(0)
    expect(milk.shelfLife).toEqual({ kind: 'limited', duration: 0 })
  })

  it('collects indefinite ingredients into the bulk set', () => {
    const { bulkItems } = parseIngredientTable(rows)
    expect([...bulkItems]).toEqual(['flour', 'salt'])
  })

  it('marks an ingredient as bulk when any occurrence is indefinite', () => {
    const { bulkItems } = parseIngredientTable([
      HEADER,
      ['Toast', 'Butter', '1', 'tbsp', 'fridge', '14'],
      ['Cookies', 'butter', '2', 'tbsp', 'pantry', 'indefinite'],
    ])
    expect(bulkItems.has('butter')).toBe(true)
  })

  it('files rows before the first recipe name under an empty name', () => {
    const { recipes } = parseIngredientTable([
      HEADER,
      ['', 'Water', '1', 'cup', 'tap', ''],
    ])
    expect(recipes.get('')!.map((i) => i.name)).toEqual(['water'])
  })

  it('accepts fractions in the quantity column', () => {
    const { recipes } = parseIngredientTable([
      HEADER,
      ['Tea', 'Sugar', '1/2', 'tsp', 'pantry', 'indefinite'],
    ])
    expect(recipes.get('Tea')![0].quantity).toBe(0.5)
  })

  it('returns empty results for a header-only table', () => {
    const { recipes, bulkItems } = parseIngredientTable([HEADER])
    expect(recipes.size).toBe(0)
    expect(bulkItems.size).toBe(0)
  })

  it('rejects an empty table', () => {
    expect(() => parseIngredientTable([])).toThrow(TableParseError)
  })

  it('rejects a row with fewer than six cells', () => {
    const parse = () => parseIngredientTable([HEADER, ['Soup', 'Leek', '1', 'count', 'fridge']])
    expect(parse).toThrow(TableParseError)
    expect(parse).toThrow('Row 2: expected 6 cells, got 5')
  })

  it('rejects a non-numeric quantity', () => {
    try {
      parseIngredientTable([HEADER, ['Soup', 'Leek', 'lots', 'count', 'fridge', '5']])
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(TableParseError)
      expect((err as TableParseError).row).toBe(2)
      expect((err as TableParseError).column).toBe('quantity')
    }
  })

  it('rejects a non-numeric duration', () => {
    const parse = () => parseIngredientTable([HEADER, ['Soup', 'Leek', '1', 'count', 'fridge', 'forever']])
    expect(parse).toThrow(TableParseError)
  })

  it('matches "indefinite" case-sensitively', () => {
    const parse = () => parseIngredientTable([HEADER, ['Soup', 'Salt', '1', 'tsp', 'pantry', 'Indefinite']])
    expect(parse).toThrow(TableParseError)
  })

  it('reports the row number of a bad row further down', () => {
    const parse = () => parseIngredientTable([
      HEADER,
      ['Soup', 'Leek', '1', 'count', 'fridge', '5'],
      ['', 'Stock', 'x', 'cup', 'pantry', '5'],
    ])
    expect(parse).toThrow('Row 3: quantity "x" is not a number')
  })

  it('rejects a decimal comma in the quantity column', () => {
    try {
      parseIngredientTable([HEADER, ['Soup', 'Butter', '1,5', 'cup', 'fridge', '7']])
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(TableParseError)
      expect((err as TableParseError).column).toBe('quantity')
    }
  })

  it('rejects a decimal comma in the duration column', () => {
    const parse = () => parseIngredientTable([HEADER, ['Soup', 'Butter', '1', 'cup', 'fridge', '1,5']])
    expect(parse).toThrow('Row 2: duration "1,5" is not a number or "indefinite"')
  })

  it('rejects a negative quantity', () => {
    const parse = () => parseIngredientTable([HEADER, ['Soup', 'Leek', '-1', 'count', 'fridge', '5']])
    expect(parse).toThrow('Row 2: quantity "-1" is negative')
  })

  it('accepts a negative duration', () => {
    const { recipes } = parseIngredientTable([HEADER, ['Soup', 'Leek', '1', 'count', 'fridge', '-1']])
    expect(recipes.get('Soup')![0].shelfLife).toEqual({ kind: 'limited', duration: -1 })
  })
})

describe('parseNumericCell', () => {
  it('reads empty and blank cells as zero', () => {
    expect(parseNumericCell('')).toBe(0)
    expect(parseNumericCell('   ')).toBe(0)
  })

  it.each([
    ['2.25', 2.25],
    [' 3 ', 3],
    ['+2', 2],
    ['1.', 1],
    ['.5', 0.5],
    ['1e-3', 0.001],
    ['-1', -1],
    ['1/2', 0.5],
    ['1 1/2', 1.5],
    ['½', 0.5],
  ])('reads %j as %d', (cell, expected) => {
    expect(parseNumericCell(cell)).toBe(expected)
  })

  it.each(['1,5', '1,000', '1.5.5', '2 cups', 'Infinity', 'NaN', 'some', '1/2/3', '--1'])(
    'returns null for %j',
    (cell) => {
      expect(parseNumericCell(cell)).toBeNull()
    },
  )
})
