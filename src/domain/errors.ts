/** A row of the ingredient table could not be read. */
export class TableParseError extends Error {
  readonly row: number
  readonly column: string | null

  constructor(message: string, row: number, column: string | null = null) {
    super(`Row ${row}: ${message}`)
    this.name = 'TableParseError'
    this.row = row
    this.column = column
  }
}

/** A requested recipe is not in the recipe table. */
export class UnknownRecipeError extends Error {
  readonly recipe: string

  constructor(recipe: string) {
    super(`Unknown recipe "${recipe}"`)
    this.name = 'UnknownRecipeError'
    this.recipe = recipe
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class EmptyQueryError extends Error {
  constructor() {
    super('No recipes requested. Pass recipe names or copy them to the clipboard, one per line.')
    this.name = 'EmptyQueryError'
  }
}
