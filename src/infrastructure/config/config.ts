import path from 'path'
import { z } from 'zod'
import { ConfigError } from '@domain/errors.ts'

const envSchema = z.object({
  CART_SHEET_RANGE: z.string().min(1).default('Ingredients!A1:F'),
  CART_SPREADSHEET_ID_PATH: z.string().min(1).default('spreadsheet_id.json'),
  CART_CREDENTIALS_PATH: z.string().min(1).default('credentials.json'),
  CART_TOKEN_PATH: z.string().min(1).default('token.json'),
  CART_CACHE_PATH: z.string().min(1).default('ingredients.csv'),
})

export interface CartConfig {
  sheetRange: string
  spreadsheetIdPath: string
  credentialsPath: string
  tokenPath: string
  cachePath: string
}

/**
 * Read configuration from environment variables. Relative paths resolve
 * against `cwd`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): CartConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${issues}`)
  }

  const vars = parsed.data
  return {
    sheetRange: vars.CART_SHEET_RANGE,
    spreadsheetIdPath: path.resolve(cwd, vars.CART_SPREADSHEET_ID_PATH),
    credentialsPath: path.resolve(cwd, vars.CART_CREDENTIALS_PATH),
    tokenPath: path.resolve(cwd, vars.CART_TOKEN_PATH),
    cachePath: path.resolve(cwd, vars.CART_CACHE_PATH),
  }
}
