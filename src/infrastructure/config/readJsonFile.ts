import { readFile } from 'fs/promises'
import type { z } from 'zod'
import { ConfigError } from '@domain/errors.ts'

/** Read a JSON file and validate it against `schema`. */
export async function readJsonFile<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
): Promise<z.infer<T>> {
  const content = await readFile(filePath, 'utf-8')

  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`${filePath} is not valid JSON: ${message}`)
  }

  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    throw new ConfigError(`${filePath} has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
  }
  return parsed.data
}
