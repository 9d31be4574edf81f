/**
 * Recipe names from command-line tokens. Tokens are joined with spaces so
 * unquoted multi-word names survive, then split on commas.
 */
export function parseQueryArguments(tokens: readonly string[]): string[] {
  return tokens
    .join(' ')
    .split(',')
    .map((name) => name.trim())
    .filter(Boolean)
}

/** Recipe names from clipboard text, one per line. */
export function parseQueryText(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((name) => name.trim())
    .filter(Boolean)
}
