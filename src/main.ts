#!/usr/bin/env tsx
import 'dotenv/config'
import { loadConfig } from '@infrastructure/config/config.ts'
import { createProgram, depsFromConfig } from '@presentation/cli/createProgram.ts'

async function main(): Promise<void> {
  const program = createProgram(() => depsFromConfig(loadConfig()))
  await program.parseAsync(process.argv)
}

main().catch((err: unknown) => {
  console.error(`[cart] ${err instanceof Error ? err.message : String(err)}`)
  process.exitCode = 1
})
