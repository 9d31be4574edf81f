import { Command } from 'commander'
import type { CartConfig } from '@infrastructure/config/config.ts'
import { googleSheetsSourceFromConfig } from '@infrastructure/sheets/googleSheetsSource.ts'
import { createCsvTableCache } from '@infrastructure/cache/csvTableCache.ts'
import { loadIngredientRows } from '@infrastructure/table/loadIngredientRows.ts'
import { systemClipboard } from '@infrastructure/clipboard/clipboard.ts'
import type { Logger } from '@infrastructure/table/TableSource.ts'
import { runCart, type RunCartDeps } from './runCart.ts'

export function depsFromConfig(config: CartConfig, logger: Logger = console): RunCartDeps {
  const remote = googleSheetsSourceFromConfig(config)
  const cache = createCsvTableCache(config.cachePath)
  return {
    loadRows: () => loadIngredientRows(remote, cache, logger),
    clipboard: systemClipboard,
    logger,
  }
}

export function createProgram(deps: () => RunCartDeps): Command {
  return new Command()
    .name('cart-planner')
    .description('Merge the ingredients of several recipes into one shopping list.')
    .argument(
      '[recipes...]',
      'A list of recipes to make, comma separated. If not provided, the clipboard will be used.',
    )
    .action(async (recipes: string[]) => {
      await runCart(recipes, deps())
    })
}
