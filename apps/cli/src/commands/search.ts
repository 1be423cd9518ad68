import type { OutputFormat } from '../utils/output.js'
import process from 'node:process'
import { ToolIndex, ToolLoader } from '@toolscout/core'
import { Command, Option } from 'commander'
import ora from 'ora'
import { DEFAULT_TOOLS_PATH, DEFAULT_TOP_K } from '../constants.js'
import { errorMessage, parsePositiveInt } from '../utils/options.js'
import { error, formatSearchResults, OUTPUT_FORMATS } from '../utils/output.js'

interface SearchCommandOptions {
  tools: string[]
  topK: number
  format: OutputFormat
}

/**
 * Create the search command
 */
export function createSearchCommand(): Command {
  return new Command('search')
    .description('Rank tools against a query')
    .argument('<query>', 'Search query string')
    .option('-t, --tools <paths...>', 'Tool definition files or directories', [DEFAULT_TOOLS_PATH])
    .option('-k, --top-k <number>', 'Number of results to return', parsePositiveInt, DEFAULT_TOP_K)
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('table'))
    .action(async (query: string, options: SearchCommandOptions) => {
      const spinner = ora('Loading tools...').start()

      try {
        const tools = await new ToolLoader().loadFromSources(options.tools)
        const index = new ToolIndex(tools, { topK: options.topK })

        spinner.text = 'Searching...'
        const started = performance.now()
        const matches = index.rank(query)
        const searchTimeMs = Math.round(performance.now() - started)

        spinner.stop()

        console.log(formatSearchResults({
          query,
          tools: matches,
          totalIndexed: index.size,
          searchTimeMs,
        }, options.format))
      }
      catch (err) {
        spinner.fail('Search failed')
        error(errorMessage(err))
        process.exit(1)
      }
    })
}
