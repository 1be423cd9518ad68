import type { ReportFormat } from '../utils/output.js'
import type { TokenCounter } from '../utils/savings.js'
import process from 'node:process'
import Anthropic from '@anthropic-ai/sdk'
import { ToolLoader } from '@toolscout/core'
import { Command, Option } from 'commander'
import ora from 'ora'
import { DEFAULT_MODELS, DEFAULT_SAVINGS_KS, DEFAULT_TOOLS_PATH } from '../constants.js'
import { collectPositiveInt, errorMessage } from '../utils/options.js'
import { error, formatSavingsReport, REPORT_FORMATS } from '../utils/output.js'
import { createAnthropicCounter, createApproximateCounter, measureSavings } from '../utils/savings.js'

type CounterName = 'approx' | 'anthropic'

const COUNTERS: CounterName[] = ['approx', 'anthropic']

interface SavingsCommandOptions {
  tools: string[]
  counter: CounterName
  model?: string
  counts?: number[]
  topK?: number[]
  format: ReportFormat
  baseUrl?: string
}

/**
 * Create the savings command
 */
export function createSavingsCommand(): Command {
  return new Command('savings')
    .description('Compare request tokens with all tools against search plus top-k tools')
    .option('-t, --tools <paths...>', 'Tool definition files or directories', [DEFAULT_TOOLS_PATH])
    .addOption(new Option('-c, --counter <counter>', 'Token counter').choices(COUNTERS).default('approx'))
    .option('-m, --model <model>', 'Model used by the anthropic counter')
    .option('-n, --counts <numbers...>', 'Tool counts to measure (default: all loaded tools)', collectPositiveInt)
    .option('-k, --top-k <numbers...>', `Search setups to compare (default: ${DEFAULT_SAVINGS_KS.join(' ')})`, collectPositiveInt)
    .addOption(new Option('-f, --format <format>', 'Output format').choices(REPORT_FORMATS).default('table'))
    .option('--base-url <url>', 'API base URL for the anthropic counter')
    .action(async (options: SavingsCommandOptions) => {
      const spinner = ora('Loading tools...').start()

      try {
        const tools = await new ToolLoader().loadFromSources(options.tools)
        const model = options.model ?? DEFAULT_MODELS.anthropic
        const counter: TokenCounter = options.counter === 'anthropic'
          ? createAnthropicCounter(new Anthropic({ baseURL: options.baseUrl }), model)
          : createApproximateCounter()

        spinner.text = `Counting tokens (${options.counter})...`
        const rows = await measureSavings(
          tools,
          counter,
          options.counts ?? [tools.length],
          options.topK ?? DEFAULT_SAVINGS_KS,
        )

        spinner.stop()
        const label = options.counter === 'anthropic' ? `anthropic (${model})` : 'approx (4 chars per token)'
        console.log(formatSavingsReport({ counter: label, rows }, options.format))
      }
      catch (err) {
        spinner.fail('Token count failed')
        error(errorMessage(err))
        process.exit(1)
      }
    })
}
