import type { ReportFormat } from '../utils/output.js'
import process from 'node:process'
import { ToolIndex, ToolLoader } from '@toolscout/core'
import { Command, Option } from 'commander'
import ora from 'ora'
import { DEFAULT_EVAL_KS, DEFAULT_TOOLS_PATH } from '../constants.js'
import { loadEvalCases } from '../utils/cases.js'
import { evaluate } from '../utils/metrics.js'
import { errorMessage } from '../utils/options.js'
import { error, formatEvalReport, REPORT_FORMATS } from '../utils/output.js'

interface EvalCommandOptions {
  tools: string[]
  format: ReportFormat
}

/**
 * Create the eval command
 */
export function createEvalCommand(): Command {
  return new Command('eval')
    .description('Measure search quality against ground-truth queries')
    .argument('<cases>', 'JSON or YAML file of { query, expected } cases')
    .option('-t, --tools <paths...>', 'Tool definition files or directories', [DEFAULT_TOOLS_PATH])
    .addOption(new Option('-f, --format <format>', 'Output format').choices(REPORT_FORMATS).default('table'))
    .action(async (casesPath: string, options: EvalCommandOptions) => {
      const spinner = ora('Loading tools...').start()

      try {
        const tools = await new ToolLoader().loadFromSources(options.tools)
        const cases = await loadEvalCases(casesPath)
        const index = new ToolIndex(tools, { topK: Math.max(...DEFAULT_EVAL_KS) })

        spinner.text = `Running ${cases.length} queries...`
        const report = evaluate(index, cases, DEFAULT_EVAL_KS)

        spinner.stop()
        console.log(formatEvalReport(report, options.format))
      }
      catch (err) {
        spinner.fail('Evaluation failed')
        error(errorMessage(err))
        process.exit(1)
      }
    })
}
