import type { ToolReference } from '@toolscout/core'
import type { EvalReport } from './metrics.js'
import type { SavingsReport } from './savings.js'
import chalk from 'chalk'
import Table from 'cli-table3'

/**
 * Output format options
 */
export type OutputFormat = 'table' | 'json' | 'minimal'

export const OUTPUT_FORMATS: OutputFormat[] = ['table', 'json', 'minimal']

export type ReportFormat = Exclude<OutputFormat, 'minimal'>

export const REPORT_FORMATS: ReportFormat[] = ['table', 'json']

export interface SearchOutput {
  query: string
  tools: ToolReference[]
  totalIndexed: number
  searchTimeMs: number
}

/**
 * Format search results based on output format
 */
export function formatSearchResults(result: SearchOutput, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(result, null, 2)

    case 'minimal':
      return result.tools.map(t => t.name).join('\n')

    case 'table':
    default:
      return formatSearchTable(result)
  }
}

function formatSearchTable(result: SearchOutput): string {
  const lines: string[] = []

  lines.push(chalk.bold(`Search results for "${result.query}"`))
  lines.push(chalk.dim(`Found ${result.tools.length} of ${result.totalIndexed} tools in ${result.searchTimeMs}ms`))
  lines.push('')

  if (result.tools.length === 0) {
    lines.push(chalk.yellow('No matching tools found.'))
    return lines.join('\n')
  }

  const table = new Table({
    head: [chalk.cyan('#'), chalk.cyan('Name'), chalk.cyan('Description'), chalk.cyan('Score')],
    colWidths: [4, 30, 60, 9],
    wordWrap: true,
    style: { head: [], border: [] },
  })

  result.tools.forEach((tool, index) => {
    table.push([
      chalk.dim(String(index + 1)),
      chalk.white(tool.name),
      truncate(tool.description, 100),
      formatScore(tool.score, result.tools[0].score),
    ])
  })

  lines.push(table.toString())

  return lines.join('\n')
}

/**
 * BM25L scores are unbounded; colour relative to the best match
 */
function formatScore(score: number, best: number): string {
  const text = score.toFixed(3)
  const ratio = best > 0 ? score / best : 0

  if (ratio >= 0.8) {
    return chalk.green(text)
  }
  else if (ratio >= 0.5) {
    return chalk.yellow(text)
  }
  else {
    return chalk.dim(text)
  }
}

/**
 * Format an evaluation run
 */
export function formatEvalReport(report: EvalReport, format: ReportFormat): string {
  if (format === 'json') {
    return JSON.stringify(report, null, 2)
  }

  const lines: string[] = []

  lines.push(`Corpus : ${report.corpusSize} tools`)
  lines.push(`Queries: ${report.queries.length}`)
  lines.push('')

  for (const result of report.queries) {
    const status = result.hit ? chalk.green('OK  ') : chalk.red('MISS')
    let detail = `got=${formatNames(result.retrieved.slice(0, 5))}`
    if (result.matched.length > 0) {
      detail += `  matched=${formatNames(result.matched)}`
    }
    if (result.missed.length > 0) {
      detail += `  missed=${formatNames(result.missed)}`
    }
    lines.push(`  [${status}] '${result.query}'`)
    lines.push(chalk.dim(`         ${detail}`))
  }

  lines.push('')

  const table = new Table({
    head: [chalk.cyan('Metric'), ...report.metrics.map(m => chalk.cyan(`k=${m.k}`))],
    style: { head: [], border: [] },
  })
  table.push(['Precision@k', ...report.metrics.map(m => formatPercent(m.precision))])
  table.push(['Recall@k', ...report.metrics.map(m => formatPercent(m.recall))])
  table.push(['MRR', formatPercent(report.mrr), ...report.metrics.slice(1).map(() => '')])
  lines.push(table.toString())

  lines.push('')
  lines.push(`${report.hits}/${report.queries.length} queries found at least one relevant tool in top-${report.maxK}`)

  return lines.join('\n')
}

/**
 * Format a token savings grid, one row per tool count
 */
export function formatSavingsReport(report: SavingsReport, format: ReportFormat): string {
  if (format === 'json') {
    return JSON.stringify(report, null, 2)
  }

  const ks = report.rows[0]?.setups.map(setup => setup.k) ?? []
  const table = new Table({
    head: [chalk.cyan('Tools'), ...ks.map(k => chalk.cyan(`top_k=${k}`)), chalk.cyan('Baseline')],
    style: { head: [], border: [] },
  })

  for (const row of report.rows) {
    table.push([
      String(row.toolCount),
      ...row.setups.map(setup => `${setup.tokens} (${formatPercent(setup.savings)})`),
      String(row.baseline),
    ])
  }

  return [
    `Counter: ${report.counter}`,
    '',
    table.toString(),
    '',
    chalk.dim('Savings = 1 - (search setup tokens / baseline tokens)'),
  ].join('\n')
}

export interface ChatOutput {
  text: string
  toolCalls: Array<{ name: string, arguments: string }>
  discovered: string[]
}

/**
 * Format the final reply of a chat prompt
 */
export function formatChatReply(reply: ChatOutput): string {
  const lines: string[] = []

  if (reply.text) {
    lines.push(reply.text)
  }

  if (reply.toolCalls.length > 0) {
    if (lines.length > 0) {
      lines.push('')
    }
    lines.push(chalk.bold('Tool calls:'))
    for (const call of reply.toolCalls) {
      lines.push(`  ${chalk.white(call.name)} ${chalk.dim(call.arguments)}`)
    }
  }

  if (lines.length > 0) {
    lines.push('')
  }
  lines.push(chalk.dim(`Discovered tools: ${reply.discovered.length > 0 ? reply.discovered.join(', ') : '(none)'}`))

  return lines.join('\n')
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`
}

function formatNames(names: string[]): string {
  return `[${names.join(', ')}]`
}

/**
 * Truncate text with ellipsis
 */
function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength)
    return text
  return `${text.substring(0, maxLength - 3)}...`
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`${chalk.green('✓')} ${message}`)
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(`${chalk.red('✗')} ${message}`)
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.warn(`${chalk.yellow('⚠')} ${message}`)
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`)
}
