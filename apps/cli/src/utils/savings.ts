import type { AnthropicMessageParam, AnthropicTool } from '@toolscout/client'
import type { ToolDefinition } from '@toolscout/core'
import { toAnthropicTool } from '@toolscout/client'
import { SEARCH_TOOL_DEFINITION } from '@toolscout/core'

/**
 * Counts the input tokens a request carrying these tools costs
 */
export type TokenCounter = (tools: ToolDefinition[]) => Promise<number>

export interface SearchSetupCost {
  k: number
  tokens: number
  /** Fraction of the baseline saved, 0 when the baseline is empty */
  savings: number
}

export interface SavingsRow {
  toolCount: number
  baseline: number
  setups: SearchSetupCost[]
}

export interface SavingsReport {
  counter: string
  rows: SavingsRow[]
}

/**
 * Subset of the Anthropic client used for token counting
 */
export interface TokenCountingClient {
  messages: {
    countTokens(params: {
      model: string
      messages: AnthropicMessageParam[]
      tools?: AnthropicTool[]
    }): Promise<{ input_tokens: number }>
  }
}

const COUNT_MESSAGES: AnthropicMessageParam[] = [{ role: 'user', content: 'Hello' }]

/**
 * Compare sending the first `n` tools against sending the search tool plus
 * `k` of them, for every `n` in `toolCounts` and `k` in `ks`.
 */
export async function measureSavings(
  tools: ToolDefinition[],
  counter: TokenCounter,
  toolCounts: number[],
  ks: number[],
): Promise<SavingsRow[]> {
  const rows: SavingsRow[] = []

  for (const toolCount of toolCounts) {
    if (toolCount > tools.length) {
      throw new Error(`Cannot measure ${toolCount} tools: only ${tools.length} loaded`)
    }

    const subset = tools.slice(0, toolCount)
    const baseline = await counter(subset)
    const setups: SearchSetupCost[] = []

    for (const k of ks) {
      const tokens = await counter([SEARCH_TOOL_DEFINITION, ...subset.slice(0, k)])
      setups.push({ k, tokens, savings: baseline > 0 ? 1 - tokens / baseline : 0 })
    }

    rows.push({ toolCount, baseline, setups })
  }

  return rows
}

/**
 * Count with the provider's token counting endpoint
 */
export function createAnthropicCounter(client: TokenCountingClient, model: string): TokenCounter {
  return async (tools) => {
    const result = await client.messages.countTokens({
      model,
      messages: COUNT_MESSAGES,
      tools: tools.map(toAnthropicTool),
    })
    return result.input_tokens
  }
}

/**
 * Estimate from the serialized tool definitions at a fixed character ratio
 */
export function createApproximateCounter(charsPerToken = 4): TokenCounter {
  return async tools => Math.ceil(JSON.stringify(tools.map(toAnthropicTool)).length / charsPerToken)
}
