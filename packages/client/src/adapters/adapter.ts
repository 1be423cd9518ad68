import type { ToolDefinition, ToolIndex } from '@toolscout/core'

/**
 * Minimal request shape the round loop works with
 */
export interface ToolRequest {
  messages: unknown[]
  tools?: unknown[]
}

export type ProviderName = 'anthropic' | 'openai'

/**
 * Provider-specific handling of one tool-calling wire convention.
 *
 * The round loop only talks to this interface; nothing else knows which
 * provider is in use.
 */
export interface ProviderAdapter<TClient, TRequest extends ToolRequest, TResponse, TResult> {
  readonly provider: ProviderName

  /**
   * Search tool first, then always-available tools, then discovered tools
   * sorted by name, in the provider's tool format
   */
  buildTools: (
    index: ToolIndex,
    alwaysAvailable: ToolDefinition[],
    discovered: ReadonlySet<string>,
  ) => NonNullable<TRequest['tools']>

  /**
   * At least one call names the search tool
   */
  hasSearchCall: (response: TResponse) => boolean

  /**
   * At least one call names something other than the search tool
   */
  hasNonSearchToolCall: (response: TResponse) => boolean

  /**
   * Run every search call against the index, add the matches to `discovered`
   * and return one result entry per call
   */
  processSearchCalls: (response: TResponse, index: ToolIndex, discovered: Set<string>) => TResult[]

  /**
   * Append the assistant turn and the search results, returning a new list
   */
  appendSearchRound: (
    messages: TRequest['messages'],
    response: TResponse,
    searchResults: TResult[],
  ) => TRequest['messages']

  /**
   * Delegate to the provider, unmodified
   */
  call: (client: TClient, request: TRequest) => Promise<TResponse>
}
