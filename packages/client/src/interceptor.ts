import type { ToolDefinition, ToolIndex } from '@toolscout/core'
import type { ProviderAdapter, ToolRequest } from './adapters/adapter.js'
import type { DebugLogger } from './utils/debug.js'
import { ToolIndexConfigError } from '@toolscout/core'
import { noopLogger } from './utils/debug.js'

/**
 * Everything one send needs. `discovered` is mutated in place and outlives
 * the call; it belongs to the client wrapper that owns the conversation.
 */
export interface SearchSession<TClient, TRequest extends ToolRequest, TResponse, TResult> {
  client: TClient
  adapter: ProviderAdapter<TClient, TRequest, TResponse, TResult>
  index: ToolIndex
  alwaysAvailable: ToolDefinition[]
  discovered: Set<string>
  maxSearchRounds: number
  debug?: DebugLogger
}

/**
 * Send a request, intercepting search-tool calls.
 *
 * Each round builds the tool list from the current discovered set and makes
 * one provider call. The response is returned as soon as it has no search
 * call, or has a search call next to any other tool call (the searches still
 * run and grow the discovered set, but their results are not sent back). A
 * search-only response is answered with the search results and the loop goes
 * on. When the round budget runs out the last response is returned as is.
 *
 * Provider errors propagate untouched; nothing is retried.
 */
export async function send<TClient, TRequest extends ToolRequest, TResponse, TResult>(
  session: SearchSession<TClient, TRequest, TResponse, TResult>,
  request: TRequest,
): Promise<TResponse> {
  const { adapter, index, alwaysAvailable, discovered, maxSearchRounds } = session
  const debug = session.debug ?? noopLogger

  if (!Number.isInteger(maxSearchRounds) || maxSearchRounds < 1) {
    throw new ToolIndexConfigError(`maxSearchRounds must be a positive integer, got ${maxSearchRounds}`)
  }

  let messages: TRequest['messages'] = request.messages

  for (let round = 1; ; round++) {
    const tools = adapter.buildTools(index, alwaysAvailable, discovered)
    debug(`Round ${round}/${maxSearchRounds}: sending ${tools.length} tools`)

    const response = await adapter.call(session.client, { ...request, messages, tools })

    if (!adapter.hasSearchCall(response)) {
      debug(`Round ${round}: no search call, returning response`)
      return response
    }

    if (adapter.hasNonSearchToolCall(response)) {
      adapter.processSearchCalls(response, index, discovered)
      debug(`Round ${round}: search mixed with other tool calls, returning response`)
      return response
    }

    const searchResults = adapter.processSearchCalls(response, index, discovered)

    if (round >= maxSearchRounds) {
      debug(`Search budget of ${maxSearchRounds} rounds exhausted, returning unresolved response`)
      return response
    }

    messages = adapter.appendSearchRound(messages, response, searchResults)
  }
}
