import type { ToolDefinition, ToolIndex } from '@toolscout/core'
import type {
  ChatCompletion,
  ChatCompletionAssistantMessageParam,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionRequest,
  ChatCompletionResponseToolCall,
  ChatCompletionsClient,
  ChatCompletionTool,
  ChatCompletionToolMessageParam,
} from '../types/openai.js'
import type { DebugLogger } from '../utils/debug.js'
import type { ProviderAdapter } from './adapter.js'
import { formatSearchResult, readSearchQuery, SEARCH_TOOL_NAME } from '@toolscout/core'
import { noopLogger } from '../utils/debug.js'
import { collectTools, toOpenAITool } from './tools.js'

/**
 * Adapter for OpenAI-compatible Chat Completions APIs, where the message
 * carries an optional text body and a separate `tool_calls` list
 */
export class OpenAIAdapter<R extends ChatCompletion = ChatCompletion>
  implements ProviderAdapter<ChatCompletionsClient<R>, ChatCompletionRequest, R, ChatCompletionToolMessageParam> {
  readonly provider = 'openai'

  constructor(private readonly debug: DebugLogger = noopLogger) {}

  buildTools(index: ToolIndex, alwaysAvailable: ToolDefinition[], discovered: ReadonlySet<string>): ChatCompletionTool[] {
    return collectTools(index, alwaysAvailable, discovered).map(toOpenAITool)
  }

  hasSearchCall(response: R): boolean {
    return getToolCalls(response).some(call => call.function.name === SEARCH_TOOL_NAME)
  }

  hasNonSearchToolCall(response: R): boolean {
    return getToolCalls(response).some(call => call.function.name !== SEARCH_TOOL_NAME)
  }

  processSearchCalls(response: R, index: ToolIndex, discovered: Set<string>): ChatCompletionToolMessageParam[] {
    const results: ChatCompletionToolMessageParam[] = []

    for (const call of getToolCalls(response)) {
      if (call.function.name !== SEARCH_TOOL_NAME)
        continue

      const query = readSearchQuery(this.parseArguments(call))
      const matchedNames = index.search(query)
      for (const name of matchedNames) {
        discovered.add(name)
      }
      this.debug(`Search '${query}' matched ${matchedNames.length > 0 ? matchedNames.join(', ') : 'nothing'}`)

      results.push({
        role: 'tool',
        tool_call_id: call.id,
        content: formatSearchResult(index.getTools(matchedNames)),
      })
    }

    return results
  }

  appendSearchRound(
    messages: ChatCompletionMessageParam[],
    response: R,
    searchResults: ChatCompletionToolMessageParam[],
  ): ChatCompletionMessageParam[] {
    const message = response.choices[0]?.message
    const assistant: ChatCompletionAssistantMessageParam = {
      role: 'assistant',
      content: message?.content ?? '',
    }

    if (message?.tool_calls && message.tool_calls.length > 0) {
      assistant.tool_calls = message.tool_calls.map((call): ChatCompletionMessageToolCall => ({
        id: call.id,
        type: 'function',
        function: {
          name: call.function.name,
          arguments: encodeArguments(call.function.arguments),
        },
      }))
    }

    return [...messages, assistant, ...searchResults]
  }

  call(client: ChatCompletionsClient<R>, request: ChatCompletionRequest): Promise<R> {
    return client.chat.completions.create(request)
  }

  /**
   * Arguments usually arrive JSON-encoded; malformed JSON reads as no
   * arguments. Already decoded arguments are used as they are.
   */
  private parseArguments(call: ChatCompletionResponseToolCall): unknown {
    if (typeof call.function.arguments !== 'string') {
      return call.function.arguments
    }

    try {
      return JSON.parse(call.function.arguments)
    }
    catch (error) {
      this.debug(`Ignoring malformed arguments for ${call.id}: ${error instanceof Error ? error.message : String(error)}`)
      return undefined
    }
  }
}

/**
 * Tool calls of the first choice
 */
function getToolCalls(response: ChatCompletion): ChatCompletionResponseToolCall[] {
  return response.choices[0]?.message.tool_calls ?? []
}

/**
 * The assistant message sent back must carry JSON-encoded arguments
 */
function encodeArguments(args: string | Record<string, unknown>): string {
  return typeof args === 'string' ? args : JSON.stringify(args)
}
