import type { ToolDefinition, ToolIndex } from '@toolscout/core'
import type {
  AnthropicContentBlockParam,
  AnthropicMessage,
  AnthropicMessageParam,
  AnthropicMessageRequest,
  AnthropicMessagesClient,
  AnthropicTool,
  ToolResultBlockParam,
  ToolUseBlock,
} from '../types/anthropic.js'
import type { DebugLogger } from '../utils/debug.js'
import type { ProviderAdapter } from './adapter.js'
import { formatSearchResult, readSearchQuery, SEARCH_TOOL_NAME } from '@toolscout/core'
import { noopLogger } from '../utils/debug.js'
import { collectTools, toAnthropicTool } from './tools.js'

/**
 * Adapter for the Anthropic Messages API, where tool calls are `tool_use`
 * blocks inside the response's content list
 */
export class AnthropicAdapter<R extends AnthropicMessage = AnthropicMessage>
  implements ProviderAdapter<AnthropicMessagesClient<R>, AnthropicMessageRequest, R, ToolResultBlockParam> {
  readonly provider = 'anthropic'

  constructor(private readonly debug: DebugLogger = noopLogger) {}

  buildTools(index: ToolIndex, alwaysAvailable: ToolDefinition[], discovered: ReadonlySet<string>): AnthropicTool[] {
    return collectTools(index, alwaysAvailable, discovered).map(toAnthropicTool)
  }

  hasSearchCall(response: R): boolean {
    return toolUseBlocks(response).some(block => block.name === SEARCH_TOOL_NAME)
  }

  hasNonSearchToolCall(response: R): boolean {
    return toolUseBlocks(response).some(block => block.name !== SEARCH_TOOL_NAME)
  }

  processSearchCalls(response: R, index: ToolIndex, discovered: Set<string>): ToolResultBlockParam[] {
    const results: ToolResultBlockParam[] = []

    for (const block of toolUseBlocks(response)) {
      if (block.name !== SEARCH_TOOL_NAME)
        continue

      const query = readSearchQuery(block.input)
      const matchedNames = index.search(query)
      for (const name of matchedNames) {
        discovered.add(name)
      }
      this.debug(`Search '${query}' matched ${matchedNames.length > 0 ? matchedNames.join(', ') : 'nothing'}`)

      results.push({
        type: 'tool_result',
        tool_use_id: block.id,
        content: formatSearchResult(index.getTools(matchedNames)),
      })
    }

    return results
  }

  appendSearchRound(
    messages: AnthropicMessageParam[],
    response: R,
    searchResults: ToolResultBlockParam[],
  ): AnthropicMessageParam[] {
    return [
      ...messages,
      { role: 'assistant', content: toContentParams(response) },
      { role: 'user', content: searchResults },
    ]
  }

  call(client: AnthropicMessagesClient<R>, request: AnthropicMessageRequest): Promise<R> {
    return client.messages.create(request)
  }
}

function toolUseBlocks(response: AnthropicMessage): ToolUseBlock[] {
  return response.content.filter((block): block is ToolUseBlock => block.type === 'tool_use')
}

/**
 * Rebuild the assistant turn from response blocks, keeping text, tool calls
 * and thinking blocks verbatim. Server-side tool blocks and kinds this client
 * does not know are dropped.
 */
function toContentParams(response: AnthropicMessage): AnthropicContentBlockParam[] {
  return response.content.flatMap((block): AnthropicContentBlockParam[] => {
    switch (block.type) {
      case 'text':
        return [{ type: 'text', text: block.text }]
      case 'tool_use':
        return [{ type: 'tool_use', id: block.id, name: block.name, input: block.input }]
      case 'thinking':
        return [{ type: 'thinking', thinking: block.thinking, signature: block.signature }]
      case 'redacted_thinking':
        return [{ type: 'redacted_thinking', data: block.data }]
      default:
        return []
    }
  })
}
