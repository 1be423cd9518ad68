import type { ToolDefinition, ToolIndex } from '@toolscout/core'
import type { AnthropicTool } from '../types/anthropic.js'
import type { ChatCompletionTool } from '../types/openai.js'
import { getToolDescription, getToolName, getToolSchema, SEARCH_TOOL_DEFINITION } from '@toolscout/core'

/**
 * Outbound tool order: search tool, always-available tools, then discovered
 * tools sorted by name
 */
export function collectTools(
  index: ToolIndex,
  alwaysAvailable: ToolDefinition[],
  discovered: ReadonlySet<string>,
): ToolDefinition[] {
  return [
    SEARCH_TOOL_DEFINITION,
    ...alwaysAvailable,
    ...index.getTools([...discovered].sort()),
  ]
}

export function toAnthropicTool(tool: ToolDefinition): AnthropicTool {
  return {
    name: getToolName(tool),
    description: getToolDescription(tool),
    input_schema: { ...getToolSchema(tool), type: 'object' },
  }
}

export function toOpenAITool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: getToolName(tool),
      description: getToolDescription(tool),
      parameters: { ...getToolSchema(tool) },
    },
  }
}
