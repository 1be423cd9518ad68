import type { ToolDefinition } from '@toolscout/core'
import type { AnthropicContentBlock, AnthropicMessage } from '../src/types/anthropic.js'
import type { ChatCompletion, ChatCompletionMessageToolCall, ChatCompletionResponseToolCall } from '../src/types/openai.js'

export const TOOLS: ToolDefinition[] = [
  {
    name: 'get_weather',
    description: 'Get the current weather for a location',
    input_schema: {
      type: 'object',
      properties: {
        city: { type: 'string', description: 'City name' },
      },
      required: ['city'],
    },
  },
  {
    name: 'send_email',
    description: 'Send an email message to a recipient',
    input_schema: {
      type: 'object',
      properties: {
        to: { type: 'string', description: 'Email address' },
        body: { type: 'string', description: 'Email body' },
      },
    },
  },
  {
    name: 'list_files',
    description: 'List files in a directory',
    input_schema: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Directory path' },
      },
    },
  },
  {
    name: 'create_calendar_event',
    description: 'Create a new calendar event with a date and time',
    input_schema: {
      type: 'object',
      properties: {
        title: { type: 'string', description: 'Event title' },
        date: { type: 'string', description: 'Event date' },
      },
    },
  },
]

export const WEATHER_RESULT
  = 'Found the following tools:\n\n'
    + '- **get_weather**: Get the current weather for a location\n\n'
    + 'These tools are now available for you to use.'

export function anthropicMessage(id: string, content: AnthropicContentBlock[]): AnthropicMessage {
  const hasToolUse = content.some(block => block.type === 'tool_use')
  return { id, content, stop_reason: hasToolUse ? 'tool_use' : 'end_turn' }
}

export function anthropicSearch(id: string, query: string, toolUseId = 'toolu_search_1'): AnthropicMessage {
  return anthropicMessage(id, [
    { type: 'tool_use', id: toolUseId, name: 'tool_search', input: { query } },
  ])
}

export function anthropicText(id: string, text: string): AnthropicMessage {
  return anthropicMessage(id, [{ type: 'text', text }])
}

export function openaiToolCall(id: string, name: string, args: string): ChatCompletionMessageToolCall {
  return { id, type: 'function', function: { name, arguments: args } }
}

export function openaiCompletion(
  id: string,
  content: string | null,
  toolCalls?: ChatCompletionResponseToolCall[],
): ChatCompletion {
  return {
    id,
    choices: [{ message: toolCalls ? { content, tool_calls: toolCalls } : { content } }],
  }
}
