import type { ChatCompletionMessageParam } from '../src/types/openai.js'
import { NO_MATCHING_TOOLS_MESSAGE, ToolIndex } from '@toolscout/core'
import { describe, expect, test } from 'vitest'
import { OpenAIAdapter } from '../src/adapters/openai.js'
import { openaiCompletion, openaiToolCall, TOOLS, WEATHER_RESULT } from './fixtures.js'

describe('OpenAIAdapter', () => {
  const index = new ToolIndex(TOOLS, { topK: 1 })

  test('should convert tools to function definitions', () => {
    const adapter = new OpenAIAdapter()

    const tools = adapter.buildTools(index, [], new Set(['get_weather']))

    expect(tools.map(tool => tool.function.name)).toEqual(['tool_search', 'get_weather'])
    expect(tools[1]).toEqual({
      type: 'function',
      function: {
        name: 'get_weather',
        description: 'Get the current weather for a location',
        parameters: {
          type: 'object',
          properties: {
            city: { type: 'string', description: 'City name' },
          },
          required: ['city'],
        },
      },
    })
  })

  test('should read tool calls from the first choice only', () => {
    const adapter = new OpenAIAdapter()
    const response = {
      id: 'chatcmpl-1',
      choices: [
        { message: { content: 'No tools here' } },
        { message: { content: null, tool_calls: [openaiToolCall('call_1', 'tool_search', '{"query":"weather"}')] } },
      ],
    }

    expect(adapter.hasSearchCall(response)).toBe(false)
  })

  test('should treat a response without choices as having no calls', () => {
    const adapter = new OpenAIAdapter()

    expect(adapter.hasSearchCall({ id: 'chatcmpl-1', choices: [] })).toBe(false)
  })

  test('should decode arguments and answer each search call', () => {
    const adapter = new OpenAIAdapter()
    const discovered = new Set<string>()
    const response = openaiCompletion('chatcmpl-1', null, [
      openaiToolCall('call_1', 'tool_search', '{"query":"weather"}'),
    ])

    const results = adapter.processSearchCalls(response, index, discovered)

    expect(results).toEqual([{ role: 'tool', tool_call_id: 'call_1', content: WEATHER_RESULT }])
    expect([...discovered]).toEqual(['get_weather'])
  })

  test('should read malformed arguments as an empty query', () => {
    const adapter = new OpenAIAdapter()
    const discovered = new Set<string>()
    const response = openaiCompletion('chatcmpl-1', null, [
      openaiToolCall('call_1', 'tool_search', '{"query": weather'),
    ])

    const results = adapter.processSearchCalls(response, index, discovered)

    expect(results).toEqual([{ role: 'tool', tool_call_id: 'call_1', content: NO_MATCHING_TOOLS_MESSAGE }])
    expect(discovered.size).toBe(0)
  })

  test('should use arguments that arrive already decoded', () => {
    const adapter = new OpenAIAdapter()
    const discovered = new Set<string>()
    const response = openaiCompletion('chatcmpl-1', null, [
      { id: 'call_1', type: 'function', function: { name: 'tool_search', arguments: { query: 'weather' } } },
    ])

    const results = adapter.processSearchCalls(response, index, discovered)
    const next = adapter.appendSearchRound([], response, results)

    expect(results).toEqual([{ role: 'tool', tool_call_id: 'call_1', content: WEATHER_RESULT }])
    expect([...discovered]).toEqual(['get_weather'])
    expect(next[0]).toEqual({
      role: 'assistant',
      content: '',
      tool_calls: [openaiToolCall('call_1', 'tool_search', '{"query":"weather"}')],
    })
  })

  test('should append the assistant message and one tool message per result', () => {
    const adapter = new OpenAIAdapter()
    const messages: ChatCompletionMessageParam[] = [{ role: 'user', content: 'Weather in Oslo?' }]
    const response = openaiCompletion('chatcmpl-1', null, [
      openaiToolCall('call_1', 'tool_search', '{"query":"weather"}'),
      openaiToolCall('call_2', 'tool_search', '{"query":"xyznonexistent"}'),
    ])
    const results = adapter.processSearchCalls(response, index, new Set())

    const next = adapter.appendSearchRound(messages, response, results)

    expect(next).toEqual([
      { role: 'user', content: 'Weather in Oslo?' },
      {
        role: 'assistant',
        content: '',
        tool_calls: [
          openaiToolCall('call_1', 'tool_search', '{"query":"weather"}'),
          openaiToolCall('call_2', 'tool_search', '{"query":"xyznonexistent"}'),
        ],
      },
      { role: 'tool', tool_call_id: 'call_1', content: WEATHER_RESULT },
      { role: 'tool', tool_call_id: 'call_2', content: NO_MATCHING_TOOLS_MESSAGE },
    ])
  })
})
