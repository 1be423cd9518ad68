import type { AnthropicMessageParam } from '../src/types/anthropic.js'
import { NO_MATCHING_TOOLS_MESSAGE, ToolIndex } from '@toolscout/core'
import { describe, expect, test, vi } from 'vitest'
import { AnthropicAdapter } from '../src/adapters/anthropic.js'
import { anthropicMessage, anthropicSearch, anthropicText, TOOLS, WEATHER_RESULT } from './fixtures.js'

describe('AnthropicAdapter', () => {
  const index = new ToolIndex(TOOLS, { topK: 1 })

  describe('buildTools', () => {
    test('should put the search tool first, then always-available, then discovered by name', () => {
      const adapter = new AnthropicAdapter()
      const always = [{ name: 'ping', description: 'Ping' }]

      const tools = adapter.buildTools(index, always, new Set(['send_email', 'create_calendar_event']))

      expect(tools.map(tool => tool.name)).toEqual([
        'tool_search',
        'ping',
        'create_calendar_event',
        'send_email',
      ])
    })

    test('should force an object input schema', () => {
      const adapter = new AnthropicAdapter()

      const [, ping] = adapter.buildTools(index, [{ name: 'ping' }], new Set())

      expect(ping).toEqual({ name: 'ping', description: '', input_schema: { type: 'object' } })
    })
  })

  describe('call detection', () => {
    const adapter = new AnthropicAdapter()

    test('should detect search and other tool calls', () => {
      const mixed = anthropicMessage('msg_1', [
        { type: 'tool_use', id: 'toolu_1', name: 'tool_search', input: { query: 'email' } },
        { type: 'tool_use', id: 'toolu_2', name: 'get_weather', input: { city: 'Oslo' } },
      ])

      expect(adapter.hasSearchCall(mixed)).toBe(true)
      expect(adapter.hasNonSearchToolCall(mixed)).toBe(true)
      expect(adapter.hasSearchCall(anthropicText('msg_2', 'Hi'))).toBe(false)
      expect(adapter.hasNonSearchToolCall(anthropicSearch('msg_3', 'email'))).toBe(false)
    })
  })

  describe('processSearchCalls', () => {
    test('should answer each search call and record the matches', () => {
      const adapter = new AnthropicAdapter()
      const discovered = new Set<string>()
      const response = anthropicMessage('msg_1', [
        { type: 'tool_use', id: 'toolu_1', name: 'tool_search', input: { query: 'weather' } },
        { type: 'tool_use', id: 'toolu_2', name: 'tool_search', input: { query: 'xyznonexistent' } },
      ])

      const results = adapter.processSearchCalls(response, index, discovered)

      expect(results).toEqual([
        { type: 'tool_result', tool_use_id: 'toolu_1', content: WEATHER_RESULT },
        { type: 'tool_result', tool_use_id: 'toolu_2', content: NO_MATCHING_TOOLS_MESSAGE },
      ])
      expect([...discovered]).toEqual(['get_weather'])
    })

    test('should treat a missing query as empty', () => {
      const adapter = new AnthropicAdapter()
      const response = anthropicMessage('msg_1', [
        { type: 'tool_use', id: 'toolu_1', name: 'tool_search', input: {} },
      ])

      const [result] = adapter.processSearchCalls(response, index, new Set())

      expect(result?.content).toBe(NO_MATCHING_TOOLS_MESSAGE)
    })

    test('should log each search through the debug sink', () => {
      const debug = vi.fn<(message: string) => void>()
      const adapter = new AnthropicAdapter(debug)

      adapter.processSearchCalls(anthropicSearch('msg_1', 'weather'), index, new Set())

      expect(debug).toHaveBeenCalledWith('Search \'weather\' matched get_weather')
    })
  })

  describe('appendSearchRound', () => {
    test('should append the assistant turn and a user turn of results', () => {
      const adapter = new AnthropicAdapter()
      const messages: AnthropicMessageParam[] = [{ role: 'user', content: 'Weather in Oslo?' }]
      const response = anthropicMessage('msg_1', [
        { type: 'thinking', thinking: 'I need a weather tool', signature: 'sig-placeholder' },
        { type: 'redacted_thinking', data: 'redacted-placeholder' },
        { type: 'text', text: 'Let me look.' },
        { type: 'tool_use', id: 'toolu_1', name: 'tool_search', input: { query: 'weather' } },
      ])
      const results = adapter.processSearchCalls(response, index, new Set())

      const next = adapter.appendSearchRound(messages, response, results)

      expect(next).toEqual([
        { role: 'user', content: 'Weather in Oslo?' },
        {
          role: 'assistant',
          content: [
            { type: 'thinking', thinking: 'I need a weather tool', signature: 'sig-placeholder' },
            { type: 'redacted_thinking', data: 'redacted-placeholder' },
            { type: 'text', text: 'Let me look.' },
            { type: 'tool_use', id: 'toolu_1', name: 'tool_search', input: { query: 'weather' } },
          ],
        },
        {
          role: 'user',
          content: [{ type: 'tool_result', tool_use_id: 'toolu_1', content: WEATHER_RESULT }],
        },
      ])
      expect(messages).toHaveLength(1)
    })

    test('should drop server-side tool blocks from the replayed assistant turn', () => {
      const adapter = new AnthropicAdapter()
      const response = anthropicMessage('msg_1', [
        { type: 'server_tool_use', id: 'srvtoolu_1', name: 'web_search', input: { query: 'oslo' } },
        { type: 'web_search_tool_result', tool_use_id: 'srvtoolu_1', content: [] },
        { type: 'tool_use', id: 'toolu_1', name: 'tool_search', input: { query: 'weather' } },
      ])
      const results = adapter.processSearchCalls(response, index, new Set())

      const next = adapter.appendSearchRound([], response, results)

      expect(adapter.hasNonSearchToolCall(response)).toBe(false)
      expect(next[0]).toEqual({
        role: 'assistant',
        content: [{ type: 'tool_use', id: 'toolu_1', name: 'tool_search', input: { query: 'weather' } }],
      })
    })
  })
})
