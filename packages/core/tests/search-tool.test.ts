import { describe, expect, test } from 'vitest'
import {
  formatSearchResult,
  NO_MATCHING_TOOLS_MESSAGE,
  readSearchQuery,
  SEARCH_TOOL_DEFINITION,
  SEARCH_TOOL_NAME,
} from '../src/search/search-tool.js'

describe('search tool descriptor', () => {
  test('should use the reserved name and require a string query', () => {
    expect(SEARCH_TOOL_DEFINITION.name).toBe(SEARCH_TOOL_NAME)
    expect(SEARCH_TOOL_NAME).toBe('tool_search')
    expect(SEARCH_TOOL_DEFINITION.input_schema).toMatchObject({
      type: 'object',
      properties: { query: { type: 'string' } },
      required: ['query'],
    })
  })

  test('should tell the model to search before using undiscovered tools', () => {
    expect(SEARCH_TOOL_DEFINITION.description).toContain('before attempting to call a tool you haven\'t discovered yet')
  })
})

describe('formatSearchResult', () => {
  test('should return the no-match message for an empty result', () => {
    expect(formatSearchResult([])).toBe(NO_MATCHING_TOOLS_MESSAGE)
    expect(NO_MATCHING_TOOLS_MESSAGE).toBe('No matching tools found. Try a different search query.')
  })

  test('should list each tool with its description', () => {
    const text = formatSearchResult([
      { name: 'get_weather', description: 'Get the current weather' },
      { name: 'ping' },
    ])

    expect(text).toBe(
      'Found the following tools:\n\n'
      + '- **get_weather**: Get the current weather\n'
      + '- **ping**: \n'
      + '\nThese tools are now available for you to use.',
    )
  })
})

describe('readSearchQuery', () => {
  test('should read a string query', () => {
    expect(readSearchQuery({ query: 'send email' })).toBe('send email')
  })

  test('should stringify scalar queries', () => {
    expect(readSearchQuery({ query: 42 })).toBe('42')
  })

  test('should read anything else as an empty query', () => {
    expect(readSearchQuery(undefined)).toBe('')
    expect(readSearchQuery('send email')).toBe('')
    expect(readSearchQuery({})).toBe('')
    expect(readSearchQuery({ query: ['a'] })).toBe('')
  })
})
