import type { ToolDefinition } from '../types/index.js'
import { getToolDescription, getToolName } from '../types/index.js'

/**
 * Reserved name of the search tool. Caller tools may not use it.
 */
export const SEARCH_TOOL_NAME = 'tool_search'

export const SEARCH_TOOL_DEFINITION: ToolDefinition = {
  name: SEARCH_TOOL_NAME,
  description:
    'Search for available tools by describing what you want to do. '
    + 'Use this before attempting to call a tool you haven\'t discovered yet. '
    + 'Returns the names and descriptions of matching tools which will then '
    + 'become available for you to use.',
  input_schema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description:
          'A natural language description of the action you want to perform. '
          + 'Be specific, e.g. \'send an email\' or \'get weather forecast\'.',
      },
    },
    required: ['query'],
  },
}

export const NO_MATCHING_TOOLS_MESSAGE = 'No matching tools found. Try a different search query.'

/**
 * Format the tools matched by one search call as model-readable text
 */
export function formatSearchResult(matchedTools: ToolDefinition[]): string {
  if (matchedTools.length === 0) {
    return NO_MATCHING_TOOLS_MESSAGE
  }

  const lines = ['Found the following tools:\n']
  for (const tool of matchedTools) {
    lines.push(`- **${getToolName(tool)}**: ${getToolDescription(tool)}`)
  }
  lines.push('\nThese tools are now available for you to use.')

  return lines.join('\n')
}

/**
 * Read the `query` argument of a search call. Anything unusable reads as an
 * empty query, which matches nothing.
 */
export function readSearchQuery(input: unknown): string {
  if (typeof input !== 'object' || input === null || !('query' in input)) {
    return ''
  }

  const query = input.query
  if (typeof query === 'string') {
    return query
  }
  if (typeof query === 'number' || typeof query === 'boolean') {
    return String(query)
  }
  return ''
}
