import type { JsonSchema, ToolDefinition } from '../types/index.js'
import { getToolDescription, getToolName, getToolSchema } from '../types/index.js'

/**
 * Extract searchable tokens from a tool definition.
 *
 * Pulls text from the tool name, description and parameter schema (property
 * names, property descriptions, string enum values). Duplicates are kept since
 * term frequency feeds the ranking.
 */
export function tokenizeTool(tool: ToolDefinition): string[] {
  const tokens: string[] = []

  tokens.push(...splitIdentifier(getToolName(tool)))
  tokens.push(...tokenizeText(getToolDescription(tool)))
  walkSchema(getToolSchema(tool), tokens)

  return tokens
}

/**
 * Tokenize a free-text search query
 */
export function tokenizeQuery(query: string): string[] {
  return tokenizeText(query)
}

/**
 * Split identifier names (camelCase, snake_case, kebab-case) into lowercase words
 */
export function splitIdentifier(name: string): string[] {
  const tokens: string[] = []

  for (const part of name.split(/[_-]+/)) {
    const words = part
      // Split camelCase
      .replace(/([a-z])([A-Z])/g, '$1 $2')
      .split(/\s+/)

    for (const word of words) {
      const lower = word.toLowerCase()
      if (lower) {
        tokens.push(lower)
      }
    }
  }

  return tokens
}

/**
 * Lowercase and split on runs of non-alphanumeric characters.
 * No stop words, no stemming.
 */
export function tokenizeText(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean)
}

function walkSchema(schema: JsonSchema, tokens: string[]): void {
  if (!schema.properties) {
    return
  }

  for (const [propName, propSchema] of Object.entries(schema.properties)) {
    tokens.push(...splitIdentifier(propName))

    if (typeof propSchema.description === 'string') {
      tokens.push(...tokenizeText(propSchema.description))
    }

    if (Array.isArray(propSchema.enum)) {
      for (const value of propSchema.enum) {
        if (typeof value === 'string') {
          tokens.push(...tokenizeText(value))
        }
      }
    }

    // Nested objects
    if (propSchema.type === 'object') {
      walkSchema(propSchema, tokens)
    }

    // Array items, only when the item schema is itself an object
    const items = propSchema.items
    if (items && !Array.isArray(items) && items.type === 'object') {
      walkSchema(items, tokens)
    }
  }
}
