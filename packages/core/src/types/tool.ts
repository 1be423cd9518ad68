/**
 * JSON Schema representation for tool parameters
 */
export interface JsonSchema {
  type?: string | string[]
  properties?: Record<string, JsonSchema>
  required?: string[]
  description?: string
  items?: JsonSchema | JsonSchema[]
  enum?: unknown[]
  [key: string]: unknown
}

/**
 * Tool definition as accepted from callers.
 *
 * Both schema key conventions are accepted: `inputSchema` (MCP) and
 * `input_schema` (Anthropic). Read them through {@link getToolSchema} only.
 */
export interface ToolDefinition {
  name: string
  description?: string
  inputSchema?: JsonSchema
  input_schema?: JsonSchema
}

/**
 * Tool with its precomputed search tokens
 */
export interface IndexedTool {
  tool: ToolDefinition
  tokens: string[]
}

export function getToolName(tool: ToolDefinition): string {
  return tool.name
}

export function getToolDescription(tool: ToolDefinition): string {
  return tool.description ?? ''
}

/**
 * Parameter schema of a tool. `inputSchema` wins when both keys are present.
 */
export function getToolSchema(tool: ToolDefinition): JsonSchema {
  return tool.inputSchema ?? tool.input_schema ?? {}
}
