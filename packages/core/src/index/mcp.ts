import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import type { ToolDefinition } from '../types/index.js'
import { parseToolDefinition } from './validation.js'

/**
 * Convert an MCP SDK `Tool` to a tool definition using the `input_schema` key
 */
export function fromMcpTool(tool: Tool): ToolDefinition {
  return parseToolDefinition(
    {
      name: tool.name,
      description: tool.description ?? '',
      input_schema: tool.inputSchema,
    },
    `MCP tool '${tool.name}'`,
  )
}
