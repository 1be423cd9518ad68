/**
 * MCP client for fetching tool definitions from a stdio server
 */

import type { ToolDefinition } from '@toolscout/core'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js'
import { fromMcpTool } from '@toolscout/core'

/**
 * Split a command line on whitespace into the executable and its arguments
 */
export function parseCommandLine(commandLine: string): { command: string, args: string[] } {
  const [command, ...args] = commandLine.trim().split(/\s+/).filter(Boolean)
  if (!command) {
    throw new Error('MCP server command must not be empty')
  }
  return { command, args }
}

/**
 * Start an MCP server over stdio, list its tools and shut it down
 */
export async function fetchToolsFromMcpServer(commandLine: string): Promise<ToolDefinition[]> {
  const { command, args } = parseCommandLine(commandLine)

  const client = new Client(
    { name: 'toolscout', version: '0.1.0' },
    { capabilities: {} },
  )

  const transport = new StdioClientTransport({ command, args })

  try {
    await client.connect(transport)
    const response = await client.listTools()
    return response.tools.map(fromMcpTool)
  }
  finally {
    await client.close()
  }
}
