import type { IndexedTool, ToolDefinition } from '../types/index.js'
import { tokenizeTool } from './tokenizer.js'

/**
 * Build searchable documents from tool definitions
 */
export class IndexBuilder {
  /**
   * Build indexed tools, one per definition, in input order
   */
  buildIndex(tools: ToolDefinition[]): IndexedTool[] {
    return tools.map(tool => this.buildIndexedTool(tool))
  }

  private buildIndexedTool(tool: ToolDefinition): IndexedTool {
    return {
      tool,
      tokens: tokenizeTool(tool),
    }
  }
}
