import type { Tool } from '@modelcontextprotocol/sdk/types.js'
import type { ToolDefinition, ToolIndexOptions, ToolReference } from '../types/index.js'
import { ToolIndexConfigError } from '../errors.js'
import { BM25LScorer } from '../search/bm25l.js'
import { getToolDescription, getToolName } from '../types/index.js'
import { IndexBuilder } from './builder.js'
import { fromMcpTool } from './mcp.js'
import { tokenizeQuery } from './tokenizer.js'

export const DEFAULT_TOP_K = 5

/**
 * Read-only relevance index over a fixed set of tool definitions.
 *
 * Corpus order is the input order and is used to break score ties.
 */
export class ToolIndex {
  readonly topK: number

  private readonly tools: ToolDefinition[]
  private readonly toolsByName = new Map<string, ToolDefinition>()
  private readonly scorer: BM25LScorer

  constructor(tools: ToolDefinition[], options?: ToolIndexOptions) {
    if (tools.length === 0) {
      throw new ToolIndexConfigError('tools must not be empty')
    }

    const topK = options?.topK ?? DEFAULT_TOP_K
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ToolIndexConfigError(`topK must be a positive integer, got ${topK}`)
    }

    for (const tool of tools) {
      const name = getToolName(tool)
      if (this.toolsByName.has(name)) {
        throw new ToolIndexConfigError(`Duplicate tool name: '${name}'`)
      }
      this.toolsByName.set(name, tool)
    }

    const indexed = new IndexBuilder().buildIndex(tools)

    this.tools = [...tools]
    this.scorer = new BM25LScorer(indexed.map(t => t.tokens), options?.bm25)
    this.topK = topK
  }

  /**
   * Create an index from MCP SDK `Tool` objects
   */
  static fromMcp(tools: Tool[], options?: ToolIndexOptions): ToolIndex {
    return new ToolIndex(tools.map(fromMcpTool), options)
  }

  /**
   * All indexed tool names, in corpus order
   */
  get toolNames(): string[] {
    return this.tools.map(getToolName)
  }

  get size(): number {
    return this.tools.length
  }

  /**
   * Return up to `topK` tool names ranked by relevance.
   * Only tools with a positive score are returned.
   */
  search(query: string): string[] {
    return this.rank(query).map(ref => ref.name)
  }

  /**
   * Same ordering as {@link search}, with descriptions and scores
   */
  rank(query: string): ToolReference[] {
    const queryTokens = tokenizeQuery(query)

    if (queryTokens.length === 0) {
      return []
    }

    const scores = this.scorer.getScores(queryTokens)
    const results: ToolReference[] = []

    scores.forEach((score, i) => {
      if (score > 0) {
        const tool = this.tools[i]
        results.push({
          name: getToolName(tool),
          description: getToolDescription(tool),
          score,
        })
      }
    })

    // Array.prototype.sort is stable, so equal scores keep corpus order
    return results.sort((a, b) => b.score - a.score).slice(0, this.topK)
  }

  /**
   * Full definitions for the given names, in the requested order.
   * Unknown names are silently skipped.
   */
  getTools(names: Iterable<string>): ToolDefinition[] {
    const tools: ToolDefinition[] = []
    for (const name of names) {
      const tool = this.toolsByName.get(name)
      if (tool) {
        tools.push(tool)
      }
    }
    return tools
  }

  getTool(name: string): ToolDefinition | undefined {
    return this.toolsByName.get(name)
  }
}
