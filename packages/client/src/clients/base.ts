import type { BM25Params, ToolDefinition } from '@toolscout/core'
import type { DebugLogger } from '../utils/debug.js'
import { getToolName, SEARCH_TOOL_NAME, ToolIndex, ToolIndexConfigError, UnsupportedRequestError } from '@toolscout/core'
import { createDebugLogger } from '../utils/debug.js'

export const DEFAULT_MAX_SEARCH_ROUNDS = 3

/**
 * Client wrapper options
 */
export interface ToolSearchClientOptions {
  /** Maximum tools returned per search (default: 5) */
  topK?: number
  /** Names of tools sent on every request and never searched */
  alwaysAvailable?: string[]
  /** Maximum provider calls per send (default: 3) */
  maxSearchRounds?: number
  bm25?: Partial<BM25Params>
  /** `true` logs round decisions to stderr; a function receives them instead */
  debug?: boolean | DebugLogger
}

/**
 * Conversation-scoped state shared by the provider wrappers.
 *
 * The discovered set grows across sends until {@link resetDiscoveries}. It is
 * not locked: run concurrent conversations on separate instances.
 */
export abstract class ToolSearchClientBase<TClient> {
  readonly index: ToolIndex

  protected readonly client: TClient
  protected readonly alwaysAvailable: ToolDefinition[]
  protected readonly discovered = new Set<string>()
  protected readonly maxSearchRounds: number
  protected readonly debug: DebugLogger

  constructor(client: TClient, tools: ToolDefinition[], options?: ToolSearchClientOptions) {
    validateToolNames(tools)

    const maxSearchRounds = options?.maxSearchRounds ?? DEFAULT_MAX_SEARCH_ROUNDS
    if (!Number.isInteger(maxSearchRounds) || maxSearchRounds < 1) {
      throw new ToolIndexConfigError(`maxSearchRounds must be a positive integer, got ${maxSearchRounds}`)
    }

    const [searchable, alwaysAvailable] = splitTools(tools, options?.alwaysAvailable ?? [])
    if (searchable.length === 0) {
      throw new ToolIndexConfigError('No searchable tools provided.')
    }

    this.client = client
    this.alwaysAvailable = alwaysAvailable
    this.maxSearchRounds = maxSearchRounds
    this.index = new ToolIndex(searchable, { topK: options?.topK, bm25: options?.bm25 })

    const debug = options?.debug ?? false
    this.debug = typeof debug === 'function' ? debug : createDebugLogger(debug)
  }

  /**
   * The wrapped provider client
   */
  get inner(): TClient {
    return this.client
  }

  /**
   * Names surfaced by search so far in this conversation
   */
  get discoveredTools(): ReadonlySet<string> {
    return this.discovered
  }

  get alwaysAvailableTools(): ToolDefinition[] {
    return [...this.alwaysAvailable]
  }

  /**
   * Clear discovered tools. Call this when starting a new conversation.
   */
  resetDiscoveries(): void {
    this.discovered.clear()
  }

  protected assertNotStreaming(stream: boolean | undefined): void {
    if (stream) {
      throw new UnsupportedRequestError(
        `Streaming is not supported by ${this.constructor.name}. Pass stream: false or omit it.`,
      )
    }
  }
}

function validateToolNames(tools: ToolDefinition[]): void {
  const seen = new Set<string>()

  for (const tool of tools) {
    const name = getToolName(tool)
    if (name === SEARCH_TOOL_NAME) {
      throw new ToolIndexConfigError(
        `Tool name '${SEARCH_TOOL_NAME}' is reserved for the search tool. Please rename your tool.`,
      )
    }
    if (seen.has(name)) {
      throw new ToolIndexConfigError(`Duplicate tool name: '${name}'`)
    }
    seen.add(name)
  }
}

/**
 * Split into [searchable, always available], both in input order.
 * Always-available names that match no tool are ignored.
 */
function splitTools(tools: ToolDefinition[], alwaysNames: string[]): [ToolDefinition[], ToolDefinition[]] {
  const alwaysSet = new Set(alwaysNames)
  const always: ToolDefinition[] = []
  const searchable: ToolDefinition[] = []

  for (const tool of tools) {
    if (alwaysSet.has(getToolName(tool))) {
      always.push(tool)
    }
    else {
      searchable.push(tool)
    }
  }

  return [searchable, always]
}
