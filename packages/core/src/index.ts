// Core types
export * from './types/index.js'

// Errors
export {
  ToolDefinitionError,
  ToolIndexConfigError,
  ToolScoutError,
  UnsupportedRequestError,
} from './errors.js'
export type { ToolScoutErrorCode } from './errors.js'

// Index management
export {
  DEFAULT_TOP_K,
  fromMcpTool,
  IndexBuilder,
  jsonSchemaSchema,
  parseToolDefinition,
  splitIdentifier,
  tokenizeQuery,
  tokenizeText,
  tokenizeTool,
  ToolIndex,
  ToolLoader,
  toolDefinitionSchema,
} from './index/index.js'

// Search
export {
  BM25LScorer,
  DEFAULT_BM25_PARAMS,
  formatSearchResult,
  NO_MATCHING_TOOLS_MESSAGE,
  readSearchQuery,
  SEARCH_TOOL_DEFINITION,
  SEARCH_TOOL_NAME,
} from './search/index.js'
