export { BM25LScorer, DEFAULT_BM25_PARAMS } from './bm25l.js'
export {
  formatSearchResult,
  NO_MATCHING_TOOLS_MESSAGE,
  readSearchQuery,
  SEARCH_TOOL_DEFINITION,
  SEARCH_TOOL_NAME,
} from './search-tool.js'
