export type { BM25Params, BM25Stats, ToolIndexOptions, ToolReference } from './search.js'
export type { IndexedTool, JsonSchema, ToolDefinition } from './tool.js'
export { getToolDescription, getToolName, getToolSchema } from './tool.js'
