export { IndexBuilder } from './builder.js'
export { ToolLoader } from './loader.js'
export { fromMcpTool } from './mcp.js'
export { splitIdentifier, tokenizeQuery, tokenizeText, tokenizeTool } from './tokenizer.js'
export { DEFAULT_TOP_K, ToolIndex } from './tool-index.js'
export { jsonSchemaSchema, parseToolDefinition, toolDefinitionSchema } from './validation.js'
