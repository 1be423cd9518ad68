export type { ProviderAdapter, ProviderName, ToolRequest } from './adapters/adapter.js'
export { AnthropicAdapter } from './adapters/anthropic.js'
export { OpenAIAdapter } from './adapters/openai.js'
export { collectTools, toAnthropicTool, toOpenAITool } from './adapters/tools.js'
export { AnthropicToolSearchClient } from './clients/anthropic.js'
export { DEFAULT_MAX_SEARCH_ROUNDS, ToolSearchClientBase } from './clients/base.js'
export type { ToolSearchClientOptions } from './clients/base.js'
export { OpenAIToolSearchClient } from './clients/openai.js'
export { send } from './interceptor.js'
export type { SearchSession } from './interceptor.js'
export type * from './types/anthropic.js'
export type * from './types/openai.js'
export { createDebugLogger, noopLogger } from './utils/debug.js'
export type { DebugLogger } from './utils/debug.js'
