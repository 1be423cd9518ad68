/**
 * Anthropic Messages API shapes, limited to the fields the search loop reads
 * or writes plus the request options callers pass through. The official
 * `@anthropic-ai/sdk` types are structurally compatible with them.
 */

export type AnthropicInputSchema = {
  type: 'object'
  properties?: unknown
  required?: string[]
  [key: string]: unknown
}

export interface AnthropicTool {
  name: string
  description?: string
  input_schema: AnthropicInputSchema
}

// Response content blocks

export interface TextBlock {
  type: 'text'
  text: string
}

export interface ToolUseBlock {
  type: 'tool_use'
  id: string
  name: string
  input: unknown
}

export interface ThinkingBlock {
  type: 'thinking'
  thinking: string
  signature: string
}

export interface RedactedThinkingBlock {
  type: 'redacted_thinking'
  data: string
}

/**
 * Call to a tool the provider runs itself, such as web search
 */
export interface ServerToolUseBlock {
  type: 'server_tool_use'
  id: string
  name: string
  input: unknown
}

export interface WebSearchToolResultBlock {
  type: 'web_search_tool_result'
  tool_use_id: string
  content: unknown
}

export type AnthropicContentBlock
  = | TextBlock
    | ToolUseBlock
    | ThinkingBlock
    | RedactedThinkingBlock
    | ServerToolUseBlock
    | WebSearchToolResultBlock

export interface AnthropicMessage {
  id: string
  content: AnthropicContentBlock[]
  stop_reason: string | null
}

// Request content blocks

export interface CacheControl {
  type: 'ephemeral'
}

export interface TextBlockParam {
  type: 'text'
  text: string
  cache_control?: CacheControl | null
}

export interface ImageBlockParam {
  type: 'image'
  source: {
    type: 'base64'
    media_type: 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp'
    data: string
  }
  cache_control?: CacheControl | null
}

export interface ToolResultBlockParam {
  type: 'tool_result'
  tool_use_id: string
  content: string | Array<TextBlockParam | ImageBlockParam>
  is_error?: boolean
}

export type AnthropicContentBlockParam
  = | TextBlockParam
    | ImageBlockParam
    | ToolUseBlock
    | ThinkingBlock
    | RedactedThinkingBlock
    | ToolResultBlockParam

export interface AnthropicMessageParam {
  role: 'user' | 'assistant'
  content: string | AnthropicContentBlockParam[]
}

export type AnthropicThinkingConfig
  = | { type: 'enabled', budget_tokens: number }
    | { type: 'disabled' }

export type AnthropicToolChoice
  = | { type: 'auto', disable_parallel_tool_use?: boolean }
    | { type: 'any', disable_parallel_tool_use?: boolean }
    | { type: 'tool', name: string, disable_parallel_tool_use?: boolean }

/**
 * Request body sent for each round. Streaming is never requested.
 */
export interface AnthropicMessageRequest {
  model: string
  max_tokens: number
  messages: AnthropicMessageParam[]
  system?: string | TextBlockParam[]
  metadata?: { user_id?: string | null }
  temperature?: number
  top_p?: number
  top_k?: number
  stop_sequences?: string[]
  thinking?: AnthropicThinkingConfig
  tool_choice?: AnthropicToolChoice
  tools?: AnthropicTool[]
}

/**
 * Parameters accepted by `AnthropicToolSearchClient.messages.create`
 */
export interface AnthropicCreateParams extends Omit<AnthropicMessageRequest, 'tools'> {
  /** Ignored: the client manages the tool list */
  tools?: unknown[]
  /** Must be falsy; streaming is not supported */
  stream?: boolean
}

/**
 * Anything with an Anthropic-style `messages.create`
 */
export interface AnthropicMessagesClient<R extends AnthropicMessage = AnthropicMessage> {
  messages: {
    create: (params: AnthropicMessageRequest) => Promise<R>
  }
}
