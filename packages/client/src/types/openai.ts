/**
 * OpenAI Chat Completions shapes, limited to the fields the search loop reads
 * or writes plus the request options callers pass through. The official
 * `openai` types, and those of OpenAI-compatible services, are structurally
 * compatible with them.
 */

export interface ChatCompletionTool {
  type: 'function'
  function: {
    name: string
    description?: string
    parameters?: Record<string, unknown>
  }
}

/**
 * Tool call as sent back in an assistant message
 */
export interface ChatCompletionMessageToolCall {
  id: string
  type: 'function'
  function: {
    name: string
    /** JSON-encoded arguments */
    arguments: string
  }
}

/**
 * Tool call as received. Some compatible services return the arguments
 * already decoded.
 */
export interface ChatCompletionResponseToolCall {
  id: string
  type: 'function'
  function: {
    name: string
    arguments: string | Record<string, unknown>
  }
}

export interface ChatCompletionMessage {
  content: string | null
  tool_calls?: ChatCompletionResponseToolCall[]
}

export interface ChatCompletion {
  id: string
  choices: Array<{
    message: ChatCompletionMessage
  }>
}

export interface ChatCompletionContentPartText {
  type: 'text'
  text: string
}

export interface ChatCompletionContentPartImage {
  type: 'image_url'
  image_url: {
    url: string
    detail?: 'auto' | 'low' | 'high'
  }
}

export type ChatCompletionContentPart = ChatCompletionContentPartText | ChatCompletionContentPartImage

export interface ChatCompletionSystemMessageParam {
  role: 'system'
  content: string | ChatCompletionContentPartText[]
  name?: string
}

export interface ChatCompletionUserMessageParam {
  role: 'user'
  content: string | ChatCompletionContentPart[]
  name?: string
}

export interface ChatCompletionAssistantMessageParam {
  role: 'assistant'
  content?: string | ChatCompletionContentPartText[] | null
  name?: string
  tool_calls?: ChatCompletionMessageToolCall[]
}

export interface ChatCompletionToolMessageParam {
  role: 'tool'
  tool_call_id: string
  content: string | ChatCompletionContentPartText[]
}

export type ChatCompletionMessageParam
  = | ChatCompletionSystemMessageParam
    | ChatCompletionUserMessageParam
    | ChatCompletionAssistantMessageParam
    | ChatCompletionToolMessageParam

export type ChatCompletionToolChoice
  = | 'none'
    | 'auto'
    | 'required'
    | { type: 'function', function: { name: string } }

export type ChatCompletionResponseFormat
  = | { type: 'text' }
    | { type: 'json_object' }
    | {
      type: 'json_schema'
      json_schema: {
        name: string
        description?: string
        schema?: Record<string, unknown>
        strict?: boolean | null
      }
    }

/**
 * Request body sent for each round. Streaming is never requested.
 */
export interface ChatCompletionRequest {
  model: string
  messages: ChatCompletionMessageParam[]
  max_tokens?: number | null
  max_completion_tokens?: number | null
  temperature?: number | null
  top_p?: number | null
  frequency_penalty?: number | null
  presence_penalty?: number | null
  seed?: number | null
  stop?: string | string[] | null
  user?: string
  response_format?: ChatCompletionResponseFormat
  tool_choice?: ChatCompletionToolChoice
  parallel_tool_calls?: boolean
  tools?: ChatCompletionTool[]
}

/**
 * Parameters accepted by `OpenAIToolSearchClient.chat.completions.create`
 */
export interface ChatCompletionCreateParams extends Omit<ChatCompletionRequest, 'tools'> {
  /** Ignored: the client manages the tool list */
  tools?: unknown[]
  /** Must be falsy; streaming is not supported */
  stream?: boolean
}

/**
 * Anything with an OpenAI-style `chat.completions.create`
 */
export interface ChatCompletionsClient<R extends ChatCompletion = ChatCompletion> {
  chat: {
    completions: {
      create: (params: ChatCompletionRequest) => Promise<R>
    }
  }
}
