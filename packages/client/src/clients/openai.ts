import type { ToolDefinition } from '@toolscout/core'
import type {
  ChatCompletion,
  ChatCompletionCreateParams,
  ChatCompletionRequest,
  ChatCompletionsClient,
} from '../types/openai.js'
import type { ToolSearchClientOptions } from './base.js'
import { OpenAIAdapter } from '../adapters/openai.js'
import { send } from '../interceptor.js'
import { ToolSearchClientBase } from './base.js'

/**
 * Wraps an OpenAI (or OpenAI-compatible) client so that only the search tool,
 * the always-available tools and the tools discovered so far are sent with
 * each request.
 */
export class OpenAIToolSearchClient<R extends ChatCompletion = ChatCompletion>
  extends ToolSearchClientBase<ChatCompletionsClient<R>> {
  readonly chat: {
    completions: {
      create: (params: ChatCompletionCreateParams) => Promise<R>
    }
  }

  private readonly adapter: OpenAIAdapter<R>

  constructor(client: ChatCompletionsClient<R>, tools: ToolDefinition[], options?: ToolSearchClientOptions) {
    super(client, tools, options)
    this.adapter = new OpenAIAdapter<R>(this.debug)
    this.chat = {
      completions: {
        create: params => this.create(params),
      },
    }
  }

  private async create(params: ChatCompletionCreateParams): Promise<R> {
    const { stream, tools: _tools, ...rest } = params
    this.assertNotStreaming(stream)

    const request: ChatCompletionRequest = rest
    return send({
      client: this.client,
      adapter: this.adapter,
      index: this.index,
      alwaysAvailable: this.alwaysAvailable,
      discovered: this.discovered,
      maxSearchRounds: this.maxSearchRounds,
      debug: this.debug,
    }, request)
  }
}
