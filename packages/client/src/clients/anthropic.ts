import type { ToolDefinition } from '@toolscout/core'
import type {
  AnthropicCreateParams,
  AnthropicMessage,
  AnthropicMessageRequest,
  AnthropicMessagesClient,
} from '../types/anthropic.js'
import type { ToolSearchClientOptions } from './base.js'
import { AnthropicAdapter } from '../adapters/anthropic.js'
import { send } from '../interceptor.js'
import { ToolSearchClientBase } from './base.js'

/**
 * Wraps an Anthropic client so that only the search tool, the always-available
 * tools and the tools discovered so far are sent with each request.
 *
 * @example
 * ```ts
 * const client = new AnthropicToolSearchClient(new Anthropic(), tools, { topK: 3 })
 * const message = await client.messages.create({ model, max_tokens: 1024, messages })
 * ```
 */
export class AnthropicToolSearchClient<R extends AnthropicMessage = AnthropicMessage>
  extends ToolSearchClientBase<AnthropicMessagesClient<R>> {
  readonly messages: {
    create: (params: AnthropicCreateParams) => Promise<R>
  }

  private readonly adapter: AnthropicAdapter<R>

  constructor(client: AnthropicMessagesClient<R>, tools: ToolDefinition[], options?: ToolSearchClientOptions) {
    super(client, tools, options)
    this.adapter = new AnthropicAdapter<R>(this.debug)
    this.messages = {
      create: params => this.create(params),
    }
  }

  private async create(params: AnthropicCreateParams): Promise<R> {
    // Caller tools are replaced by the managed list
    const { stream, tools: _tools, ...rest } = params
    this.assertNotStreaming(stream)

    const request: AnthropicMessageRequest = rest
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
