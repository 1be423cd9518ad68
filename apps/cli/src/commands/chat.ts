import type { ProviderName, ToolSearchClientOptions } from '@toolscout/client'
import type { ToolDefinition } from '@toolscout/core'
import type { ChatOutput } from '../utils/output.js'
import process from 'node:process'
import Anthropic from '@anthropic-ai/sdk'
import { AnthropicToolSearchClient, OpenAIToolSearchClient } from '@toolscout/client'
import { SEARCH_TOOL_NAME, ToolLoader } from '@toolscout/core'
import { Command, Option } from 'commander'
import OpenAI from 'openai'
import ora from 'ora'
import {
  DEBUG_ENV_VAR,
  DEFAULT_MAX_SEARCH_ROUNDS,
  DEFAULT_MAX_TOKENS,
  DEFAULT_MODELS,
  DEFAULT_PROVIDER,
  DEFAULT_TOOLS_PATH,
  DEFAULT_TOP_K,
} from '../constants.js'
import { fetchToolsFromMcpServer } from '../utils/mcp-client.js'
import { errorMessage, parsePositiveInt } from '../utils/options.js'
import { error, formatChatReply, info } from '../utils/output.js'

interface ChatCommandOptions {
  provider: ProviderName
  model?: string
  tools: string[]
  mcp?: string
  always: string[]
  topK: number
  maxRounds: number
  maxTokens: number
  baseUrl?: string
}

const PROVIDERS: ProviderName[] = ['anthropic', 'openai']

/**
 * Create the chat command
 */
export function createChatCommand(): Command {
  return new Command('chat')
    .description('Send one prompt with tools exposed through search')
    .argument('<prompt>', 'User message')
    .addOption(new Option('-p, --provider <provider>', 'Model provider').choices(PROVIDERS).default(DEFAULT_PROVIDER))
    .option('-m, --model <model>', 'Model name (default depends on the provider)')
    .option('-t, --tools <paths...>', 'Tool definition files or directories', [DEFAULT_TOOLS_PATH])
    .option('--mcp <command>', 'Fetch tools from a stdio MCP server instead of files')
    .option('-a, --always <names...>', 'Tools sent on every request', [])
    .option('-k, --top-k <number>', 'Tools returned per search', parsePositiveInt, DEFAULT_TOP_K)
    .option('-r, --max-rounds <number>', 'Provider calls per prompt', parsePositiveInt, DEFAULT_MAX_SEARCH_ROUNDS)
    .option('--max-tokens <number>', 'Maximum tokens in the reply', parsePositiveInt, DEFAULT_MAX_TOKENS)
    .option('--base-url <url>', 'API base URL, for compatible services')
    .action(async (prompt: string, options: ChatCommandOptions) => {
      const spinner = ora('Loading tools...').start()

      try {
        const tools = options.mcp
          ? await fetchToolsFromMcpServer(options.mcp)
          : await new ToolLoader().loadFromSources(options.tools)

        const model = options.model ?? DEFAULT_MODELS[options.provider]
        spinner.text = `Asking ${model} (${tools.length} tools behind search)...`

        const clientOptions: ToolSearchClientOptions = {
          topK: options.topK,
          alwaysAvailable: options.always,
          maxSearchRounds: options.maxRounds,
          debug: process.env[DEBUG_ENV_VAR] === 'true',
        }

        const reply = options.provider === 'openai'
          ? await chatWithOpenAI(prompt, model, tools, clientOptions, options)
          : await chatWithAnthropic(prompt, model, tools, clientOptions, options)

        spinner.stop()
        if (reply.discovered.length === 0 && reply.toolCalls.length === 0) {
          info('The model answered without searching for tools')
        }
        console.log(formatChatReply(reply))
      }
      catch (err) {
        spinner.fail('Chat failed')
        error(errorMessage(err))
        process.exit(1)
      }
    })
}

async function chatWithAnthropic(
  prompt: string,
  model: string,
  tools: ToolDefinition[],
  clientOptions: ToolSearchClientOptions,
  options: ChatCommandOptions,
): Promise<ChatOutput> {
  const client = new AnthropicToolSearchClient(new Anthropic({ baseURL: options.baseUrl }), tools, clientOptions)

  const message = await client.messages.create({
    model,
    max_tokens: options.maxTokens,
    messages: [{ role: 'user', content: prompt }],
  })

  const text: string[] = []
  const toolCalls: ChatOutput['toolCalls'] = []
  for (const block of message.content) {
    if (block.type === 'text') {
      text.push(block.text)
    }
    else if (block.type === 'tool_use' && block.name !== SEARCH_TOOL_NAME) {
      toolCalls.push({ name: block.name, arguments: JSON.stringify(block.input) })
    }
  }

  return { text: text.join('\n'), toolCalls, discovered: [...client.discoveredTools].sort() }
}

async function chatWithOpenAI(
  prompt: string,
  model: string,
  tools: ToolDefinition[],
  clientOptions: ToolSearchClientOptions,
  options: ChatCommandOptions,
): Promise<ChatOutput> {
  const client = new OpenAIToolSearchClient(new OpenAI({ baseURL: options.baseUrl }), tools, clientOptions)

  const completion = await client.chat.completions.create({
    model,
    max_tokens: options.maxTokens,
    messages: [{ role: 'user', content: prompt }],
  })

  const message = completion.choices[0]?.message
  const toolCalls = (message?.tool_calls ?? [])
    .filter(call => call.function.name !== SEARCH_TOOL_NAME)
    .map(call => ({
      name: call.function.name,
      arguments: typeof call.function.arguments === 'string'
        ? call.function.arguments
        : JSON.stringify(call.function.arguments),
    }))

  return { text: message?.content ?? '', toolCalls, discovered: [...client.discoveredTools].sort() }
}
