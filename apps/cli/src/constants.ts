import type { ProviderName } from '@toolscout/client'

/**
 * Default tool definitions file
 */
export const DEFAULT_TOOLS_PATH = 'tools.json'

/**
 * Default number of tools returned per search
 */
export const DEFAULT_TOP_K = 5

/**
 * Default provider calls per chat prompt
 */
export const DEFAULT_MAX_SEARCH_ROUNDS = 3

/**
 * Cutoffs reported by the eval command
 */
export const DEFAULT_EVAL_KS = [3, 5, 10]

export const DEFAULT_PROVIDER: ProviderName = 'anthropic'

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-sonnet-4-20250514',
  openai: 'gpt-4o-mini',
}

export const DEFAULT_MAX_TOKENS = 1024

/**
 * Set to `true` to print the client's round decisions
 */
export const DEBUG_ENV_VAR = 'TOOLSCOUT_DEBUG'

/**
 * Search setups compared by the savings command
 */
export const DEFAULT_SAVINGS_KS = [3, 5, 10]
