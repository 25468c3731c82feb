/**
 * AI Client Factory - completion service configuration.
 *
 * Tiers:
 *   extraction – structured fields from the inquiry (small, cheap)
 *   generation – the full itinerary document (large output)
 *
 * Provider cascade (first key set wins):
 *   GROQ_API_KEY      → Groq OpenAI-compatible endpoint (llama-3.3-70b-versatile)
 *   OPENAI_API_KEY    → OpenAI (gpt-4o-mini / gpt-4o)
 *   DEEPSEEK_API_KEY  → DeepSeek (deepseek-chat)
 *
 * Model env overrides:
 *   AI_EXTRACTION_MODEL
 *   AI_GENERATION_MODEL
 */

import OpenAI from 'openai';
import type { AppConfig } from '../config';

// ============================================================================
// TYPES
// ============================================================================

export type AITier = 'extraction' | 'generation';

export interface CompletionRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

/**
 * A chat completion that must answer with a JSON object. Returns the raw
 * completion text; callers own parsing.
 */
export interface CompletionClient {
  completeJson(request: CompletionRequest): Promise<string>;
}

type ProviderName = 'groq' | 'openai' | 'deepseek';

interface ProviderConfig {
  name: ProviderName;
  apiKey: string;
  baseURL?: string;
}

// ============================================================================
// DEFAULTS
// ============================================================================

const TIER_DEFAULTS: Record<ProviderName, Record<AITier, string>> = {
  groq: { extraction: 'llama-3.3-70b-versatile', generation: 'llama-3.3-70b-versatile' },
  openai: { extraction: 'gpt-4o-mini', generation: 'gpt-4o' },
  deepseek: { extraction: 'deepseek-chat', generation: 'deepseek-chat' },
};

const BASE_URLS: Record<ProviderName, string | undefined> = {
  groq: 'https://api.groq.com/openai/v1',
  openai: undefined,
  deepseek: 'https://api.deepseek.com',
};

/** Generation calls can be long; extraction should be quick */
const TIER_TIMEOUT_MS: Record<AITier, number> = {
  extraction: 30_000,
  generation: 120_000,
};

// ============================================================================
// PROVIDER DETECTION
// ============================================================================

function detectProvider(config: AppConfig): ProviderConfig | null {
  if (config.GROQ_API_KEY) {
    return { name: 'groq', apiKey: config.GROQ_API_KEY, baseURL: BASE_URLS.groq };
  }
  if (config.OPENAI_API_KEY) {
    return { name: 'openai', apiKey: config.OPENAI_API_KEY, baseURL: BASE_URLS.openai };
  }
  if (config.DEEPSEEK_API_KEY) {
    return { name: 'deepseek', apiKey: config.DEEPSEEK_API_KEY, baseURL: BASE_URLS.deepseek };
  }
  return null;
}

function resolveModel(config: AppConfig, provider: ProviderName, tier: AITier): string {
  const override = tier === 'extraction' ? config.AI_EXTRACTION_MODEL : config.AI_GENERATION_MODEL;
  return override || TIER_DEFAULTS[provider][tier];
}

// ============================================================================
// CLIENT
// ============================================================================

class OpenAICompletionClient implements CompletionClient {
  constructor(
    private readonly openai: OpenAI,
    private readonly model: string,
    private readonly timeoutMs: number
  ) {}

  async completeJson(request: CompletionRequest): Promise<string> {
    const response = await this.openai.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.user },
        ],
        response_format: { type: 'json_object' },
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      },
      { timeout: this.timeoutMs, maxRetries: 0 }
    );

    return response.choices[0]?.message?.content ?? '';
  }
}

/**
 * Completion client for the given tier, or null when no provider key is set.
 */
export function createCompletionClient(config: AppConfig, tier: AITier): CompletionClient | null {
  const provider = detectProvider(config);
  if (!provider) return null;

  const openai = new OpenAI({ apiKey: provider.apiKey, baseURL: provider.baseURL });
  return new OpenAICompletionClient(openai, resolveModel(config, provider.name, tier), TIER_TIMEOUT_MS[tier]);
}

/**
 * Log that AI is configured (no key material exposed).
 */
export function logAIConfig(config: AppConfig): void {
  const provider = detectProvider(config);
  if (!provider) {
    console.warn('[AIClientFactory] No AI provider configured. Set GROQ_API_KEY, OPENAI_API_KEY or DEEPSEEK_API_KEY.');
    return;
  }
  console.log(`[AIClientFactory] Using ${provider.name} (extraction: ${resolveModel(config, provider.name, 'extraction')}, generation: ${resolveModel(config, provider.name, 'generation')})`);
}
