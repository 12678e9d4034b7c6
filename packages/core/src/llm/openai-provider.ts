import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { LLM_DEFAULT_MAX_TOKENS } from '../config/constants';
import type { LLMOptions, LLMProvider } from './types';

export type LLMBackend = 'openrouter' | 'openai';

export type OpenAIProviderConfig = {
  backend: LLMBackend;
  apiKey: string;
  model?: string;
  /** Optional site URL for OpenRouter attribution */
  siteUrl?: string;
  /** Optional site name for OpenRouter attribution */
  siteName?: string;
};

/**
 * Default models for each backend
 */
export const DEFAULT_MODELS: Record<LLMBackend, string> = {
  openrouter: 'openai/gpt-4o-mini',
  openai: 'gpt-4o-mini',
};

/**
 * Map an OpenRouter model id to the native OpenAI id.
 */
export function mapToOpenAIModel(modelId: string): string {
  if (modelId.startsWith('openai/')) {
    return modelId.slice('openai/'.length);
  }
  // Non-OpenAI models cannot be served by the OpenAI API directly
  return modelId.includes('/') ? DEFAULT_MODELS.openai : modelId;
}

/**
 * LLMProvider backed by the OpenAI SDK, talking to OpenRouter or OpenAI.
 *
 * OpenRouter speaks the same API with a different base URL and optional
 * attribution headers.
 */
export class OpenAIProvider implements LLMProvider {
  readonly id: string;
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIProviderConfig, client?: OpenAI) {
    this.id = config.backend;
    const configuredModel = config.model ?? DEFAULT_MODELS[config.backend];

    if (config.backend === 'openrouter') {
      this.model = configuredModel;
      this.client =
        client ??
        new OpenAI({
          baseURL: 'https://openrouter.ai/api/v1',
          apiKey: config.apiKey,
          defaultHeaders: {
            ...(config.siteUrl ? { 'HTTP-Referer': config.siteUrl } : {}),
            'X-Title': config.siteName ?? 'Taxonomist',
          },
        });
    } else {
      this.model = mapToOpenAIModel(configuredModel);
      this.client = client ?? new OpenAI({ apiKey: config.apiKey });
    }
  }

  getModel(): string {
    return this.model;
  }

  complete(prompt: string, options?: LLMOptions): Promise<string> {
    return this.chatCompletion(prompt, options, false);
  }

  completeJSON(prompt: string, options?: LLMOptions): Promise<string> {
    return this.chatCompletion(prompt, options, true);
  }

  private async chatCompletion(prompt: string, options: LLMOptions | undefined, json: boolean): Promise<string> {
    const modelToUse = options?.model ?? this.model;
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: modelToUse,
      messages: [{ role: 'user', content: prompt }],
      max_completion_tokens: options?.maxTokens ?? LLM_DEFAULT_MAX_TOKENS,
      temperature: options?.temperature,
      ...(json ? { response_format: { type: 'json_object' as const } } : {}),
    };

    try {
      const response = await this.client.chat.completions.create(params, { signal: options?.signal });

      if (!Array.isArray(response.choices) || response.choices.length === 0) {
        throw new Error('API response has no choices');
      }

      const content = response.choices[0]?.message?.content?.trim() ?? '';
      if (!content) {
        console.warn(
          `[OpenAIProvider] Empty content in response. Finish reason: ${response.choices[0]?.finish_reason}, ` +
            `Model: ${modelToUse}, Backend: ${this.id}`,
        );
      }
      return content;
    } catch (error) {
      console.error(`[OpenAIProvider] Completion failed (model ${modelToUse}):`, error);
      throw error;
    }
  }
}

/**
 * Detect the backend from environment variables. OpenRouter wins when both
 * keys are present.
 */
export function detectLLMBackend(env: NodeJS.ProcessEnv = process.env): OpenAIProviderConfig | null {
  const openrouterKey = env.OPENROUTER_API_KEY?.trim();
  const openaiKey = env.OPENAI_API_KEY?.trim();
  const configuredModel = env.LLM_MODEL?.trim() || undefined;

  if (openrouterKey) {
    return { backend: 'openrouter', apiKey: openrouterKey, model: configuredModel ?? DEFAULT_MODELS.openrouter };
  }
  if (openaiKey) {
    return { backend: 'openai', apiKey: openaiKey, model: configuredModel ?? DEFAULT_MODELS.openai };
  }
  return null;
}

/**
 * Create a provider from the environment, or null when no key is set.
 */
export function createLLMProvider(env: NodeJS.ProcessEnv = process.env): OpenAIProvider | null {
  const config = detectLLMBackend(env);
  return config ? new OpenAIProvider(config) : null;
}
