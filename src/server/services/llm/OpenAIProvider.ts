/**
 * OpenAI LLM Provider
 *
 * Implements LLMProvider for the OpenAI chat completions API and compatible services
 * (any base URL that speaks the same protocol)
 */

import OpenAI from 'openai';
import { getEnv } from '../../config/env.js';
import { HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { ConfigurationError, ExternalServiceError, errorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { LLMGenerateOptions, LLMMessage, LLMProvider, LLMResponse } from './LLMProvider.js';

export const DEFAULT_OPENAI_URL = 'https://api.openai.com/v1';

export interface OpenAIProviderConfig {
  apiKey?: string;
  baseURL?: string;
  defaultModel?: string;
  timeout?: number;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Base URL for the SDK, accepting the full chat completions endpoint as well
 */
export function openAIBaseUrl(url: string): string {
  return url.replace(/\/+$/, '').replace(/\/chat\/completions$/, '');
}

export class OpenAIProvider implements LLMProvider {
  private config: OpenAIProviderConfig;
  private client: OpenAI | null = null;

  constructor(config?: OpenAIProviderConfig) {
    this.config = {
      apiKey: getEnv().OPENAI_API_KEY,
      baseURL: DEFAULT_OPENAI_URL,
      defaultModel: 'gpt-4o-mini',
      timeout: HTTP_TIMEOUTS.LONG,
      temperature: 0,
      ...config,
    };
  }

  getName(): string {
    return 'chatgpt';
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new ConfigurationError('OpenAI is not configured', ['OPENAI_API_KEY is not set']);
      }
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        baseURL: openAIBaseUrl(this.config.baseURL || DEFAULT_OPENAI_URL),
        timeout: this.config.timeout,
        // retries are handled by the calling stage
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    const client = this.getClient();
    const model = options?.model || this.config.defaultModel || 'gpt-4o-mini';
    const temperature = options?.temperature ?? this.config.temperature;
    const max_tokens = options?.max_tokens ?? this.config.maxTokens;

    try {
      const response = await client.chat.completions.create({
        model,
        messages: messages.map((msg) => ({
          role: msg.role,
          content: msg.content,
        })),
        temperature,
        ...(max_tokens !== undefined ? { max_tokens } : {}),
      });

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ExternalServiceError('OpenAI', 'Empty response from OpenAI', {
          reason: 'empty_response',
          provider: 'openai',
          model,
        });
      }

      return {
        content,
        model: response.model,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      logger.error({ error: errorMessage(error), model }, 'Error calling OpenAI');
      throw error;
    }
  }
}
