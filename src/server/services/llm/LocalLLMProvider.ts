/**
 * Local LLM Provider (Ollama)
 *
 * Supports local LLM models via the Ollama generate API
 * https://ollama.ai/
 *
 * The prompt is rendered with the chat template of the model family (llama, gemma) before it is
 * sent, since the generate endpoint takes a single raw prompt.
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { ExternalServiceError, errorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { LLMGenerateOptions, LLMMessage, LLMProvider, LLMResponse } from './LLMProvider.js';
import { formatPrompt } from './promptTemplates.js';

export const DEFAULT_OLLAMA_URL = 'http://127.0.0.1:11434';

export interface OllamaConfig {
  apiUrl: string;
  model: string;
  timeout: number;
  temperature: number;
  maxTokens: number;
  maxContext: number;
  /** How long the model stays loaded after a call */
  keepAlive: string;
}

const ollamaGenerateResponseSchema = z.object({
  model: z.string().optional(),
  response: z.string(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

/**
 * Base URL of the Ollama service, accepting the full generate endpoint as well
 */
export function ollamaBaseUrl(apiUrl: string): string {
  return apiUrl.replace(/\/+$/, '').replace(/\/api\/generate$/, '');
}

export class LocalLLMProvider implements LLMProvider {
  private config: OllamaConfig;
  private client: AxiosInstance;

  constructor(config?: Partial<OllamaConfig>) {
    this.config = {
      apiUrl: DEFAULT_OLLAMA_URL,
      model: 'llama3.1',
      timeout: HTTP_TIMEOUTS.VERY_LONG,
      temperature: 0,
      maxTokens: 8192,
      maxContext: 8192,
      keepAlive: '10m',
      ...config,
    };

    this.client = createHttpClient({
      baseURL: ollamaBaseUrl(this.config.apiUrl),
      timeout: this.config.timeout,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  getName(): string {
    return 'ollama';
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    const model = options?.model || this.config.model;
    const prompt = formatPrompt(model, messages);

    try {
      const response = await this.client.post<unknown>('/api/generate', {
        model,
        keep_alive: this.config.keepAlive,
        options: {
          temperature: options?.temperature ?? this.config.temperature,
          num_predict: options?.max_tokens ?? this.config.maxTokens,
          num_ctx: options?.max_context ?? this.config.maxContext,
        },
        prompt,
        stream: false,
      });

      const parsed = ollamaGenerateResponseSchema.safeParse(response.data);
      const content = parsed.success ? parsed.data.response.trim() : '';
      if (!parsed.success || !content) {
        throw new ExternalServiceError('Ollama', 'Empty response from Ollama', {
          reason: 'empty_response',
          provider: 'ollama',
          model,
        });
      }

      const { prompt_eval_count: promptTokens = 0, eval_count: completionTokens } = parsed.data;
      return {
        content,
        model: parsed.data.model || model,
        usage:
          completionTokens !== undefined
            ? { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens }
            : undefined,
      };
    } catch (error) {
      if (!(error instanceof ExternalServiceError)) {
        logger.error({ error: errorMessage(error), model, apiUrl: this.config.apiUrl }, 'Error calling Ollama');
      }
      throw error;
    }
  }
}
