/**
 * Google Gemini LLM Provider
 *
 * Implements LLMProvider for the Gemini generateContent REST API
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { getEnv } from '../../config/env.js';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { ConfigurationError, ExternalServiceError, errorMessage } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';
import type { LLMGenerateOptions, LLMMessage, LLMProvider, LLMResponse } from './LLMProvider.js';

// Gemini can be slow with large contexts, so we use a longer default
const DEFAULT_GEMINI_TIMEOUT = HTTP_TIMEOUTS.VERY_LONG;

export const DEFAULT_GEMINI_URL = 'https://generativelanguage.googleapis.com/v1beta/models/';

export interface GeminiProviderConfig {
  apiKey?: string;
  /** Models endpoint; the model name and ":generateContent" are appended */
  apiUrl?: string;
  defaultModel?: string;
  timeout?: number;
  temperature?: number;
  maxTokens?: number;
}

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
      })
    )
    .default([]),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().default(0),
      candidatesTokenCount: z.number().default(0),
      totalTokenCount: z.number().default(0),
    })
    .optional(),
  modelVersion: z.string().optional(),
});

export class GeminiProvider implements LLMProvider {
  private config: GeminiProviderConfig;
  private client: AxiosInstance | null = null;

  constructor(config?: GeminiProviderConfig) {
    this.config = {
      apiKey: getEnv().GOOGLE_API_KEY,
      apiUrl: DEFAULT_GEMINI_URL,
      defaultModel: 'gemini-1.5-flash',
      timeout: DEFAULT_GEMINI_TIMEOUT,
      temperature: 0,
      ...config,
    };
  }

  getName(): string {
    return 'gemini';
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    if (!this.config.apiKey) {
      throw new ConfigurationError('Gemini is not configured', ['GOOGLE_API_KEY is not set']);
    }

    if (!this.client) {
      this.client = createHttpClient({
        timeout: this.config.timeout || DEFAULT_GEMINI_TIMEOUT,
        headers: {
          'Content-Type': 'application/json',
        },
      });
    }

    const model = options?.model || this.config.defaultModel || 'gemini-1.5-flash';
    const temperature = options?.temperature ?? this.config.temperature;
    const maxTokens = options?.max_tokens ?? this.config.maxTokens;

    // Gemini takes a single text: system context first, then the user messages
    const prompt = [
      ...messages.filter((m) => m.role === 'system'),
      ...messages.filter((m) => m.role !== 'system'),
    ]
      .map((m) => m.content)
      .join('\n');

    const requestBody = {
      contents: [{ parts: [{ text: prompt }] }],
      safetySettings: [{ category: 'HARM_CATEGORY_DANGEROUS_CONTENT', threshold: 'BLOCK_ONLY_HIGH' }],
      generationConfig: {
        temperature,
        ...(maxTokens !== undefined ? { maxOutputTokens: maxTokens } : {}),
      },
    };

    const baseUrl = this.config.apiUrl || DEFAULT_GEMINI_URL;
    const url = `${baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`}${model}:generateContent`;

    try {
      const response = await this.client.post<unknown>(url, requestBody, {
        params: { key: this.config.apiKey },
      });

      const parsed = geminiResponseSchema.safeParse(response.data);
      const content = parsed.success
        ? parsed.data.candidates[0]?.content?.parts[0]?.text?.trim()
        : undefined;
      if (!parsed.success || !content) {
        throw new ExternalServiceError('Gemini', 'Empty response from Gemini', {
          reason: 'empty_response',
          provider: 'gemini',
          model,
        });
      }

      const usageMetadata = parsed.data.usageMetadata;
      return {
        content,
        model: parsed.data.modelVersion || model,
        usage: usageMetadata
          ? {
              promptTokens: usageMetadata.promptTokenCount,
              completionTokens: usageMetadata.candidatesTokenCount,
              totalTokens: usageMetadata.totalTokenCount,
            }
          : undefined,
      };
    } catch (error) {
      if (!(error instanceof ExternalServiceError)) {
        logger.error({ error: errorMessage(error), model, timeout: this.config.timeout }, 'Error calling Gemini API');
      }
      throw error;
    }
  }
}
