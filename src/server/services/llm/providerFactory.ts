/**
 * Resolution of LLM service settings and construction of providers
 *
 * Settings come from, in order of precedence: the stage's plugin options, the
 * `[llm_apis.<service>]` table, top-level configuration keys, built-in defaults.
 */

import type { AppConfig, LlmApiSettings } from '../../config/appConfig.js';
import { GeminiProvider, DEFAULT_GEMINI_URL } from './GeminiProvider.js';
import type { LLMProvider, LLMServiceName } from './LLMProvider.js';
import { DEFAULT_OLLAMA_URL, LocalLLMProvider } from './LocalLLMProvider.js';
import { DEFAULT_OPENAI_URL, OpenAIProvider } from './OpenAIProvider.js';

export interface LlmSettings {
  service: LLMServiceName;
  model: string;
  apiUrl: string;
  temperature: number;
  timeoutMs: number;
  maxTokens: number;
  maxContext: number;
}

/** Plugin-local keys that tune the LLM call */
export interface LlmStageOverrides {
  model_name?: string;
  svc_url?: string;
  ollama_svc_base_url?: string;
  temperature?: number;
  /** Seconds */
  fetch_timeout?: number;
}

const SERVICE_DEFAULTS: Record<LLMServiceName, { model: string; apiUrl: string }> = {
  ollama: { model: 'llama3.1', apiUrl: DEFAULT_OLLAMA_URL },
  chatgpt: { model: 'gpt-4o-mini', apiUrl: DEFAULT_OPENAI_URL },
  gemini: { model: 'gemini-1.5-flash', apiUrl: DEFAULT_GEMINI_URL },
};

const DEFAULT_MODEL_TIMEOUT_SEC = 150;

export function resolveLlmSettings(
  service: LLMServiceName,
  overrides: LlmStageOverrides,
  config: AppConfig
): LlmSettings {
  const api: LlmApiSettings = config.llmApis[service] ?? {};
  const defaults = SERVICE_DEFAULTS[service];
  const timeoutSec = overrides.fetch_timeout ?? api.model_api_timeout ?? DEFAULT_MODEL_TIMEOUT_SEC;

  return {
    service,
    model: overrides.model_name ?? api.model_name ?? defaults.model,
    apiUrl: overrides.svc_url ?? (service === 'ollama' ? overrides.ollama_svc_base_url : undefined) ?? api.api_url ?? defaults.apiUrl,
    temperature: overrides.temperature ?? api.temperature ?? 0,
    timeoutMs: timeoutSec * 1000,
    maxTokens: api.max_gen_tokens ?? config.maxGenTokens,
    maxContext: api.max_context_len ?? config.maxContextLen,
  };
}

export type LlmProviderFactory = (settings: LlmSettings) => LLMProvider;

/**
 * Create the provider for a service
 */
export const createLlmProvider: LlmProviderFactory = (settings) => {
  switch (settings.service) {
    case 'ollama':
      return new LocalLLMProvider({
        apiUrl: settings.apiUrl,
        model: settings.model,
        timeout: settings.timeoutMs,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
        maxContext: settings.maxContext,
      });
    case 'chatgpt':
      return new OpenAIProvider({
        baseURL: settings.apiUrl,
        defaultModel: settings.model,
        timeout: settings.timeoutMs,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
      });
    case 'gemini':
      return new GeminiProvider({
        apiUrl: settings.apiUrl,
        defaultModel: settings.model,
        timeout: settings.timeoutMs,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
      });
  }
};
