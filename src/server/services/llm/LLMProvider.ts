/**
 * Chat-style model backends behind the summarisation stages
 */

export type LLMServiceName = 'ollama' | 'chatgpt' | 'gemini';

export interface LLMProvider {
  /**
   * One completion for a system prompt plus the document text. Each backend folds the
   * messages into its own request shape (chat template, chat messages, or a prepended context).
   */
  generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse>;

  /** Backend label used in stage logs */
  getName(): string;
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Per-call sampling settings, taken from the stage options or `[llm_apis.<service>]`
 */
export interface LLMGenerateOptions {
  temperature?: number;
  max_tokens?: number;
  /** Ollama `num_ctx`; ignored by the hosted services */
  max_context?: number;
  model?: string;
}

export interface LLMResponse {
  /** Generated text, trimmed. Hosted services reject an empty answer; Ollama may return '' */
  content: string;
  /** Model that answered, as reported by the service */
  model: string;
  /** Token counts, when the service reports them */
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}
