/**
 * LLM summarisation stages (mod_ollama, mod_chatgpt, mod_gemini, mod_summarize)
 *
 * For every text part, asks the model for a summary and for the actions it describes, then
 * consolidates those into `generated_content.exec_summary` and `generated_content.actions_summary`.
 * Summaries require the SUMMARIZE flag; actions require EXTRACT_ACTIONS.
 */

import { z } from 'zod';
import { getEnv } from '../../config/env.js';
import { DataProcFlag, hasDataProcFlag } from '../../models/Document.js';
import type { JsonValue, NewsDocument, TextPart } from '../../models/Document.js';
import type { StageContext } from '../../pipeline/types.js';
import { errorMessage } from '../../types/errors.js';
import { retryWithBackoff } from '../../utils/retry.js';
import type { LLMMessage, LLMProvider, LLMServiceName } from '../llm/LLMProvider.js';
import { createLlmProvider, resolveLlmSettings } from '../llm/providerFactory.js';
import type { LlmProviderFactory, LlmSettings } from '../llm/providerFactory.js';
import { writeDocumentFile } from '../persistence/documentFiles.js';
import { BaseProcessor } from './BaseProcessor.js';

/** Outputs shorter than this are treated as missing, and shorter texts are not sent */
export const MIN_ACCEPTABLE_OUTPUT_CHARS = 25;

export const llmStageOptionsSchema = z
  .object({
    llm_service: z.enum(['ollama', 'chatgpt', 'gemini']).default('ollama'),
    model_name: z.string().optional(),
    svc_url: z.string().optional(),
    ollama_svc_base_url: z.string().optional(),
    temperature: z.number().optional(),
    fetch_timeout: z.number().positive().optional(),
    overwrite: z.boolean().default(false),
    save_intermediate: z.boolean().default(false),
  })
  .passthrough();

type PartOutputKey = 'summary' | 'insights';

function isAcceptableOutput(value: JsonValue | undefined): value is string {
  return typeof value === 'string' && value.trim().length >= MIN_ACCEPTABLE_OUTPUT_CHARS;
}

export class LlmProcessor extends BaseProcessor<typeof llmStageOptionsSchema> {
  private readonly settings: LlmSettings;
  private readonly provider: LLMProvider;

  /**
   * @param service - fixed backend; when omitted the `llm_service` option selects it
   */
  constructor(ctx: StageContext, service?: LLMServiceName, providerFactory: LlmProviderFactory = createLlmProvider) {
    super(ctx, llmStageOptionsSchema);
    this.settings = resolveLlmSettings(service ?? this.options.llm_service, this.options, ctx.config);
    this.provider = providerFactory(this.settings);
    this.logger.info(
      { provider: this.provider.getName(), model: this.settings.model, apiUrl: this.settings.apiUrl },
      'Using LLM service'
    );
  }

  /**
   * One model call. Failures are logged and yield an empty string.
   */
  private async complete(userContext: string, text: string, task: string, url: string): Promise<string> {
    const messages: LLMMessage[] = [
      { role: 'system', content: this.config.prompts.system },
      { role: 'user', content: `${userContext}\n${text}` },
    ];
    try {
      const response = await retryWithBackoff(
        () =>
          this.provider.generate(messages, {
            model: this.settings.model,
            temperature: this.settings.temperature,
            max_tokens: this.settings.maxTokens,
            max_context: this.settings.maxContext,
          }),
        { maxAttempts: getEnv().LLM_MAX_ATTEMPTS },
        `${this.name} ${task}`
      );
      return response.content;
    } catch (error) {
      this.logger.error({ url, task, error: errorMessage(error) }, 'LLM call failed');
      return '';
    }
  }

  private async partOutput(
    doc: NewsDocument,
    part: TextPart,
    key: PartOutputKey,
    userContext: string
  ): Promise<string> {
    const existing = part[key];
    if (!this.options.overwrite && isAcceptableOutput(existing)) {
      return existing;
    }
    if (part.text.trim().length <= MIN_ACCEPTABLE_OUTPUT_CHARS) {
      this.logger.debug({ url: doc.url, part: part.id, key }, 'Part text too short to send');
      return '';
    }

    const output = await this.complete(userContext, part.text, `${key} of part ${part.id}`, doc.url);
    if (output) {
      part[key] = output;
    }
    return output;
  }

  private async documentOutput(
    doc: NewsDocument,
    key: 'exec_summary' | 'actions_summary',
    userContext: string,
    source: string
  ): Promise<boolean> {
    const existing = doc.generated_content[key];
    if (!this.options.overwrite && isAcceptableOutput(existing)) {
      return false;
    }
    if (source.trim().length <= MIN_ACCEPTABLE_OUTPUT_CHARS) {
      return false;
    }

    const output = await this.complete(userContext, source, key, doc.url);
    if (!output) {
      return false;
    }
    doc.generated_content[key] = output;
    return true;
  }

  protected async processDocument(doc: NewsDocument): Promise<void> {
    const summarise = hasDataProcFlag(doc, DataProcFlag.SUMMARIZE);
    const extractActions = hasDataProcFlag(doc, DataProcFlag.EXTRACT_ACTIONS);
    if (!summarise && !extractActions) {
      return;
    }

    const prompts = this.config.prompts;
    const summaries: string[] = [];
    const insights: string[] = [];

    for (const part of doc.text_parts) {
      if (summarise) {
        const summary = await this.partOutput(doc, part, 'summary', prompts.summaryPart);
        if (summary) summaries.push(summary);
      }
      if (extractActions) {
        const actions = await this.partOutput(doc, part, 'insights', prompts.insightsPart);
        if (actions) insights.push(actions);
      }
    }

    const noParts = doc.text_parts.length === 0;
    let changed = false;
    if (summarise) {
      const source = noParts ? doc.text : summaries.join('\n');
      changed = (await this.documentOutput(doc, 'exec_summary', prompts.summaryExec, source)) || changed;
    }
    if (extractActions) {
      const source = noParts ? doc.text : insights.join('\n');
      changed = (await this.documentOutput(doc, 'actions_summary', prompts.actionsSummary, source)) || changed;
    }

    this.logger.info(
      { url: doc.url, parts: doc.text_parts.length, summaries: summaries.length, insights: insights.length },
      'Processed document with LLM'
    );

    if (changed && this.options.save_intermediate) {
      try {
        const filePath = await writeDocumentFile(doc, this.config.dataDir);
        this.logger.debug({ url: doc.url, filePath }, 'Saved intermediate document');
      } catch (error) {
        this.logger.error({ url: doc.url, error: errorMessage(error) }, 'Unable to save intermediate document');
      }
    }
  }
}
