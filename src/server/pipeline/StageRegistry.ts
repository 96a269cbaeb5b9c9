/**
 * Stage Registry
 *
 * Maps plugin names from the configuration to stage factories. The orchestrator asks the
 * registry for one stage per enabled plugin entry.
 */

import type { LlmProviderFactory } from '../services/llm/providerFactory.js';
import { createLlmProvider } from '../services/llm/providerFactory.js';
import type { LLMServiceName } from '../services/llm/LLMProvider.js';
import { ClassifyProcessor } from '../services/processors/ClassifyProcessor.js';
import { CmdlineProcessor } from '../services/processors/CmdlineProcessor.js';
import { DedupeProcessor } from '../services/processors/DedupeProcessor.js';
import { LlmProcessor } from '../services/processors/LlmProcessor.js';
import { PassThroughProcessor } from '../services/processors/PassThroughProcessor.js';
import { PersistDataProcessor } from '../services/processors/PersistDataProcessor.js';
import { SplitTextProcessor } from '../services/processors/SplitTextProcessor.js';
import { GenericRetriever } from '../services/retrievers/GenericRetriever.js';
import type { PdfTextExtractor } from '../services/retrievers/HtmlListingRetriever.js';
import { OfflineDocsRetriever } from '../services/retrievers/OfflineDocsRetriever.js';
import { AxiosPageFetcher } from '../services/retrievers/PageFetcher.js';
import type { PageFetcher } from '../services/retrievers/PageFetcher.js';
import { RBI_BASE_URL, RbiRetriever } from '../services/retrievers/RbiRetriever.js';
import { logger } from '../utils/logger.js';
import type { ProcessorFactory, RetrieverFactory, Stage, StageContext, StageDescriptor, StageRegistration } from './types.js';

export class StageRegistry {
  private readonly registrations = new Map<string, StageRegistration>();

  registerRetriever(name: string, create: RetrieverFactory): this {
    this.registrations.set(name, { kind: 'retriever', create });
    return this;
  }

  registerProcessor(name: string, create: ProcessorFactory): this {
    this.registrations.set(name, { kind: 'processor', create });
    return this;
  }

  /**
   * Make `alias` resolve to the registration of `target`
   */
  alias(alias: string, target: string): this {
    const registration = this.registrations.get(target);
    if (!registration) {
      throw new Error(`Cannot alias '${alias}': no stage registered as '${target}'`);
    }
    this.registrations.set(alias, registration);
    return this;
  }

  has(name: string): boolean {
    return this.registrations.has(name);
  }

  names(): string[] {
    return [...this.registrations.keys()].sort();
  }

  /**
   * Instantiate the stage for a plugin entry.
   *
   * @returns undefined when no stage is registered under the name
   * @throws ConfigurationError when the stage rejects its options
   */
  create(descriptor: StageDescriptor, ctx: StageContext): Stage | undefined {
    const registration = this.registrations.get(descriptor.name);
    if (!registration) {
      logger.error({ plugin: descriptor.name }, 'Unknown plugin name in configuration, skipped');
      return undefined;
    }
    if (registration.kind !== descriptor.kind) {
      logger.warn(
        { plugin: descriptor.name, configured: descriptor.kind, registered: registration.kind },
        'Plugin type in configuration does not match the stage, using the registered type'
      );
    }
    return registration.create(ctx);
  }
}

export interface DefaultRegistryDeps {
  /** Page fetcher for the listing retrievers; by default one per stage built from the network settings */
  fetcher?: PageFetcher;
  pdfExtractor?: PdfTextExtractor;
  providerFactory?: LlmProviderFactory;
}

/**
 * Registry holding every built-in stage
 */
export function createDefaultRegistry(deps: DefaultRegistryDeps = {}): StageRegistry {
  const providerFactory = deps.providerFactory ?? createLlmProvider;
  const fetcherFor = (ctx: StageContext, referrer?: string): PageFetcher =>
    deps.fetcher ?? new AxiosPageFetcher(ctx.config.network, { referrer });
  const llmStage =
    (service?: LLMServiceName): ProcessorFactory =>
    (ctx) =>
      new LlmProcessor(ctx, service, providerFactory);

  return new StageRegistry()
    .registerRetriever('mod_en_in_rbi', (ctx) =>
      new RbiRetriever(ctx, { fetcher: fetcherFor(ctx, RBI_BASE_URL), pdfExtractor: deps.pdfExtractor })
    )
    .alias('rbi', 'mod_en_in_rbi')
    .registerRetriever('mod_generic_retriever', (ctx) =>
      new GenericRetriever(ctx, { fetcher: fetcherFor(ctx), pdfExtractor: deps.pdfExtractor })
    )
    .registerRetriever('mod_offline_docs', (ctx) => new OfflineDocsRetriever(ctx, { pdfExtractor: deps.pdfExtractor }))
    .registerProcessor('split_text', (ctx) => new SplitTextProcessor(ctx))
    .registerProcessor('mod_ollama', llmStage('ollama'))
    .registerProcessor('mod_chatgpt', llmStage('chatgpt'))
    .registerProcessor('mod_gemini', llmStage('gemini'))
    .registerProcessor('mod_summarize', llmStage())
    .registerProcessor('mod_persist_data', (ctx) => new PersistDataProcessor(ctx))
    .registerProcessor('mod_cmdline', (ctx) => new CmdlineProcessor(ctx))
    .registerProcessor('mod_classify', (ctx) => new ClassifyProcessor(ctx))
    .registerProcessor('mod_dedupe', (ctx) => new DedupeProcessor(ctx))
    .registerProcessor('mod_vectorstore', (ctx) => new PassThroughProcessor(ctx))
    .registerProcessor('mod_solrsubmit', (ctx) => new PassThroughProcessor(ctx))
    .registerProcessor('mod_dataprep', (ctx) => new PassThroughProcessor(ctx));
}
