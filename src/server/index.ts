/**
 * Library surface of the ingestion pipeline
 */

export { loadAppConfig, buildAppConfig, parseStageOptions, DEFAULT_PROMPTS } from './config/appConfig.js';
export type { AppConfig, NetworkParameters, PluginEntry, PromptContexts } from './config/appConfig.js';

export {
  DataProcFlag,
  CLASSIFY_FLAGS,
  newDocument,
  setPublishDate,
  hasDataProcFlag,
  serializeDocument,
  deserializeDocument,
  toDocInfo,
} from './models/Document.js';
export type { NewsDocument, TextPart, DocInfo, JsonValue } from './models/Document.js';

export { createChannel } from './pipeline/Channel.js';
export type { Sender, Receiver } from './pipeline/Channel.js';
export { CompletionStore, toCompletionRecord } from './pipeline/CompletionStore.js';
export type { CompletionRecord } from './pipeline/CompletionStore.js';
export { StageRegistry, createDefaultRegistry } from './pipeline/StageRegistry.js';
export type { DefaultRegistryDeps } from './pipeline/StageRegistry.js';
export { PipelineOrchestrator, extractStageDescriptors, orderProcessors } from './pipeline/PipelineOrchestrator.js';
export type { PipelineOptions, PipelineResult } from './pipeline/PipelineOrchestrator.js';
export type {
  Stage,
  StageContext,
  StageDescriptor,
  RetrieverStage,
  ProcessorStage,
  CompletionLookup,
} from './pipeline/types.js';

export { BaseRetriever } from './services/retrievers/BaseRetriever.js';
export { HtmlListingRetriever } from './services/retrievers/HtmlListingRetriever.js';
export type { ListingSite, ListingRow, StarterUrl } from './services/retrievers/HtmlListingRetriever.js';
export type { PageFetcher } from './services/retrievers/PageFetcher.js';
export { BaseProcessor } from './services/processors/BaseProcessor.js';
export { splitDocumentText } from './services/processors/SplitTextProcessor.js';

export { checkAndFixUrl } from './utils/urlValidator.js';
export { makeUniqueFilename } from './utils/filename.js';
export { cleanText, wordCount, getLastNWords } from './utils/text.js';
export * from './types/errors.js';
