/**
 * Pipeline Orchestrator
 *
 * Instantiates the configured stages, wires them with channels, drains the terminal channel
 * into the completion store and waits for every stage to finish.
 *
 * ```
 * retrievers ──► intake ──► P1 ──► P2 ──► … ──► Pk ──► terminal ──► CompletionStore
 * ```
 */

import type { Logger } from 'pino';
import type { AppConfig, PluginEntry } from '../config/appConfig.js';
import type { NewsDocument } from '../models/Document.js';
import { StageError } from '../types/errors.js';
import { createChildLogger, logger, runContext } from '../utils/logger.js';
import { createChannel } from './Channel.js';
import type { Receiver, Sender } from './Channel.js';
import { CompletionStore, toCompletionRecord } from './CompletionStore.js';
import { StageRegistry } from './StageRegistry.js';
import type { ProcessorStage, RetrieverStage, StageDescriptor } from './types.js';

const RESERVED_PLUGIN_KEYS = new Set(['name', 'type', 'enabled', 'priority']);

/**
 * Turn the `plugins` array of the configuration into stage descriptors, in file order
 */
export function extractStageDescriptors(plugins: PluginEntry[]): StageDescriptor[] {
  return plugins.map((plugin, index) => {
    const options: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(plugin)) {
      if (!RESERVED_PLUGIN_KEYS.has(key)) {
        options[key] = value;
      }
    }
    return {
      name: plugin.name,
      kind: plugin.type === 'data_processor' ? 'processor' : 'retriever',
      enabled: plugin.enabled,
      priority: plugin.priority,
      options,
      index,
    };
  });
}

/**
 * Ascending priority; equal priorities keep configuration order
 */
export function orderProcessors<T extends Pick<StageDescriptor, 'priority' | 'index'>>(descriptors: T[]): T[] {
  return [...descriptors].sort((a, b) => a.priority - b.priority || a.index - b.index);
}

/**
 * Run a stage body so that a failure never leaves a channel half open: on exit the stage's
 * sender is closed, and on failure its receiver too, so that both neighbours reach end-of-stream.
 *
 * @returns the StageError if the stage failed
 */
export async function runGuarded(
  stageName: string,
  stageLogger: Logger,
  body: () => Promise<void>,
  handles: { tx: Sender<NewsDocument>; rx?: Receiver<NewsDocument> }
): Promise<StageError | undefined> {
  try {
    await runContext.run({ stage: stageName }, body);
    return undefined;
  } catch (error) {
    const stageError = new StageError(stageName, error);
    stageLogger.error({ error: stageError.message, cause: error }, 'Stage failed');
    handles.rx?.close();
    return stageError;
  } finally {
    handles.tx.close();
  }
}

export interface PipelineOptions {
  registry: StageRegistry;
  /** Defaults to a store on config.completedUrlsDatafile, closed when the run ends */
  completionStore?: CompletionStore;
  /** Defaults to config.completionBatchSize */
  batchSize?: number;
}

export interface PipelineResult {
  /** Documents that reached the terminal channel */
  processed: number;
  /** Completion rows committed */
  committed: number;
  failedStages: string[];
}

interface LaunchedStages {
  retrievers: RetrieverStage[];
  processors: ProcessorStage[];
}

export class PipelineOrchestrator {
  private readonly config: AppConfig;
  private readonly registry: StageRegistry;
  private readonly completionStore: CompletionStore;
  private readonly ownsStore: boolean;
  private readonly batchSize: number;

  constructor(config: AppConfig, options: PipelineOptions) {
    this.config = config;
    this.registry = options.registry;
    this.ownsStore = options.completionStore === undefined;
    this.completionStore = options.completionStore ?? new CompletionStore(config.completedUrlsDatafile);
    this.batchSize = Math.max(1, options.batchSize ?? config.completionBatchSize);
  }

  /**
   * Create stage instances for the enabled descriptors.
   * Unknown plugin names are skipped; invalid stage options throw ConfigurationError.
   */
  private instantiate(): LaunchedStages {
    const enabled = extractStageDescriptors(this.config.plugins).filter((descriptor) => descriptor.enabled);
    const retrievers: RetrieverStage[] = [];
    const processorEntries: Array<{ stage: ProcessorStage; priority: number; index: number }> = [];

    for (const descriptor of enabled) {
      const stage = this.registry.create(descriptor, {
        config: this.config,
        descriptor,
        logger: createChildLogger({ stage: descriptor.name }),
        completionStore: this.completionStore,
      });
      if (!stage) {
        continue;
      }
      if (stage.kind === 'retriever') {
        retrievers.push(stage);
      } else {
        processorEntries.push({ stage, priority: descriptor.priority, index: descriptor.index });
      }
    }

    const processors = orderProcessors(processorEntries).map((entry) => entry.stage);
    logger.info(
      { retrievers: retrievers.map((r) => r.name), processors: processors.map((p) => p.name) },
      'Pipeline stages configured'
    );
    return { retrievers, processors };
  }

  private flush(buffer: NewsDocument[]): number {
    if (buffer.length === 0) {
      return 0;
    }
    const submitted = buffer.length;
    const committed = this.completionStore.appendBatch(buffer.map(toCompletionRecord));
    if (committed < submitted) {
      logger.warn({ submitted, committed }, 'Not all completed documents were recorded');
    }
    buffer.length = 0;
    return committed;
  }

  async run(): Promise<PipelineResult> {
    const { retrievers, processors } = this.instantiate();
    const tasks: Array<Promise<StageError | undefined>> = [];

    const [intakeTx, intakeRx] = createChannel<NewsDocument>('intake');
    let upstream: Receiver<NewsDocument> = intakeRx;

    for (const processor of processors) {
      const [tx, rx] = createChannel<NewsDocument>(processor.name);
      const rxIn = upstream;
      const stageLogger = createChildLogger({ stage: processor.name });
      tasks.push(runGuarded(processor.name, stageLogger, () => processor.run(rxIn, tx), { tx, rx: rxIn }));
      upstream = rx;
    }
    const terminal = upstream;

    for (const retriever of retrievers) {
      const tx = intakeTx.clone();
      const stageLogger = createChildLogger({ stage: retriever.name });
      tasks.push(runGuarded(retriever.name, stageLogger, () => retriever.run(tx), { tx }));
    }

    // the retrievers hold the only remaining intake senders now
    intakeTx.close();

    let processed = 0;
    let committed = 0;
    const buffer: NewsDocument[] = [];
    try {
      for await (const doc of terminal) {
        processed++;
        buffer.push(doc);
        if (buffer.length >= this.batchSize) {
          committed += this.flush(buffer);
        }
      }
      committed += this.flush(buffer);

      const outcomes = await Promise.all(tasks);
      const failedStages = outcomes.flatMap((outcome) => (outcome ? [outcome.stage] : []));

      logger.info({ processed, committed, failedStages }, 'Pipeline finished');
      return { processed, committed, failedStages };
    } finally {
      if (this.ownsStore) {
        this.completionStore.close();
      }
    }
  }
}
