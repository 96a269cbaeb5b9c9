/**
 * Pipeline stage contracts
 *
 * A stage is either a retriever (producer into the intake channel) or a processor (one link of
 * the priority-ordered chain). Stages are created by factories held in the StageRegistry.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../config/appConfig.js';
import type { NewsDocument } from '../models/Document.js';
import type { Receiver, Sender } from './Channel.js';

export type StageKind = 'retriever' | 'processor';

export interface StageDescriptor {
  name: string;
  kind: StageKind;
  enabled: boolean;
  /** Smaller values run earlier in the processor chain */
  priority: number;
  /** Plugin-local keys from the configuration table */
  options: Record<string, unknown>;
  /** Position in the configuration file, used to break priority ties */
  index: number;
}

/**
 * Read side of the completion store, as seen by retrievers
 */
export interface CompletionLookup {
  loadFor(plugin: string): Set<string>;
}

export interface StageContext {
  config: AppConfig;
  descriptor: StageDescriptor;
  logger: Logger;
  completionStore: CompletionLookup;
}

export interface RetrieverStage {
  readonly kind: 'retriever';
  readonly name: string;
  /**
   * Discover documents and send them into the intake channel. Must close `tx` before returning.
   */
  run(tx: Sender<NewsDocument>): Promise<void>;
}

export interface ProcessorStage {
  readonly kind: 'processor';
  readonly name: string;
  /**
   * Forward every document received on `rx` to `tx` exactly once, then close `tx`.
   */
  run(rx: Receiver<NewsDocument>, tx: Sender<NewsDocument>): Promise<void>;
}

export type Stage = RetrieverStage | ProcessorStage;

export type RetrieverFactory = (ctx: StageContext) => RetrieverStage;
export type ProcessorFactory = (ctx: StageContext) => ProcessorStage;

export type StageRegistration =
  | { kind: 'retriever'; create: RetrieverFactory }
  | { kind: 'processor'; create: ProcessorFactory };
