/**
 * Shared fixtures: temporary directories, configuration, stage contexts and an in-memory
 * page fetcher
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { buildAppConfig } from '../src/server/config/appConfig.js';
import type { AppConfig } from '../src/server/config/appConfig.js';
import type { NewsDocument } from '../src/server/models/Document.js';
import { createChannel } from '../src/server/pipeline/Channel.js';
import type { Receiver } from '../src/server/pipeline/Channel.js';
import type { CompletionLookup, ProcessorStage, StageContext, StageKind } from '../src/server/pipeline/types.js';
import type { PageFetcher } from '../src/server/services/retrievers/PageFetcher.js';
import { createChildLogger } from '../src/server/utils/logger.js';

export function makeTempDir(prefix: string = 'newslookout-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Configuration rooted at `dir`, with no environment overrides
 */
export function testConfig(dir: string, table: Record<string, unknown> = {}): AppConfig {
  return buildAppConfig(
    {
      data_dir: dir,
      completed_urls_datafile: path.join(dir, 'completed.db'),
      retry_count: 1,
      retry_wait_fixed_sec: 0,
      ...table,
    },
    {},
    dir
  );
}

export const emptyCompletionLookup: CompletionLookup = {
  loadFor: () => new Set(),
};

export function stageContext(
  config: AppConfig,
  name: string,
  options: Record<string, unknown> = {},
  kind: StageKind = 'processor',
  completionStore: CompletionLookup = emptyCompletionLookup
): StageContext {
  return {
    config,
    descriptor: { name, kind, enabled: true, priority: 99, options, index: 0 },
    logger: createChildLogger({ stage: name }),
    completionStore,
  };
}

export async function collect<T>(rx: Receiver<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of rx) {
    items.push(item);
  }
  return items;
}

/**
 * Feed documents through one processor and collect what it forwards
 */
export async function runProcessor(processor: ProcessorStage, docs: NewsDocument[]): Promise<NewsDocument[]> {
  const [inTx, inRx] = createChannel<NewsDocument>('in');
  const [outTx, outRx] = createChannel<NewsDocument>('out');
  for (const doc of docs) {
    inTx.send(doc);
  }
  inTx.close();
  const [, forwarded] = await Promise.all([processor.run(inRx, outTx), collect(outRx)]);
  return forwarded;
}

/**
 * Serves pages from a map; unknown URLs fail like a 404
 */
export class InMemoryFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(
    private readonly pages: Record<string, string>,
    private readonly binaries: Record<string, Buffer> = {}
  ) {}

  fetchText(url: string): Promise<string> {
    this.requested.push(url);
    const page = this.pages[url];
    return page === undefined ? Promise.reject(new Error(`404 ${url}`)) : Promise.resolve(page);
  }

  fetchBinary(url: string): Promise<Buffer> {
    this.requested.push(url);
    const content = this.binaries[url];
    return content === undefined ? Promise.reject(new Error(`404 ${url}`)) : Promise.resolve(content);
  }
}

export function docUrls(docs: NewsDocument[]): string[] {
  return docs.map((doc) => doc.url);
}
