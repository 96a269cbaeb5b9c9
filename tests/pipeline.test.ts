import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { deserializeDocument, newDocument } from '../src/server/models/Document.js';
import type { NewsDocument } from '../src/server/models/Document.js';
import type { Sender } from '../src/server/pipeline/Channel.js';
import { CompletionStore } from '../src/server/pipeline/CompletionStore.js';
import { PipelineOrchestrator, extractStageDescriptors, orderProcessors } from '../src/server/pipeline/PipelineOrchestrator.js';
import { StageRegistry, createDefaultRegistry } from '../src/server/pipeline/StageRegistry.js';
import type { RetrieverStage } from '../src/server/pipeline/types.js';
import { RbiRetriever } from '../src/server/services/retrievers/RbiRetriever.js';
import { InMemoryFetcher, makeTempDir, removeDir, stageContext, testConfig } from './helpers.js';

/**
 * Sends a fixed list of documents, then optionally fails
 */
class ListRetriever implements RetrieverStage {
  readonly kind = 'retriever' as const;

  constructor(
    readonly name: string,
    private readonly docs: NewsDocument[],
    private readonly failure?: Error
  ) {}

  async run(tx: Sender<NewsDocument>): Promise<void> {
    try {
      for (const doc of this.docs) {
        tx.send(doc);
      }
      if (this.failure) {
        throw this.failure;
      }
    } finally {
      tx.close();
    }
  }
}

function docFor(module: string, n: number): NewsDocument {
  return newDocument(
    {
      module,
      section_name: 'News',
      url: `https://w.example/${module}/${n}`,
      title: `Item ${n}`,
      text: `Body of item ${n}.\n\nSecond paragraph.`,
    },
    0
  );
}

describe('extractStageDescriptors', () => {
  it('separates plugin-local options from the common keys', () => {
    const descriptors = extractStageDescriptors([
      { name: 'rbi', type: 'retriever', enabled: true, priority: 99, maxpages: 2 },
      { name: 'split_text', type: 'data_processor', enabled: false, priority: 1 },
    ]);

    expect(descriptors).toEqual([
      { name: 'rbi', kind: 'retriever', enabled: true, priority: 99, options: { maxpages: 2 }, index: 0 },
      { name: 'split_text', kind: 'processor', enabled: false, priority: 1, options: {}, index: 1 },
    ]);
  });
});

describe('orderProcessors', () => {
  it('sorts by ascending priority', () => {
    const ordered = orderProcessors([
      { name: 'a', priority: 10, index: 0 },
      { name: 'b', priority: -20, index: 1 },
      { name: 'c', priority: 2, index: 2 },
    ]);

    expect(ordered.map((d) => d.priority)).toEqual([-20, 2, 10]);
  });

  it('keeps configuration order for equal priorities', () => {
    const ordered = orderProcessors([
      { name: 'late', priority: 5, index: 0 },
      { name: 'first', priority: 1, index: 1 },
      { name: 'early', priority: 5, index: 2 },
    ]);

    expect(ordered.map((d) => d.name)).toEqual(['first', 'late', 'early']);
  });
});

describe('StageRegistry', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('registers every built-in stage', () => {
    expect(createDefaultRegistry().names()).toEqual([
      'mod_chatgpt',
      'mod_classify',
      'mod_cmdline',
      'mod_dataprep',
      'mod_dedupe',
      'mod_en_in_rbi',
      'mod_gemini',
      'mod_generic_retriever',
      'mod_offline_docs',
      'mod_ollama',
      'mod_persist_data',
      'mod_solrsubmit',
      'mod_summarize',
      'mod_vectorstore',
      'rbi',
      'split_text',
    ]);
  });

  it('creates the aliased stage under the configured name', () => {
    const registry = createDefaultRegistry({ fetcher: new InMemoryFetcher({}) });
    const ctx = stageContext(testConfig(dir), 'rbi', {}, 'retriever');

    const stage = registry.create(ctx.descriptor, ctx);

    expect(stage).toBeInstanceOf(RbiRetriever);
    expect(stage?.name).toBe('rbi');
  });

  it('returns nothing for unknown names', () => {
    const registry = createDefaultRegistry();
    const ctx = stageContext(testConfig(dir), 'mod_unknown');

    expect(registry.has('mod_unknown')).toBe(false);
    expect(registry.has('rbi')).toBe(true);
    expect(registry.create(ctx.descriptor, ctx)).toBeUndefined();
  });

  it('uses the registered kind when the configured type disagrees', () => {
    const ctx = stageContext(testConfig(dir), 'split_text', {}, 'retriever');

    expect(createDefaultRegistry().create(ctx.descriptor, ctx)?.kind).toBe('processor');
  });

  it('refuses an alias of an unregistered stage', () => {
    expect(() => new StageRegistry().alias('x', 'mod_missing')).toThrow("no stage registered as 'mod_missing'");
  });
});

describe('PipelineOrchestrator', () => {
  let dir: string;
  let store: CompletionStore;

  beforeEach(() => {
    dir = makeTempDir();
    store = new CompletionStore(path.join(dir, 'completed.db'));
  });

  afterEach(() => {
    store.close();
    removeDir(dir);
  });

  function jsonFiles(): string[] {
    return fs
      .readdirSync(dir)
      .filter((name) => name.endsWith('.json'))
      .sort();
  }

  it('runs retrievers through the ordered processors into the completion store', async () => {
    const registry = createDefaultRegistry().registerRetriever(
      'mod_fake',
      (ctx) => new ListRetriever(ctx.descriptor.name, [docFor('mod_fake', 1), docFor('mod_fake', 2)])
    );
    const config = testConfig(dir, {
      plugins: [
        { name: 'mod_fake', type: 'retriever', enabled: true },
        { name: 'mod_persist_data', type: 'data_processor', enabled: true, priority: 99 },
        { name: 'split_text', type: 'data_processor', enabled: true, priority: 1, min_word_limit_to_split: 3, previous_part_overlap: 0 },
        { name: 'mod_not_installed', type: 'data_processor', enabled: true, priority: 5 },
        { name: 'mod_classify', type: 'data_processor', enabled: false, priority: 2 },
      ],
    });

    const result = await new PipelineOrchestrator(config, { registry, completionStore: store }).run();

    expect(result).toEqual({ processed: 2, committed: 2, failedStages: [] });
    expect(store.countFor('mod_fake')).toBe(2);
    expect(store.loadFor('mod_fake')).toEqual(new Set(['https://w.example/mod_fake/1', 'https://w.example/mod_fake/2']));

    const files = jsonFiles();
    expect(files).toHaveLength(2);
    const saved = deserializeDocument(fs.readFileSync(path.join(dir, files[0]), 'utf8'));
    // split_text ran before persistence
    expect(saved.text_parts.map((part) => part.text)).toEqual(['Body of item 1.', 'Second paragraph.']);
  });

  it('finishes the other stages when one retriever fails', async () => {
    const registry = new StageRegistry()
      .registerRetriever('mod_broken', (ctx) => new ListRetriever(ctx.descriptor.name, [docFor('mod_broken', 1)], new Error('site down')))
      .registerRetriever('mod_fake', (ctx) => new ListRetriever(ctx.descriptor.name, [docFor('mod_fake', 1), docFor('mod_fake', 2)]));
    const config = testConfig(dir, {
      plugins: [
        { name: 'mod_broken', enabled: true },
        { name: 'mod_fake', enabled: true },
      ],
    });

    const result = await new PipelineOrchestrator(config, { registry, completionStore: store }).run();

    expect(result).toEqual({ processed: 3, committed: 3, failedStages: ['mod_broken'] });
  });

  it('drains the chain when a processor fails', async () => {
    const registry = createDefaultRegistry()
      .registerRetriever('mod_fake', (ctx) => new ListRetriever(ctx.descriptor.name, [docFor('mod_fake', 1), docFor('mod_fake', 2)]))
      .registerProcessor('boom', (ctx) => ({
        kind: 'processor',
        name: ctx.descriptor.name,
        run: async (rx) => {
          for await (const doc of rx) {
            throw new Error(`cannot process ${doc.url}`);
          }
        },
      }));
    const config = testConfig(dir, {
      plugins: [
        { name: 'mod_fake', type: 'retriever', enabled: true },
        { name: 'split_text', type: 'data_processor', enabled: true, priority: 1 },
        { name: 'boom', type: 'data_processor', enabled: true, priority: 2 },
        { name: 'mod_dataprep', type: 'data_processor', enabled: true, priority: 3 },
      ],
    });

    const result = await new PipelineOrchestrator(config, { registry, completionStore: store }).run();

    expect(result).toEqual({ processed: 0, committed: 0, failedStages: ['boom'] });
    expect(store.countFor('mod_fake')).toBe(0);
  }, 2000);

  it('commits a url only once when it arrives twice', async () => {
    const registry = new StageRegistry().registerRetriever(
      'mod_fake',
      (ctx) => new ListRetriever(ctx.descriptor.name, [docFor('mod_fake', 1), docFor('mod_fake', 1), docFor('mod_fake', 2)])
    );
    const config = testConfig(dir, { plugins: [{ name: 'mod_fake', enabled: true }] });

    const result = await new PipelineOrchestrator(config, { registry, completionStore: store, batchSize: 2 }).run();

    expect(result).toEqual({ processed: 3, committed: 2, failedStages: [] });
    expect(store.countFor('mod_fake')).toBe(2);
  });

  it('ends every processor in a chain once the retrievers finish', async () => {
    const registry = createDefaultRegistry().registerRetriever(
      'mod_fake',
      (ctx) => new ListRetriever(ctx.descriptor.name, [docFor('mod_fake', 1), docFor('mod_fake', 2)])
    );
    const config = testConfig(dir, {
      plugins: [
        { name: 'mod_fake', type: 'retriever', enabled: true },
        { name: 'mod_vectorstore', type: 'data_processor', enabled: true, priority: 3 },
        { name: 'mod_solrsubmit', type: 'data_processor', enabled: true, priority: 2 },
        { name: 'mod_dataprep', type: 'data_processor', enabled: true, priority: 1 },
      ],
    });

    const result = await new PipelineOrchestrator(config, { registry, completionStore: store }).run();

    expect(result).toEqual({ processed: 2, committed: 2, failedStages: [] });
  }, 2000);

  it('ends with nothing processed when no stage is enabled', async () => {
    const config = testConfig(dir, { plugins: [{ name: 'mod_fake', enabled: false }] });

    const result = await new PipelineOrchestrator(config, { registry: new StageRegistry(), completionStore: store }).run();

    expect(result).toEqual({ processed: 0, committed: 0, failedStages: [] });
  });

  it('opens and closes its own store when none is given', async () => {
    const registry = new StageRegistry().registerRetriever(
      'mod_fake',
      (ctx) => new ListRetriever(ctx.descriptor.name, [docFor('mod_fake', 1)])
    );
    const config = testConfig(dir, {
      completed_urls_datafile: path.join(dir, 'own.db'),
      plugins: [{ name: 'mod_fake', enabled: true }],
    });

    await new PipelineOrchestrator(config, { registry }).run();

    const reopened = new CompletionStore(path.join(dir, 'own.db'));
    try {
      expect(reopened.countFor('mod_fake')).toBe(1);
    } finally {
      reopened.close();
    }
  });
});
