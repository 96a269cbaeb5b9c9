import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { newDocument } from '../src/server/models/Document.js';
import type { NewsDocument } from '../src/server/models/Document.js';
import type { Sender } from '../src/server/pipeline/Channel.js';
import { CompletionStore } from '../src/server/pipeline/CompletionStore.js';
import { StageRegistry, createDefaultRegistry } from '../src/server/pipeline/StageRegistry.js';
import { USAGE, main } from '../src/server/scripts/newslookout.js';
import { ShutdownCoordinator } from '../src/server/utils/shutdownCoordinator.js';
import { makeTempDir, removeDir } from './helpers.js';

function fakeRegistry(): StageRegistry {
  return createDefaultRegistry().registerRetriever('mod_fake', (ctx) => ({
    kind: 'retriever',
    name: ctx.descriptor.name,
    run: async (tx: Sender<NewsDocument>) => {
      tx.send(newDocument({ module: ctx.descriptor.name, url: 'https://w.example/one', title: 'One' }, 0));
      tx.close();
    },
  }));
}

describe('newslookout command', () => {
  let dir: string;
  let stderr: { write: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    dir = makeTempDir();
    stderr = { write: vi.fn(() => true) };
  });

  afterEach(() => {
    removeDir(dir);
  });

  function writeConfig(lines: string[]): string {
    const file = path.join(dir, 'newslookout.toml');
    fs.writeFileSync(
      file,
      [`data_dir = "${dir}"`, `completed_urls_datafile = "${path.join(dir, 'urls.db')}"`, ...lines, ''].join('\n')
    );
    return file;
  }

  it('prints usage and exits with 2 without a configuration path', async () => {
    await expect(main([], { stderr })).resolves.toBe(2);
    expect(stderr.write).toHaveBeenCalledWith(USAGE);
  });

  it('exits with 1 when the configuration cannot be read', async () => {
    await expect(main([path.join(dir, 'absent.toml')], { env: {}, stderr })).resolves.toBe(1);
  });

  it('exits with 1 when a stage rejects its options', async () => {
    const file = writeConfig([
      '[[plugins]]',
      'name = "split_text"',
      'type = "data_processor"',
      'enabled = true',
      'previous_part_overlap = -1',
    ]);

    await expect(main([file], { env: {}, registry: fakeRegistry() })).resolves.toBe(1);
  });

  it('runs the configured pipeline and exits with 0', async () => {
    const file = writeConfig([
      '[[plugins]]',
      'name = "mod_fake"',
      'type = "retriever"',
      'enabled = true',
      '',
      '[[plugins]]',
      'name = "mod_persist_data"',
      'type = "data_processor"',
      'enabled = true',
    ]);

    await expect(main([file], { env: {}, registry: fakeRegistry() })).resolves.toBe(0);

    const store = new CompletionStore(path.join(dir, 'urls.db'));
    try {
      expect(store.loadFor('mod_fake')).toEqual(new Set(['https://w.example/one']));
    } finally {
      store.close();
    }
    expect(fs.readdirSync(dir).filter((name) => name.endsWith('.json'))).toHaveLength(1);
  });
});

describe('ShutdownCoordinator', () => {
  it('runs operations in order and continues past failures', async () => {
    const exit = vi.fn();
    const coordinator = new ShutdownCoordinator(1000, exit);
    const order: string[] = [];
    coordinator.register('first', () => {
      order.push('first');
      throw new Error('cannot close');
    });
    coordinator.register('second', async () => {
      order.push('second');
    });

    await coordinator.shutdown('SIGTERM');

    expect(order).toEqual(['first', 'second']);
    expect(coordinator.isShuttingDown).toBe(true);
    expect(exit).not.toHaveBeenCalled();
  });

  it('runs the operations only once', async () => {
    const coordinator = new ShutdownCoordinator(1000, vi.fn());
    const handler = vi.fn();
    coordinator.register('store', handler);

    await coordinator.shutdown();
    await coordinator.shutdown();

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('abandons an operation that exceeds its timeout', async () => {
    const coordinator = new ShutdownCoordinator(1000, vi.fn());
    const after = vi.fn();
    coordinator.register('hang', () => new Promise<void>(() => undefined), 10);
    coordinator.register('after', after);

    await coordinator.shutdown();

    expect(after).toHaveBeenCalledTimes(1);
  });

  it('exits with 130 after an interrupt', async () => {
    const exit = vi.fn();
    const coordinator = new ShutdownCoordinator(1000, exit);
    const remove = coordinator.installSignalHandlers(['SIGUSR2']);
    try {
      process.emit('SIGUSR2', 'SIGUSR2');
      await vi.waitFor(() => expect(exit).toHaveBeenCalledWith(130));
    } finally {
      remove();
    }
  });
});
