import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { AppConfig } from '../src/server/config/appConfig.js';
import { DataProcFlag, deserializeDocument, newDocument } from '../src/server/models/Document.js';
import type { NewsDocument } from '../src/server/models/Document.js';
import { DocumentDatabase } from '../src/server/services/persistence/DocumentDatabase.js';
import { documentFilePath } from '../src/server/services/persistence/documentFiles.js';
import { ClassifyProcessor } from '../src/server/services/processors/ClassifyProcessor.js';
import { CmdlineProcessor } from '../src/server/services/processors/CmdlineProcessor.js';
import { DedupeProcessor } from '../src/server/services/processors/DedupeProcessor.js';
import { PassThroughProcessor } from '../src/server/services/processors/PassThroughProcessor.js';
import { PersistDataProcessor } from '../src/server/services/processors/PersistDataProcessor.js';
import { SplitTextProcessor } from '../src/server/services/processors/SplitTextProcessor.js';
import { docUrls, makeTempDir, removeDir, runProcessor, stageContext, testConfig } from './helpers.js';

function doc(url: string, fields: Partial<NewsDocument> = {}): NewsDocument {
  return newDocument({ module: 'mod_en_in_rbi', section_name: 'Circular', title: 'Title', url, ...fields }, 0);
}

describe('processors', () => {
  let dir: string;
  let config: AppConfig;

  beforeEach(() => {
    dir = makeTempDir();
    config = testConfig(dir);
  });

  afterEach(() => {
    removeDir(dir);
  });

  describe('split_text', () => {
    it('splits texts with the configured word limit', async () => {
      const processor = new SplitTextProcessor(
        stageContext(config, 'split_text', { min_word_limit_to_split: 2, previous_part_overlap: 0 })
      );

      const [result] = await runProcessor(processor, [doc('https://w.example/a', { text: 'one\n\ntwo\n\nthree\n\nfour' })]);

      expect(result.text_parts.map((part) => part.text)).toEqual(['one\n\ntwo', 'three\n\nfour']);
    });

    it('rejects a negative overlap', () => {
      expect(() => new SplitTextProcessor(stageContext(config, 'split_text', { previous_part_overlap: -1 }))).toThrow(
        "Invalid options for plugin 'split_text'"
      );
    });
  });

  describe('mod_classify', () => {
    it('fills missing classification keys when classification is requested', async () => {
      const processor = new ClassifyProcessor(stageContext(config, 'mod_classify'));
      const requested = doc('https://w.example/a', {
        data_proc_flags: DataProcFlag.CLASSIFY_MARKET,
        classification: { channel: 'branch' },
      });
      const notRequested = doc('https://w.example/b');

      const [first, second] = await runProcessor(processor, [requested, notRequested]);

      expect(first.classification).toEqual({
        channel: 'branch',
        customer_type: 'other',
        function: 'other',
        market_type: 'other',
        occupation: 'other',
        product_type: 'other',
      });
      expect(second.classification).toEqual({});
    });
  });

  describe('mod_dedupe', () => {
    it('counts repeated content and still forwards every document', async () => {
      const processor = new DedupeProcessor(stageContext(config, 'mod_dedupe'));

      const docs = await runProcessor(processor, [
        doc('https://w.example/a', { text: 'Same body text.' }),
        doc('https://w.example/b', { text: '  same   BODY text. ' }),
        doc('https://w.example/c', { text: 'Different body text.' }),
      ]);

      expect(docUrls(docs)).toEqual(['https://w.example/a', 'https://w.example/b', 'https://w.example/c']);
      expect(processor.duplicateCount).toBe(1);
    });
  });

  describe('pass-through stages', () => {
    it('forward documents in order', async () => {
      const processor = new PassThroughProcessor(stageContext(config, 'mod_vectorstore'));

      const docs = await runProcessor(processor, [doc('https://w.example/a'), doc('https://w.example/b')]);

      expect(docUrls(docs)).toEqual(['https://w.example/a', 'https://w.example/b']);
    });
  });

  describe('mod_persist_data', () => {
    it('writes JSON files and records the path in filename', async () => {
      const processor = new PersistDataProcessor(stageContext(config, 'mod_persist_data'));
      const input = doc('https://w.example/path/file', { text: 'Body.' });
      const expectedPath = documentFilePath(input, dir);

      const [result] = await runProcessor(processor, [input]);

      expect(result.filename).toBe(expectedPath);
      const saved = deserializeDocument(fs.readFileSync(expectedPath, 'utf8'));
      expect(saved.url).toBe('https://w.example/path/file');
      expect(saved.text).toBe('Body.');
      expect(saved.filename).toBe(expectedPath);
    });

    it('keeps the previous filename when the file cannot be written', async () => {
      const missingDir = { ...config, dataDir: path.join(dir, 'absent') };
      const processor = new PersistDataProcessor(stageContext(missingDir, 'mod_persist_data'));

      const [result] = await runProcessor(processor, [doc('https://w.example/a', { filename: '/data/earlier.json' })]);

      expect(result.filename).toBe('/data/earlier.json');
      expect(fs.existsSync(path.join(dir, 'absent'))).toBe(false);
    });

    it('stores documents in a database table', async () => {
      const databaseFile = path.join(dir, 'documents.db');
      const processor = new PersistDataProcessor(
        stageContext(config, 'mod_persist_data', { destination: 'database', database_file: databaseFile })
      );

      await runProcessor(processor, [doc('https://w.example/a'), doc('https://w.example/a'), doc('https://w.example/b')]);

      const database = new DocumentDatabase(databaseFile);
      try {
        expect(database.count()).toBe(2);
        const stored = database.getContent('https://w.example/b');
        expect(stored && deserializeDocument(stored).title).toBe('Title');
      } finally {
        database.close();
      }
    });

    it('forwards documents when the destination is unknown', async () => {
      const processor = new PersistDataProcessor(stageContext(config, 'mod_persist_data', { destination: 'queue' }));

      const docs = await runProcessor(processor, [doc('https://w.example/a')]);

      expect(docs).toHaveLength(1);
      expect(docs[0].filename).toBe('');
      expect(fs.readdirSync(dir).filter((name) => name.endsWith('.json'))).toEqual([]);
    });
  });

  describe('mod_cmdline', () => {
    function cmdline(commandName: string): CmdlineProcessor {
      return new CmdlineProcessor(stageContext(config, 'mod_cmdline', { command_name: commandName }));
    }

    it('runs the command with the document file as argument', async () => {
      // node executes the file it is given, so the document file doubles as the script
      const script = path.join(dir, 'mark.cjs');
      fs.writeFileSync(script, "require('fs').writeFileSync(__filename + '.done', 'ok');\n");

      await runProcessor(cmdline(process.execPath), [doc('https://w.example/a', { filename: script })]);

      expect(fs.readFileSync(`${script}.done`, 'utf8')).toBe('ok');
    });

    it('skips documents that were never written to a file', async () => {
      const script = path.join(dir, 'mark.cjs');
      fs.writeFileSync(script, "require('fs').writeFileSync(__filename + '.done', 'ok');\n");

      const docs = await runProcessor(cmdline(process.execPath), [doc('https://w.example/a')]);

      expect(docs).toHaveLength(1);
      expect(fs.existsSync(`${script}.done`)).toBe(false);
    });

    it('forwards the document when the command fails', async () => {
      const docs = await runProcessor(cmdline(path.join(dir, 'missing-command')), [
        doc('https://w.example/a', { filename: path.join(dir, 'a.json') }),
      ]);

      expect(docUrls(docs)).toEqual(['https://w.example/a']);
    });

    it('requires a command name', () => {
      expect(() => new CmdlineProcessor(stageContext(config, 'mod_cmdline'))).toThrow(
        "Invalid options for plugin 'mod_cmdline'"
      );
    });
  });
});
