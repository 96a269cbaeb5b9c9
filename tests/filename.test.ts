import { describe, it, expect } from 'vitest';
import { newDocument } from '../src/server/models/Document.js';
import { fnv1a64, makeUniqueFilename, sanitizeForFilename, urlResourceName } from '../src/server/utils/filename.js';

describe('fnv1a64', () => {
  it('hashes the empty string to the offset basis', () => {
    expect(fnv1a64('')).toBe('14695981039346656037');
  });

  it('hashes a single byte', () => {
    expect(fnv1a64('a')).toBe('12638187200555641996');
  });
});

describe('urlResourceName', () => {
  it('drops scheme, host and web suffix', () => {
    expect(urlResourceName('https://a.example/path/file.html')).toBe('path_file');
  });

  it('keeps the query string', () => {
    expect(urlResourceName('https://a.example/view.aspx?id=7')).toBe('view_aspx_id_7');
  });

  it('keeps only the last 64 characters', () => {
    const resource = urlResourceName(`https://a.example/${'x'.repeat(100)}`);
    expect(resource).toHaveLength(64);
  });
});

describe('sanitizeForFilename', () => {
  it('maps everything outside letters, digits, underscore and dash to underscore', () => {
    expect(sanitizeForFilename('Press Release/2024.v1-a_b')).toBe('Press_Release_2024_v1-a_b');
  });
});

describe('makeUniqueFilename', () => {
  const doc = newDocument({
    module: 'mod_x',
    section_name: 's',
    url: 'https://a.example/path/file.html',
    publish_date: '1970-01-01',
  });

  it('builds the name from module, section, resource, hash and date', () => {
    const filename = makeUniqueFilename(doc, 'json');
    expect(filename).toMatch(/^mod_x_s_.*file_\d+_1970-01-01\.json$/);
    expect(filename).toBe('mod_x_s_path_file_17537337222097136023_1970-01-01.json');
  });

  it('differs for documents that differ only in url', () => {
    const other = { ...doc, url: 'https://a.example/path/file.htm' };
    expect(makeUniqueFilename(other, 'json')).not.toBe(makeUniqueFilename(doc, 'json'));
  });
});
