import { describe, it, expect } from 'vitest';
import {
  DataProcFlag,
  deserializeDocument,
  hasDataProcFlag,
  newDocument,
  serializeDocument,
  setPublishDate,
  toDocInfo,
} from '../src/server/models/Document.js';
import { ExtractionError } from '../src/server/types/errors.js';

describe('newDocument', () => {
  it('stamps both publish date fields from the given instant', () => {
    const doc = newDocument({ url: 'https://w.example/a' }, 1704412800000);
    expect(doc.publish_date_ms).toBe(1704412800000);
    expect(doc.publish_date).toBe('2024-01-05');
    expect(doc.text_parts).toEqual([]);
    expect(doc.data_proc_flags).toBe(0);
  });

  it('keeps an explicit publish_date_ms over the default instant', () => {
    const doc = newDocument({ publish_date_ms: 0 }, 1704412800000);
    expect(doc.publish_date).toBe('1970-01-01');
  });
});

describe('setPublishDate', () => {
  it('updates milliseconds and calendar date together', () => {
    const doc = newDocument({}, 0);
    setPublishDate(doc, 1704412800000);
    expect(doc.publish_date_ms).toBe(1704412800000);
    expect(doc.publish_date).toBe('2024-01-05');
  });
});

describe('hasDataProcFlag', () => {
  it('tests any of the given bits', () => {
    const doc = newDocument({ data_proc_flags: DataProcFlag.SUMMARIZE | DataProcFlag.CLASSIFY_MARKET });
    expect(hasDataProcFlag(doc, DataProcFlag.SUMMARIZE)).toBe(true);
    expect(hasDataProcFlag(doc, DataProcFlag.EXTRACT_ACTIONS)).toBe(false);
    expect(hasDataProcFlag(doc, DataProcFlag.EXTRACT_ACTIONS | DataProcFlag.CLASSIFY_MARKET)).toBe(true);
  });
});

describe('document serialization', () => {
  it('round-trips every field', () => {
    const doc = newDocument(
      {
        module: 'mod_en_in_rbi',
        plugin_name: 'Reserve Bank of India',
        section_name: 'Circular',
        url: 'https://w.example/circular-1',
        pdf_url: 'https://w.example/circular-1.pdf',
        filename: '/data/mod_en_in_rbi_Circular_circular-1_1_2024-01-05.json',
        html_content: '<div>Body</div>',
        title: 'Circular one',
        unique_id: 'DOR.1/2023-24',
        text: 'Body text',
        source_author: 'Reserve Bank of India',
        recipients: 'All banks',
        revision_dates: ['2024-01-06'],
        links_inward: ['https://w.example/list'],
        links_outwards: ['https://w.example/other'],
        text_parts: [{ id: '1', text: 'Body text', summary: 'A summary', insights: [] }],
        classification: { doc_type: 'regulatory-notification' },
        generated_content: { exec_summary: 'Summary' },
        data_proc_flags: DataProcFlag.SUMMARIZE,
      },
      1704412800000
    );

    expect(deserializeDocument(serializeDocument(doc))).toEqual(doc);
    expect(deserializeDocument(serializeDocument(doc, false))).toEqual(doc);
  });

  it('fills missing optional fields with defaults', () => {
    const doc = deserializeDocument('{"url":"https://w.example/a","publish_date_ms":0,"publish_date":"1970-01-01"}');
    expect(doc.url).toBe('https://w.example/a');
    expect(doc.title).toBe('');
    expect(doc.classification).toEqual({});
    expect(doc.text_parts).toEqual([]);
  });

  it('rejects text that is not JSON', () => {
    expect(() => deserializeDocument('not json', 'bad.json')).toThrow(ExtractionError);
  });

  it('rejects JSON without publish dates', () => {
    expect(() => deserializeDocument('{"url":"https://w.example/a"}')).toThrow(/JSON extraction failed: publish_date_ms/);
  });
});

describe('toDocInfo', () => {
  it('projects the listing fields', () => {
    const doc = newDocument({ url: 'https://w.example/a', title: 'A', plugin_name: 'P' }, 0);
    expect(toDocInfo(doc)).toEqual({
      plugin_name: 'P',
      section_name: '',
      url: 'https://w.example/a',
      pdf_url: '',
      title: 'A',
      unique_id: '',
      publish_date_ms: 0,
      filename: '',
    });
  });
});
