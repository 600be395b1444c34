import JSZip from 'jszip';
import * as XLSX from 'xlsx';
import { describe, expect, it } from 'vitest';
import { ContentExtractor } from '../src/mastra/ingest/content-extractor';
import { createArtifacts } from '../src/mastra/ingest/artifacts';
import { ExtractionError, UnsupportedArtifactError } from '../src/mastra/lib/errors';
import { slideText } from '../src/mastra/parsers/parse-presentation';
import { tableFromRows } from '../src/mastra/parsers/parse-spreadsheet';
import type { ArtifactInput } from '../src/mastra/schemas';
import { bytes, FakeImageReader } from './helpers';

const slideXml = (...paragraphs: string[][]) =>
  `<?xml version="1.0" encoding="UTF-8"?><p:sld><p:cSld><p:spTree><p:sp><p:txBody><a:bodyPr/>` +
  paragraphs.map((runs) => `<a:p><a:pPr lvl="0"/>${runs.map((run) => `<a:r><a:rPr lang="en-US"/><a:t>${run}</a:t></a:r>`).join('')}</a:p>`).join('') +
  `</p:txBody></p:sp></p:spTree></p:cSld></p:sld>`;

async function extract(input: ArtifactInput, reader = new FakeImageReader('')) {
  const [intake] = createArtifacts([input]);
  if (!intake.ok) throw intake.error;
  return new ContentExtractor({ imageReader: reader }).extract(intake.value);
}

describe('ContentExtractor', () => {
  it('reads a plain-text document as one page', async () => {
    const result = await extract({ name: 'notes.md', bytes: bytes('\uFEFF# Agenda\nKick-off at nine.') });
    expect(result).toEqual({ ok: true, value: { type: 'text', pages: [{ pageNumber: 1, text: '# Agenda\nKick-off at nine.' }] } });
  });

  it('reads a CSV file as a table', async () => {
    const result = await extract({ name: 'sales.csv', bytes: bytes('Region,Revenue\nNorth,1200\nSouth,800\n') });
    expect(result.ok).toBe(true);
    if (result.ok && result.value.type === 'table') {
      expect(result.value.table.columns).toEqual(['Region', 'Revenue']);
      expect(result.value.table.rows).toEqual([
        ['North', 1200],
        ['South', 800],
      ]);
    } else {
      throw new Error('expected a table');
    }
  });

  it('decodes CSV text as UTF-8', async () => {
    const result = await extract({ name: 'städte.csv', bytes: bytes('Stadt,Temp\nZürich,12\nSão Paulo,25\n') });

    expect(result.ok && result.value.type === 'table' && result.value.table).toMatchObject({
      columns: ['Stadt', 'Temp'],
      rows: [
        ['Zürich', 12],
        ['São Paulo', 25],
      ],
    });
  });

  it('takes the first non-empty sheet and repairs its header', async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([]), 'Cover');
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.aoa_to_sheet([
        ['Name', 'Name', ''],
        ['Ada', 'Lovelace', 1815],
        [],
        ['Alan', 'Turing'],
      ]),
      'People',
    );
    const data = new Uint8Array(XLSX.write(workbook, { type: 'array', bookType: 'xlsx' }));

    const result = await extract({ name: 'people.xlsx', bytes: data });

    expect(result).toEqual({
      ok: true,
      value: {
        type: 'table',
        table: {
          name: 'People',
          columns: ['Name', 'Name_2', 'column_3'],
          rows: [
            ['Ada', 'Lovelace', 1815],
            ['Alan', 'Turing', null],
          ],
        },
      },
    });
  });

  it('reads presentation slides in slide-number order', async () => {
    const zip = new JSZip();
    zip.file('ppt/slides/slide10.xml', slideXml(['Tenth']));
    zip.file('ppt/slides/slide2.xml', slideXml(['Second']));
    zip.file('ppt/slides/slide1.xml', slideXml(['Q3 ', 'results'], ['Revenue &amp; costs']));
    zip.file('ppt/slides/_rels/slide1.xml.rels', '<Relationships/>');
    const data = await zip.generateAsync({ type: 'uint8array' });

    const result = await extract({ name: 'deck.pptx', bytes: data });

    expect(result).toEqual({
      ok: true,
      value: {
        type: 'text',
        pages: [
          { pageNumber: 1, text: 'Q3 results\nRevenue & costs' },
          { pageNumber: 2, text: 'Second' },
          { pageNumber: 3, text: 'Tenth' },
        ],
      },
    });
  });

  it('sends images to the image reader with a MIME type from the extension', async () => {
    const reader = new FakeImageReader('Invoice total: 42 EUR');
    const result = await extract({ name: 'scan.PNG', bytes: new Uint8Array([1, 2, 3]) }, reader);

    expect(result).toEqual({ ok: true, value: { type: 'text', pages: [{ pageNumber: 1, text: 'Invoice total: 42 EUR' }] } });
    expect(reader.calls).toEqual([{ mimeType: 'image/png', size: 3 }]);
  });

  it('rejects unknown kinds', async () => {
    const result = await extract({ name: 'archive.zip', bytes: new Uint8Array([80, 75]) });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UnsupportedArtifactError);
      expect(result.error.message).toBe('Unsupported file type: archive.zip');
    }
  });

  it('rejects a document format it has no parser for', async () => {
    const result = await extract({ name: 'notes.rtf', bytes: bytes('{\\rtf1 hi}'), kind: 'document' });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('unsupported_artifact');
      expect(result.error.message).toBe('Unsupported file type: notes.rtf (unrecognised document format)');
    }
  });

  it('wraps parser failures in ExtractionError', async () => {
    const result = await extract({ name: 'broken.pptx', bytes: bytes('not a zip archive') });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ExtractionError);
      expect(result.error.message).toMatch(/^Failed to extract content from broken\.pptx: /);
    }
  });
});

describe('slideText', () => {
  it('decodes entities and skips empty paragraphs', () => {
    expect(slideText(slideXml(['&lt;b&gt; &#169; &#x41;']))).toBe('<b> © A');
    expect(slideText(slideXml([''], ['kept']))).toBe('kept');
  });
});

describe('tableFromRows', () => {
  it('handles more rows than fit in an argument list', () => {
    const raw = Array.from({ length: 300_001 }, (_, i) => (i === 0 ? ['n'] : [i]));
    const table = tableFromRows('Big', raw);

    expect(table?.columns).toEqual(['n']);
    expect(table?.rows).toHaveLength(300_000);
    expect(table?.rows[299_999]).toEqual([300_000]);
  });
});
