import JSZip from 'jszip';
import { ContentExtractor } from '../src/mastra/ingest/content-extractor';
import type { IngestDependencies } from '../src/mastra/ingest/ingest-artifacts';
import type { ImageTextReader } from '../src/mastra/llm/image-reader';
import { HashingEmbeddingProvider } from '../src/mastra/llm/embedding-provider';
import type { LanguageModel } from '../src/mastra/llm/language-model';
import type { SessionDependencies } from '../src/mastra/session/session-context';
import { TabularQueryAgent } from '../src/mastra/tabular/tabular-query-agent';

type Responder = (prompt: string, call: number) => string | Promise<string>;

/** LanguageModel whose replies come from a function; records every prompt. */
export class ScriptedModel implements LanguageModel {
  readonly prompts: string[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.respond(prompt, this.prompts.length - 1);
  }
}

/** Replies in order; the last reply repeats once the list runs out. */
export const replies = (...texts: string[]) => new ScriptedModel((_, call) => texts[Math.min(call, texts.length - 1)]);

export const action = (tool: string, input: string, thought = 'look it up') =>
  JSON.stringify({ thought, action: { tool, input } });

export const finalAnswer = (answer: string, thought = 'done') => JSON.stringify({ thought, final_answer: answer });

export class FakeImageReader implements ImageTextReader {
  readonly calls: Array<{ mimeType: string; size: number }> = [];

  constructor(private readonly text: string) {}

  async readText(image: Uint8Array, mimeType: string): Promise<string> {
    this.calls.push({ mimeType, size: image.length });
    return this.text;
  }
}

/** Answers with the first retrieved passage, like a model that quotes its best source. */
export const quotingAnswerModel = () =>
  new ScriptedModel((prompt) => /^\[1\] \(page \d+\) (.*)$/m.exec(prompt)?.[1] ?? 'The document does not say.');

/** Router that calls `tool` once, then answers with the observation it got back. */
export const oneShotRouter = (tool: string) =>
  new ScriptedModel((prompt) => {
    const observation = /^Observation: (.*)$/m.exec(prompt)?.[1];
    return observation ? finalAnswer(observation) : action(tool, 'When does the conference start?');
  });

export function testDependencies(overrides: Partial<SessionDependencies> = {}): SessionDependencies {
  const base: IngestDependencies = {
    extractor: new ContentExtractor({ imageReader: new FakeImageReader('') }),
    embedder: new HashingEmbeddingProvider(),
    answerModel: quotingAnswerModel(),
    tabularAgent: new TabularQueryAgent({
      model: replies('{"aggregate": {"op": "count"}}'),
      maxParseRetries: 1,
      timeoutMs: 1000,
      maxRows: 20,
    }),
    chunkSize: 200,
    chunkOverlap: 20,
    topK: 3,
    timeoutMs: 1000,
  };
  return {
    ...base,
    routerModel: replies(finalAnswer('unused')),
    maxIterations: 4,
    maxParseRetries: 1,
    ingestConcurrency: 2,
    ...overrides,
  };
}

export const bytes = (text: string) => new TextEncoder().encode(text);

/** A PDF with one line of Helvetica text per page; ASCII text without parentheses only. */
export function minimalPdf(pageTexts: string[]): Uint8Array {
  const fontId = 3;
  const pageIds = pageTexts.map((_, i) => 4 + i * 2);
  const objects: string[] = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    `<< /Type /Pages /Kids [${pageIds.map((id) => `${id} 0 R`).join(' ')}] /Count ${pageTexts.length} >>`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];
  pageTexts.forEach((text, i) => {
    const stream = `BT /F1 24 Tf 72 720 Td (${text}) Tj ET`;
    objects.push(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 ${fontId} 0 R >> >> /Contents ${pageIds[i] + 1} 0 R >>`,
      `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
    );
  });

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xref = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map((offset) => `${String(offset).padStart(10, '0')} 00000 n \n`).join('');
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xref}\n%%EOF\n`;
  return bytes(pdf);
}

/** A DOCX holding one paragraph per entry. */
export async function minimalDocx(paragraphs: string[]): Promise<Uint8Array> {
  const zip = new JSZip();
  zip.file(
    '[Content_Types].xml',
    '<?xml version="1.0" encoding="UTF-8"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">' +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>' +
      '</Types>',
  );
  zip.file(
    '_rels/.rels',
    '<?xml version="1.0" encoding="UTF-8"?><Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">' +
      '<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>' +
      '</Relationships>',
  );
  zip.file(
    'word/document.xml',
    '<?xml version="1.0" encoding="UTF-8"?><w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"><w:body>' +
      paragraphs.map((text) => `<w:p><w:r><w:t>${text}</w:t></w:r></w:p>`).join('') +
      '</w:body></w:document>',
  );
  return zip.generateAsync({ type: 'uint8array' });
}
