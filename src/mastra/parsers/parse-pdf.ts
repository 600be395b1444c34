import { createRequire } from 'module';
import type { TextPage } from '../schemas';

const require = createRequire(import.meta.url);

interface PdfTextItem {
  str?: string;
}

interface PdfPageProxy {
  getTextContent(): Promise<{ items: PdfTextItem[] }>;
}

type PdfParse = (
  data: Buffer,
  options?: { pagerender?: (page: PdfPageProxy) => Promise<string> },
) => Promise<{ numpages: number; text: string }>;

let pdfParse: PdfParse | undefined;

// The package entry point runs a self-test when loaded outside CommonJS; the library file does not.
function loadPdfParse(): PdfParse {
  if (!pdfParse) {
    const loaded: PdfParse = require('pdf-parse/lib/pdf-parse.js');
    pdfParse = loaded;
  }
  return pdfParse;
}

/** Extracts text page by page. pdf-parse renders pages in order, so the callback sees page 1 first. */
export async function parsePdf(bytes: Uint8Array): Promise<TextPage[]> {
  const pageTexts: string[] = [];

  await loadPdfParse()(Buffer.from(bytes), {
    pagerender: async (page) => {
      const content = await page.getTextContent();
      const text = content.items.map((item) => item.str ?? '').join(' ');
      pageTexts.push(text);
      return text;
    },
  });

  return pageTexts.map((text, i) => ({ pageNumber: i + 1, text }));
}
