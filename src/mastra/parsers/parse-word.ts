import mammoth from 'mammoth';
import type { TextPage } from '../schemas';

// DOCX carries no page boundaries, so the whole body is one page.
export async function parseWord(bytes: Uint8Array): Promise<TextPage[]> {
  const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  return [{ pageNumber: 1, text: result.value }];
}
