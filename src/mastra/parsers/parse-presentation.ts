import JSZip from 'jszip';
import type { TextPage } from '../schemas';

const SLIDE_PATH = /^ppt\/slides\/slide(\d+)\.xml$/;
const PARAGRAPH = /<a:p[\s>][\s\S]*?<\/a:p>/g;
const TEXT_RUN = /<a:t(?:\s[^>]*)?>([\s\S]*?)<\/a:t>/g;

const XML_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) return String.fromCodePoint(parseInt(body.slice(2), 16));
    if (body.startsWith('#')) return String.fromCodePoint(parseInt(body.slice(1), 10));
    return XML_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

/** Text of one slide: text runs joined within a paragraph, paragraphs on separate lines. */
export function slideText(xml: string): string {
  const paragraphs: string[] = [];
  for (const paragraph of xml.match(PARAGRAPH) ?? []) {
    const runs = Array.from(paragraph.matchAll(TEXT_RUN), (match) => decodeXmlEntities(match[1]));
    const line = runs.join('');
    if (line.trim()) paragraphs.push(line);
  }
  return paragraphs.join('\n');
}

/** One page per slide, in slide-number order. */
export async function parsePresentation(bytes: Uint8Array): Promise<TextPage[]> {
  const zip = await JSZip.loadAsync(bytes);

  const slides = Object.keys(zip.files)
    .map((path) => ({ path, match: SLIDE_PATH.exec(path) }))
    .flatMap(({ path, match }) => (match ? [{ path, number: Number(match[1]) }] : []))
    .sort((a, b) => a.number - b.number);

  const pages: TextPage[] = [];
  for (const [i, slide] of slides.entries()) {
    const file = zip.file(slide.path);
    const xml = file ? await file.async('string') : '';
    pages.push({ pageNumber: i + 1, text: slideText(xml) });
  }
  return pages;
}
