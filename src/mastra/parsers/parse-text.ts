import type { TextPage } from '../schemas';

export function parseText(bytes: Uint8Array): TextPage[] {
  const text = new TextDecoder('utf-8').decode(bytes).replace(/^\uFEFF/, '');
  return [{ pageNumber: 1, text }];
}
