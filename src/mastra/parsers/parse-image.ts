import type { CompletionOptions } from '../llm/language-model';
import type { ImageTextReader } from '../llm/image-reader';
import type { TextPage } from '../schemas';

export async function parseImage(
  bytes: Uint8Array,
  mimeType: string,
  reader: ImageTextReader,
  options: CompletionOptions = {},
): Promise<TextPage[]> {
  const text = await reader.readText(bytes, mimeType, options);
  return [{ pageNumber: 1, text }];
}
