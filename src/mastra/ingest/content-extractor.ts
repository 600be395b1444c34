import { fileExtension } from '../config/artifact-kinds';
import { ExtractionError, UnsupportedArtifactError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { err, ok, type Result } from '../lib/result';
import type { CompletionOptions } from '../llm/language-model';
import type { ImageTextReader } from '../llm/image-reader';
import { parseImage } from '../parsers/parse-image';
import { parsePdf } from '../parsers/parse-pdf';
import { parsePresentation } from '../parsers/parse-presentation';
import { parseSpreadsheet } from '../parsers/parse-spreadsheet';
import { parseText } from '../parsers/parse-text';
import { parseWord } from '../parsers/parse-word';
import type { Artifact, ArtifactKind, ExtractedContent, TextPage } from '../schemas';

export type ExtractionFailure = UnsupportedArtifactError | ExtractionError;

type KnownKind = Exclude<ArtifactKind, 'unknown'>;

type KindHandler = (artifact: Artifact, options: CompletionOptions) => Promise<ExtractedContent>;

const IMAGE_MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
};

const WORD_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

function documentFormat(artifact: Artifact): 'pdf' | 'docx' | 'text' | undefined {
  const extension = fileExtension(artifact.name);
  if (extension === 'pdf' || artifact.mimeType === 'application/pdf') return 'pdf';
  if (extension === 'docx' || artifact.mimeType === WORD_MIME) return 'docx';
  if (extension === 'txt' || extension === 'md' || artifact.mimeType?.startsWith('text/')) return 'text';
  return undefined;
}

const isDelimitedText = (artifact: Artifact) =>
  fileExtension(artifact.name) === 'csv' || (artifact.mimeType?.startsWith('text/') ?? false);

const textContent = (pages: TextPage[]): ExtractedContent => ({ type: 'text', pages });

export interface ContentExtractorOptions {
  imageReader: ImageTextReader;
  logger?: Logger;
}

/**
 * Converts one artifact into page text or a table. One handler per artifact kind;
 * `unknown` (and unrecognised document formats) are rejected with UnsupportedArtifactError.
 */
export class ContentExtractor {
  private readonly handlers: Record<KnownKind, KindHandler>;
  private readonly logger?: Logger;

  constructor(options: ContentExtractorOptions) {
    this.logger = options.logger;
    const { imageReader } = options;

    this.handlers = {
      document: async (artifact) => {
        const format = documentFormat(artifact);
        if (format === 'pdf') return textContent(await parsePdf(artifact.bytes));
        if (format === 'docx') return textContent(await parseWord(artifact.bytes));
        if (format === 'text') return textContent(parseText(artifact.bytes));
        throw new UnsupportedArtifactError(artifact.name, 'unrecognised document format');
      },
      spreadsheet: async (artifact) => ({
        type: 'table',
        table: parseSpreadsheet(artifact.bytes, { text: isDelimitedText(artifact) }),
      }),
      presentation: async (artifact) => textContent(await parsePresentation(artifact.bytes)),
      image: async (artifact, options) => {
        const mimeType = artifact.mimeType ?? IMAGE_MIME_TYPES[fileExtension(artifact.name)] ?? 'image/png';
        return textContent(await parseImage(artifact.bytes, mimeType, imageReader, options));
      },
    };
  }

  async extract(
    artifact: Artifact,
    options: CompletionOptions = {},
  ): Promise<Result<ExtractedContent, ExtractionFailure>> {
    if (artifact.kind === 'unknown') {
      return err(new UnsupportedArtifactError(artifact.name));
    }

    try {
      const content = await this.handlers[artifact.kind](artifact, options);
      this.logger?.debug(`Extracted ${artifact.name}`, {
        artifactId: artifact.id,
        kind: artifact.kind,
        ...(content.type === 'text'
          ? { pages: content.pages.length }
          : { columns: content.table.columns.length, rows: content.table.rows.length }),
      });
      return ok(content);
    } catch (error) {
      if (error instanceof UnsupportedArtifactError) return err(error);
      return err(new ExtractionError(artifact.name, error));
    }
  }
}
