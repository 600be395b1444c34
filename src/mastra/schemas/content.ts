import { z } from 'zod';

export const textPageSchema = z.object({
  pageNumber: z.number().int().positive(),
  text: z.string(),
});

export const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const tableSchema = z.object({
  name: z.string().describe('Sheet name'),
  columns: z.array(z.string()),
  rows: z.array(z.array(cellValueSchema)),
});

export const plainTextContentSchema = z.object({
  type: z.literal('text'),
  pages: z.array(textPageSchema),
});

export const tableContentSchema = z.object({
  type: z.literal('table'),
  table: tableSchema,
});

export const extractedContentSchema = z.discriminatedUnion('type', [
  plainTextContentSchema,
  tableContentSchema,
]);

export const chunkSchema = z.object({
  id: z.string(),
  artifactId: z.string(),
  pageNumber: z.number().int().positive(),
  index: z.number().int().nonnegative().describe('Position among the chunks of its page'),
  start: z.number().int().nonnegative().describe('Character offset within the page text'),
  text: z.string(),
});

export type TextPage = z.infer<typeof textPageSchema>;
export type CellValue = z.infer<typeof cellValueSchema>;
export type Table = z.infer<typeof tableSchema>;
export type PlainTextContent = z.infer<typeof plainTextContentSchema>;
export type TableContent = z.infer<typeof tableContentSchema>;
export type ExtractedContent = z.infer<typeof extractedContentSchema>;
export type Chunk = Readonly<z.infer<typeof chunkSchema>>;
