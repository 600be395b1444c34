import { z } from 'zod';

export const artifactKindSchema = z.enum(['document', 'spreadsheet', 'presentation', 'image', 'unknown']);

export const artifactInputSchema = z.object({
  name: z
    .string({ invalid_type_error: 'file name is not a string' })
    .refine((name) => name.trim() !== '', 'file name is empty')
    .describe('Display name of the uploaded file, including its extension'),
  bytes: z.instanceof(Uint8Array, { message: 'file content is not a byte array' }).describe('Raw file payload'),
  mimeType: z.string().optional(),
  kind: artifactKindSchema.optional().describe('Overrides detection from name and MIME type'),
});

export const artifactSchema = z.object({
  id: z.string().min(1).describe('Slug derived from the display name'),
  name: z.string(),
  kind: artifactKindSchema,
  mimeType: z.string().optional(),
  bytes: z.instanceof(Uint8Array),
});

export type ArtifactKind = z.infer<typeof artifactKindSchema>;
export type ArtifactInput = z.input<typeof artifactInputSchema>;
export type Artifact = z.infer<typeof artifactSchema>;
