import type { ArtifactKind } from '../schemas';

export const extensionKinds: Record<string, ArtifactKind> = {
  pdf: 'document',
  docx: 'document',
  txt: 'document',
  md: 'document',
  csv: 'spreadsheet',
  xlsx: 'spreadsheet',
  xls: 'spreadsheet',
  ods: 'spreadsheet',
  pptx: 'presentation',
  png: 'image',
  jpg: 'image',
  jpeg: 'image',
  webp: 'image',
  gif: 'image',
};

export const mimeKinds: Record<string, ArtifactKind> = {
  'application/pdf': 'document',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': 'document',
  'text/plain': 'document',
  'text/markdown': 'document',
  'text/csv': 'spreadsheet',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': 'spreadsheet',
  'application/vnd.ms-excel': 'spreadsheet',
  'application/vnd.oasis.opendocument.spreadsheet': 'spreadsheet',
  'application/vnd.openxmlformats-officedocument.presentationml.presentation': 'presentation',
  'image/png': 'image',
  'image/jpeg': 'image',
  'image/webp': 'image',
  'image/gif': 'image',
};

export function fileExtension(name: string): string {
  const match = /\.([a-z0-9]+)$/i.exec(name.trim());
  return match ? match[1].toLowerCase() : '';
}

export function detectArtifactKind(name: string, mimeType?: string): ArtifactKind {
  const byExtension = extensionKinds[fileExtension(name)];
  if (byExtension) return byExtension;
  const byMime = mimeType ? mimeKinds[mimeType.split(';')[0].trim().toLowerCase()] : undefined;
  return byMime ?? 'unknown';
}
