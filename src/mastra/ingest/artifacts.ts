import { detectArtifactKind } from '../config/artifact-kinds';
import { InvalidArtifactError } from '../lib/errors';
import { err, ok, type Result } from '../lib/result';
import { artifactInputSchema, type Artifact, type ArtifactInput } from '../schemas';

/** `Q3 Report.pdf` → `q3_report_pdf` */
export function artifactIdFromName(name: string): string {
  const slug = name
    .normalize('NFKD')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'file';
}

/**
 * Validates uploads and assigns ids, one result per input in input order. Ids already in
 * `taken` (and earlier ids in the same batch) are never reused: collisions get `_2`, `_3`,
 * ... suffixes. A rejected upload gets no id and leaves the rest of the batch alone.
 */
export function createArtifacts(
  inputs: ArtifactInput[],
  taken: Iterable<string> = [],
): Array<Result<Artifact, InvalidArtifactError>> {
  const used = new Set(taken);
  return inputs.map((input) => {
    const parsed = artifactInputSchema.safeParse(input);
    if (!parsed.success) {
      const name = typeof input.name === 'string' ? input.name : '';
      return err(new InvalidArtifactError(name, parsed.error.issues.map((issue) => issue.message)));
    }

    const { name, bytes, mimeType, kind } = parsed.data;
    const base = artifactIdFromName(name);
    let id = base;
    for (let n = 2; used.has(id); n++) id = `${base}_${n}`;
    used.add(id);
    return ok({ id, name, bytes, mimeType, kind: kind ?? detectArtifactKind(name, mimeType) });
  });
}
