import { describeError, IndexBuildError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { err, ok, type Result } from '../lib/result';
import { withTimeout } from '../lib/timeout';
import type { EmbeddingProvider } from '../llm/embedding-provider';
import type { Chunk } from '../schemas';

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Exact nearest-neighbour search over one artifact's chunks. Read-only once built,
 * so concurrent queries need no locking.
 */
export class VectorIndex {
  private constructor(
    readonly embedderId: string,
    private readonly chunks: readonly Chunk[],
    private readonly vectors: readonly (readonly number[])[],
  ) {}

  get size(): number {
    return this.chunks.length;
  }

  get dimensions(): number {
    return this.vectors[0]?.length ?? 0;
  }

  /** Top `k` chunks by descending cosine similarity; ties keep chunk order. */
  search(queryVector: readonly number[], k: number): ScoredChunk[] {
    if (k <= 0) return [];
    return this.chunks
      .map((chunk, i) => ({ chunk, score: cosineSimilarity(queryVector, this.vectors[i]), order: i }))
      .sort((a, b) => b.score - a.score || a.order - b.order)
      .slice(0, k)
      .map(({ chunk, score }) => ({ chunk, score }));
  }

  static fromVectors(embedderId: string, chunks: readonly Chunk[], vectors: readonly (readonly number[])[]): VectorIndex {
    return new VectorIndex(embedderId, Object.freeze([...chunks]), Object.freeze(vectors.map((v) => Object.freeze([...v]))));
  }
}

export interface BuildIndexOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Embeds every chunk in one batch. Any failure (empty input, provider error, timeout,
 * ragged vectors) yields IndexBuildError and no index.
 */
export async function buildIndex(
  chunks: readonly Chunk[],
  embedder: EmbeddingProvider,
  options: BuildIndexOptions = {},
): Promise<Result<VectorIndex, IndexBuildError>> {
  if (chunks.length === 0) {
    return err(new IndexBuildError('Cannot build an index from zero chunks'));
  }

  let vectors: number[][];
  try {
    const texts = chunks.map((chunk) => chunk.text);
    vectors = options.timeoutMs
      ? await withTimeout((signal) => embedder.embedMany(texts, { signal }), options.timeoutMs, 'Embedding')
      : await embedder.embedMany(texts);
  } catch (error) {
    return err(new IndexBuildError(`Embedding failed: ${describeError(error)}`, { cause: error }));
  }

  if (vectors.length !== chunks.length) {
    return err(new IndexBuildError(`Embedder returned ${vectors.length} vectors for ${chunks.length} chunks`));
  }
  const dimensions = vectors[0].length;
  if (dimensions === 0 || vectors.some((vector) => vector.length !== dimensions)) {
    return err(new IndexBuildError('Embedder returned vectors of inconsistent or zero dimension'));
  }

  options.logger?.debug('Built vector index', { chunks: chunks.length, dimensions, embedder: embedder.id });
  return ok(VectorIndex.fromVectors(embedder.id, chunks, vectors));
}

/** Embeds `text` with the same provider the index was built with and returns the top `k` chunks. */
export async function queryIndex(
  index: VectorIndex,
  embedder: EmbeddingProvider,
  text: string,
  k: number,
  options: { signal?: AbortSignal } = {},
): Promise<ScoredChunk[]> {
  if (embedder.id !== index.embedderId) {
    throw new Error(`Index was built with ${index.embedderId} but queried with ${embedder.id}`);
  }
  const vector = await embedder.embed(text, options);
  return index.search(vector, k);
}
