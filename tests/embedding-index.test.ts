import { describe, expect, it } from 'vitest';
import { IndexBuildError } from '../src/mastra/lib/errors';
import { HashingEmbeddingProvider, type EmbeddingProvider } from '../src/mastra/llm/embedding-provider';
import { chunkPages } from '../src/mastra/retrieval/chunker';
import { buildIndex, cosineSimilarity, queryIndex } from '../src/mastra/retrieval/embedding-index';

const sentences = [
  'The conference starts on 9 March in Lisbon.',
  'Registration fees are refunded until the end of January.',
  'Keynote speakers include two robotics researchers.',
  'Lunch is served on the rooftop terrace every day.',
  'Workshops require a laptop with a recent browser.',
];

const chunks = chunkPages(
  'guide',
  sentences.map((text, i) => ({ pageNumber: i + 1, text })),
  200,
  20,
);

class FailingEmbedder implements EmbeddingProvider {
  readonly id = 'failing';

  async embed(): Promise<number[]> {
    throw new Error('quota exceeded');
  }

  async embedMany(): Promise<number[][]> {
    throw new Error('quota exceeded');
  }
}

describe('cosineSimilarity', () => {
  it('is 1 for parallel, 0 for orthogonal and 0 for zero vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 12);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe('buildIndex', () => {
  it('fails on an empty chunk list', async () => {
    const result = await buildIndex([], new HashingEmbeddingProvider());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(IndexBuildError);
      expect(result.error.message).toBe('Cannot build an index from zero chunks');
    }
  });

  it('wraps provider failures in IndexBuildError', async () => {
    const result = await buildIndex(chunks, new FailingEmbedder());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(IndexBuildError);
      expect(result.error.message).toBe('Embedding failed: quota exceeded');
    }
  });

  it('rejects a provider that returns the wrong number of vectors', async () => {
    const short: EmbeddingProvider = {
      id: 'short',
      embed: async () => [1],
      embedMany: async () => [[1, 0]],
    };
    const result = await buildIndex(chunks, short);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Embedder returned 1 vectors for 5 chunks');
  });

  it('times out a slow provider', async () => {
    const slow: EmbeddingProvider = {
      id: 'slow',
      embed: async () => [1],
      embedMany: () => new Promise((resolve) => setTimeout(() => resolve([[1]]), 500)),
    };
    const result = await buildIndex(chunks.slice(0, 1), slow, { timeoutMs: 20 });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Embedding failed: Embedding timed out after 20ms');
  });
});

describe('queryIndex', () => {
  const embedder = new HashingEmbeddingProvider();

  it('returns each chunk as its own top hit', async () => {
    const built = await buildIndex(chunks, embedder);
    expect(built.ok).toBe(true);
    if (!built.ok) return;

    for (const chunk of chunks) {
      const [top] = await queryIndex(built.value, embedder, chunk.text, 1);
      expect(top.chunk.id).toBe(chunk.id);
      expect(top.score).toBeCloseTo(1, 10);
    }
  });

  it('orders hits by descending score and caps them at k', async () => {
    const built = await buildIndex(chunks, embedder);
    if (!built.ok) throw built.error;

    const hits = await queryIndex(built.value, embedder, 'When does the conference start?', 3);
    expect(hits).toHaveLength(3);
    expect(hits[0].chunk.text).toBe(sentences[0]);
    for (let i = 1; i < hits.length; i++) {
      expect(hits[i - 1].score).toBeGreaterThanOrEqual(hits[i].score);
    }

    expect(await queryIndex(built.value, embedder, 'conference', 50)).toHaveLength(chunks.length);
    expect(await queryIndex(built.value, embedder, 'conference', 0)).toEqual([]);
  });

  it('refuses a query embedder that differs from the build embedder', async () => {
    const built = await buildIndex(chunks, embedder);
    if (!built.ok) throw built.error;

    await expect(queryIndex(built.value, new HashingEmbeddingProvider(64), 'conference', 1)).rejects.toThrow(
      'Index was built with hash/256 but queried with hash/64',
    );
  });

  it('exposes size and dimensions', async () => {
    const built = await buildIndex(chunks, embedder);
    if (!built.ok) throw built.error;
    expect(built.value.size).toBe(5);
    expect(built.value.dimensions).toBe(256);
  });
});
