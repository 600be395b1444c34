import { embed, embedMany } from 'ai';
import { openai } from '@ai-sdk/openai';

export interface EmbeddingOptions {
  signal?: AbortSignal;
}

/**
 * Maps text to fixed-length vectors. Implementations must return the same vector
 * for the same text within a session, or similarity scores stop being comparable.
 */
export interface EmbeddingProvider {
  readonly id: string;
  embed(text: string, options?: EmbeddingOptions): Promise<number[]>;
  embedMany(texts: string[], options?: EmbeddingOptions): Promise<number[][]>;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;

  constructor(private readonly modelId: string) {
    this.id = `openai/${modelId}`;
  }

  async embed(text: string, options: EmbeddingOptions = {}): Promise<number[]> {
    const { embedding } = await embed({
      model: openai.textEmbeddingModel(this.modelId),
      value: text,
      abortSignal: options.signal,
    });
    return embedding;
  }

  async embedMany(texts: string[], options: EmbeddingOptions = {}): Promise<number[][]> {
    const { embeddings } = await embedMany({
      model: openai.textEmbeddingModel(this.modelId),
      values: texts,
      abortSignal: options.signal,
    });
    return embeddings;
  }
}

const TOKEN_PATTERN = /[\p{L}\p{N}]+/gu;

function fnv1a(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Offline embedder: signed feature hashing of lower-cased word tokens, L2-normalised.
 * Lexical only, but deterministic and free, so it backs tests and `EMBEDDING_MODEL=hash`.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly id: string;

  constructor(private readonly dimensions = 256) {
    this.id = `hash/${dimensions}`;
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(TOKEN_PATTERN) ?? []) {
      const hash = fnv1a(token);
      const sign = (hash & 0x80000000) === 0 ? 1 : -1;
      vector[hash % this.dimensions] += sign;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}
