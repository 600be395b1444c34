import type { Logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import type { EmbeddingProvider } from '../llm/embedding-provider';
import type { LanguageModel } from '../llm/language-model';
import { queryIndex, type ScoredChunk, type VectorIndex } from '../retrieval/embedding-index';
import type { Artifact } from '../schemas';
import { createQueryTool, type QueryTool } from './query-tool';

export interface RetrievalToolOptions {
  artifact: Pick<Artifact, 'id' | 'name' | 'kind'>;
  index: VectorIndex;
  embedder: EmbeddingProvider;
  model: LanguageModel;
  topK: number;
  timeoutMs: number;
  logger?: Logger;
}

export interface BuiltTool {
  name: string;
  description: string;
  tool: QueryTool;
}

export function formatPassages(hits: ScoredChunk[]): string {
  return hits.map(({ chunk }, i) => `[${i + 1}] (page ${chunk.pageNumber}) ${chunk.text.trim()}`).join('\n\n');
}

export function retrievalPrompt(question: string, hits: ScoredChunk[]): string {
  return `Question: ${question}

Passages:
${formatPassages(hits)}

Answer the question using only these passages.`;
}

/** Retrieval-augmented answering over one artifact's index. */
export function createRetrievalTool(options: RetrievalToolOptions): BuiltTool {
  const { artifact, index, embedder, model, topK, timeoutMs, logger } = options;
  const name = `search_${artifact.id}`;
  const description = `Answers questions about the contents of ${artifact.name} (${artifact.kind}).`;

  const tool = createQueryTool(name, description, async (query) => {
    const hits = (
      await withTimeout((signal) => queryIndex(index, embedder, query, topK, { signal }), timeoutMs, 'Query embedding')
    ).filter((hit) => hit.score > 0);

    logger?.debug(`Retrieved ${hits.length} passages`, {
      tool: name,
      scores: hits.map((hit) => Number(hit.score.toFixed(3))),
    });

    if (hits.length === 0) {
      return `No relevant passages found in ${artifact.name}.`;
    }

    const answer = await withTimeout(
      (signal) => model.complete(retrievalPrompt(query, hits), { signal }),
      timeoutMs,
      'Passage answer',
    );
    return answer.trim();
  });

  return { name, description, tool };
}
