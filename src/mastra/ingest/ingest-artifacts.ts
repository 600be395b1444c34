import { CoreError, ExtractionError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { err, ok, type Result } from '../lib/result';
import { withTimeout } from '../lib/timeout';
import type { EmbeddingProvider } from '../llm/embedding-provider';
import type { LanguageModel } from '../llm/language-model';
import { chunkPages } from '../retrieval/chunker';
import { buildIndex } from '../retrieval/embedding-index';
import type { Artifact, ArtifactKind } from '../schemas';
import type { TabularQueryAgent } from '../tabular/tabular-query-agent';
import { createRetrievalTool, type BuiltTool } from '../tools/retrieval-tool';
import { createTabularTool } from '../tools/tabular-tool';
import type { ContentExtractor } from './content-extractor';

export interface IngestDependencies {
  extractor: ContentExtractor;
  embedder: EmbeddingProvider;
  answerModel: LanguageModel;
  tabularAgent: TabularQueryAgent;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  timeoutMs: number;
  logger?: Logger;
}

export interface IngestedTool extends BuiltTool {
  artifactId: string;
  artifactName: string;
  kind: ArtifactKind;
}

export type IngestOutcome = { artifact: Artifact; result: Result<IngestedTool, CoreError> };

/** Extract → (chunk → index → retrieval tool | tabular tool) for a single artifact. */
export async function ingestArtifact(artifact: Artifact, deps: IngestDependencies): Promise<Result<IngestedTool, CoreError>> {
  const { extractor, embedder, answerModel, tabularAgent, timeoutMs, logger } = deps;

  let extracted: Awaited<ReturnType<ContentExtractor['extract']>>;
  try {
    extracted = await withTimeout((signal) => extractor.extract(artifact, { signal }), timeoutMs, `Extracting ${artifact.name}`);
  } catch (error) {
    return err(new ExtractionError(artifact.name, error));
  }
  if (!extracted.ok) return extracted;

  const content = extracted.value;
  const meta = { artifactId: artifact.id, artifactName: artifact.name, kind: artifact.kind };

  if (content.type === 'table') {
    return ok({ ...meta, ...createTabularTool({ artifact, table: content.table, subAgent: tabularAgent }) });
  }

  if (content.pages.every((page) => page.text.trim() === '')) {
    return err(new ExtractionError(artifact.name, 'no extractable text'));
  }

  const chunks = chunkPages(artifact.id, content.pages, deps.chunkSize, deps.chunkOverlap);
  const index = await buildIndex(chunks, embedder, { timeoutMs, logger });
  if (!index.ok) return index;

  logger?.info(`Indexed ${artifact.name}`, { artifactId: artifact.id, pages: content.pages.length, chunks: chunks.length });
  return ok({
    ...meta,
    ...createRetrievalTool({ artifact, index: index.value, embedder, model: answerModel, topK: deps.topK, timeoutMs, logger }),
  });
}

/**
 * Ingests artifacts with at most `concurrency` in flight. Outcomes come back in input order,
 * whatever order they completed in; one failure never stops the others.
 */
export async function ingestArtifacts(
  artifacts: Artifact[],
  deps: IngestDependencies,
  concurrency: number,
): Promise<IngestOutcome[]> {
  const outcomes = new Array<IngestOutcome>(artifacts.length);
  let next = 0;

  const worker = async () => {
    while (next < artifacts.length) {
      const i = next++;
      const artifact = artifacts[i];
      let result: Result<IngestedTool, CoreError>;
      try {
        result = await ingestArtifact(artifact, deps);
      } catch (error) {
        result = err(error instanceof CoreError ? error : new ExtractionError(artifact.name, error));
      }
      if (!result.ok) {
        deps.logger?.warn(`Skipped ${artifact.name}`, { artifactId: artifact.id, code: result.error.code, reason: result.error.message });
      }
      outcomes[i] = { artifact, result };
    }
  };

  await Promise.all(Array.from({ length: Math.max(1, Math.min(concurrency, artifacts.length)) }, worker));
  return outcomes;
}
