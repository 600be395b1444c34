import { loadSettings, type Settings } from '../config/settings';
import { createMastra } from '../create-mastra';
import { ContentExtractor } from '../ingest/content-extractor';
import { createLogger } from '../lib/logger';
import { HashingEmbeddingProvider, OpenAiEmbeddingProvider, type EmbeddingProvider } from '../llm/embedding-provider';
import { AgentImageTextReader } from '../llm/image-reader';
import { AgentLanguageModel } from '../llm/language-model';
import { TabularQueryAgent } from '../tabular/tabular-query-agent';
import { SessionContext } from './session-context';

export function createEmbeddingProvider(settings: Pick<Settings, 'embeddingModel'>): EmbeddingProvider {
  return settings.embeddingModel === 'hash'
    ? new HashingEmbeddingProvider()
    : new OpenAiEmbeddingProvider(settings.embeddingModel);
}

/** Wires a session to the Mastra agents and the configured embedding model. */
export function createSession(settings: Settings = loadSettings()): SessionContext {
  const logger = createLogger('artifact-qa', settings.logLevel);
  const mastra = createMastra(settings);

  const tabularAgent = new TabularQueryAgent({
    model: new AgentLanguageModel(mastra.getAgent('tablePlannerAgent')),
    maxParseRetries: settings.maxParseRetries,
    timeoutMs: settings.callTimeoutMs,
    maxRows: settings.maxTableRows,
    logger,
  });

  return new SessionContext({
    extractor: new ContentExtractor({
      imageReader: new AgentImageTextReader(mastra.getAgent('imageReaderAgent')),
      logger,
    }),
    embedder: createEmbeddingProvider(settings),
    answerModel: new AgentLanguageModel(mastra.getAgent('answerAgent')),
    routerModel: new AgentLanguageModel(mastra.getAgent('routerAgent')),
    tabularAgent,
    chunkSize: settings.chunkSize,
    chunkOverlap: settings.chunkOverlap,
    topK: settings.topK,
    timeoutMs: settings.callTimeoutMs,
    maxIterations: settings.maxIterations,
    maxParseRetries: settings.maxParseRetries,
    ingestConcurrency: settings.ingestConcurrency,
    logger,
  });
}
