import type { Logger } from '../lib/logger';
import { createArtifacts } from '../ingest/artifacts';
import { ingestArtifacts, type IngestDependencies } from '../ingest/ingest-artifacts';
import type { LanguageModel } from '../llm/language-model';
import { ReasoningAgent } from '../reasoning/reasoning-agent';
import type { AgentResult, ArtifactInput, ArtifactKind } from '../schemas';
import { ToolRegistry, type ToolDescriptor } from '../tools/tool-registry';
import type { QueryTool } from '../tools/query-tool';

export interface SessionDependencies extends IngestDependencies {
  routerModel: LanguageModel;
  maxIterations: number;
  maxParseRetries: number;
  ingestConcurrency: number;
  logger?: Logger;
}

/** Entries follow upload order. A skipped upload that failed validation has an empty `artifactId`. */
export interface IngestionReport {
  registered: Array<{ artifactId: string; name: string; kind: ArtifactKind; toolName: string }>;
  skipped: Array<{ artifactId: string; name: string; code: string; reason: string }>;
}

/**
 * Everything one user's uploads produce: the published tool registry and the ids
 * already handed out. Replaces process-wide state; callers hold the instance.
 */
export class SessionContext {
  private registry: ToolRegistry;
  private readonly artifactIds = new Set<string>();

  constructor(private readonly deps: SessionDependencies) {
    this.registry = new ToolRegistry(deps.logger);
  }

  /**
   * Ingests a batch into a private registry and publishes it only once every artifact
   * has settled, so `ask` never sees a half-built registry.
   */
  async ingest(inputs: ArtifactInput[]): Promise<IngestionReport> {
    const { logger } = this.deps;
    const intake = createArtifacts(inputs, this.artifactIds);
    const artifacts = intake.flatMap((entry) => (entry.ok ? [entry.value] : []));
    for (const artifact of artifacts) this.artifactIds.add(artifact.id);

    logger?.info(`Ingesting ${artifacts.length} file${artifacts.length === 1 ? '' : 's'}`);
    const outcomes = await ingestArtifacts(artifacts, this.deps, this.deps.ingestConcurrency);

    const next = new ToolRegistry(logger);
    for (const { name, description } of this.registry.list()) {
      next.register(name, description, this.registry.get(name));
    }

    const report: IngestionReport = { registered: [], skipped: [] };
    let outcomeIndex = 0;
    for (const entry of intake) {
      if (!entry.ok) {
        logger?.warn(entry.error.message);
        report.skipped.push({ artifactId: '', name: entry.error.artifactName, code: entry.error.code, reason: entry.error.message });
        continue;
      }
      const { artifact, result } = outcomes[outcomeIndex++];
      if (result.ok) {
        next.register(result.value.name, result.value.description, result.value.tool);
        report.registered.push({ artifactId: artifact.id, name: artifact.name, kind: artifact.kind, toolName: result.value.name });
      } else {
        report.skipped.push({ artifactId: artifact.id, name: artifact.name, code: result.error.code, reason: result.error.message });
      }
    }

    this.registry = next;
    logger?.info('Ingestion finished', { registered: report.registered.length, skipped: report.skipped.length, tools: next.size });
    return report;
  }

  async ask(question: string): Promise<AgentResult> {
    const agent = new ReasoningAgent({
      registry: this.registry,
      model: this.deps.routerModel,
      maxIterations: this.deps.maxIterations,
      maxParseRetries: this.deps.maxParseRetries,
      timeoutMs: this.deps.timeoutMs,
      logger: this.deps.logger,
    });
    return agent.run(question);
  }

  tools(): ToolDescriptor[] {
    return this.registry.list();
  }

  mastraTools(): Record<string, QueryTool> {
    return this.registry.toMastraTools();
  }

  reset(): void {
    this.registry = new ToolRegistry(this.deps.logger);
    this.artifactIds.clear();
    this.deps.logger?.info('Session reset');
  }
}
