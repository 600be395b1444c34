export type CoreErrorCode =
  | 'invalid_artifact'
  | 'unsupported_artifact'
  | 'extraction_failed'
  | 'index_build_failed'
  | 'unknown_tool'
  | 'duplicate_tool'
  | 'tool_invocation_failed'
  | 'agent_exhausted'
  | 'call_timeout'
  | 'configuration';

/**
 * Base class for every error the ingestion and reasoning pipeline produces.
 * `code` is the discriminant callers switch on; `message` is always fit to show a user.
 */
export abstract class CoreError extends Error {
  abstract readonly code: CoreErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An upload rejected before it became an artifact, e.g. one without a name. */
export class InvalidArtifactError extends CoreError {
  readonly code = 'invalid_artifact';

  constructor(
    public readonly artifactName: string,
    issues: string[],
  ) {
    super(`Invalid upload ${artifactName ? `"${artifactName}"` : '(unnamed)'}: ${issues.join('; ')}`);
  }
}

export class UnsupportedArtifactError extends CoreError {
  readonly code = 'unsupported_artifact';

  constructor(
    public readonly artifactName: string,
    detail?: string,
  ) {
    super(`Unsupported file type: ${artifactName}${detail ? ` (${detail})` : ''}`);
  }
}

export class ExtractionError extends CoreError {
  readonly code = 'extraction_failed';

  constructor(
    public readonly artifactName: string,
    cause: unknown,
  ) {
    super(`Failed to extract content from ${artifactName}: ${describeError(cause)}`, { cause });
  }
}

export class IndexBuildError extends CoreError {
  readonly code = 'index_build_failed';
}

export class UnknownToolError extends CoreError {
  readonly code = 'unknown_tool';

  constructor(public readonly toolName: string, available: string[] = []) {
    super(
      `Unknown tool: ${toolName}` +
        (available.length > 0 ? `. Available: ${available.join(', ')}` : ''),
    );
  }
}

export class DuplicateToolError extends CoreError {
  readonly code = 'duplicate_tool';

  constructor(public readonly toolName: string) {
    super(`Tool already registered: ${toolName}`);
  }
}

export class ToolInvocationError extends CoreError {
  readonly code = 'tool_invocation_failed';

  constructor(
    public readonly toolName: string,
    cause: unknown,
  ) {
    super(`Tool ${toolName} failed: ${describeError(cause)}`, { cause });
  }
}

export class AgentExhaustedError extends CoreError {
  readonly code = 'agent_exhausted';

  constructor(public readonly iterations: number) {
    super(`No final answer after ${iterations} step${iterations === 1 ? '' : 's'}`);
  }
}

export class CallTimeoutError extends CoreError {
  readonly code = 'call_timeout';

  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
  }
}

export class ConfigurationError extends CoreError {
  readonly code = 'configuration';

  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/** One-line, human-readable rendering of any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
