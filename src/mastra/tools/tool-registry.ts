import { RequestContext } from '@mastra/core/di';
import { DuplicateToolError, ToolInvocationError, UnknownToolError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { err, ok, type Result } from '../lib/result';
import { withTimeout } from '../lib/timeout';
import type { QueryTool } from './query-tool';

export interface ToolDescriptor {
  name: string;
  description: string;
}

interface ToolEntry extends ToolDescriptor {
  tool: QueryTool;
}

export interface InvokeOptions {
  timeoutMs?: number;
}

/**
 * Name → tool map the reasoning agent treats as its whole action space.
 * Listing follows registration order so prompts are reproducible.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolEntry>();

  constructor(private readonly logger?: Logger) {}

  register(name: string, description: string, tool: QueryTool): void {
    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }
    this.tools.set(name, { name, description, tool });
    this.logger?.debug(`Registered tool ${name}`);
  }

  get size(): number {
    return this.tools.size;
  }

  list(): ToolDescriptor[] {
    return Array.from(this.tools.values(), ({ name, description }) => ({ name, description }));
  }

  get(name: string): QueryTool {
    const entry = this.tools.get(name);
    if (!entry) throw new UnknownToolError(name, Array.from(this.tools.keys()));
    return entry.tool;
  }

  /** The registered tools keyed by name, ready to hand to a Mastra agent or server. */
  toMastraTools(): Record<string, QueryTool> {
    return Object.fromEntries(Array.from(this.tools.values(), ({ name, tool }) => [name, tool]));
  }

  async invoke(
    name: string,
    query: string,
    options: InvokeOptions = {},
  ): Promise<Result<string, UnknownToolError | ToolInvocationError>> {
    const entry = this.tools.get(name);
    if (!entry) {
      return err(new UnknownToolError(name, Array.from(this.tools.keys())));
    }

    const execute = entry.tool.execute;
    if (!execute) {
      return err(new ToolInvocationError(name, 'tool has no execute function'));
    }

    try {
      const run = () => execute({ query }, { requestContext: new RequestContext() });
      const output = options.timeoutMs
        ? await withTimeout(run, options.timeoutMs, `Tool ${name}`)
        : await run();

      if ('error' in output) {
        return err(new ToolInvocationError(name, output));
      }
      return ok(output.answer);
    } catch (error) {
      this.logger?.warn(`Tool ${name} failed`, { error: error instanceof Error ? error.message : String(error) });
      return err(new ToolInvocationError(name, error));
    }
  }
}
