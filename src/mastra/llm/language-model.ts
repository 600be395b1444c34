import type { Agent } from '@mastra/core/agent';

export interface CompletionOptions {
  signal?: AbortSignal;
}

/**
 * Text-in, text-out access to a large language model.
 * Everything in the reasoning loop and the tools goes through this port.
 */
export interface LanguageModel {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/** Adapts a Mastra agent (its instructions act as the system prompt) to the LanguageModel port. */
export class AgentLanguageModel implements LanguageModel {
  constructor(private readonly agent: Agent) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const response = await this.agent.generate(prompt, { abortSignal: options.signal });
    return response.text;
  }
}
