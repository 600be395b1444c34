import { AgentExhaustedError, describeError } from '../lib/errors';
import type { Logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import type { LanguageModel } from '../llm/language-model';
import type { AbortReason, AgentResult, AgentStatus, AgentStep } from '../schemas';
import type { ToolRegistry } from '../tools/tool-registry';
import { parseDecision, type ParsedDecision } from './decision';
import { reasoningPrompt, reformulationPrompt } from './prompts';

export const NOTHING_TO_QUERY = 'Nothing to query: no uploaded file was ingested successfully.';

/** Working memory for one question; discarded once the answer is returned. */
export interface AgentState {
  question: string;
  steps: AgentStep[];
  remaining: number;
  status: AgentStatus;
  answer?: string;
}

export interface ReasoningAgentOptions {
  registry: ToolRegistry;
  model: LanguageModel;
  maxIterations: number;
  maxParseRetries: number;
  timeoutMs: number;
  logger?: Logger;
}

type ThinkOutcome = ParsedDecision | { type: 'call_failed'; error: unknown };

/**
 * Think → act → observe loop over the tool registry.
 *
 * Each cycle asks the model for a decision, invokes the chosen tool and records the
 * observation. Tool and model-call failures become observations. The loop ends with
 * `finished` on a final answer, or `aborted` when the cycle budget runs out or the
 * model's replies stay unparseable after the allowed reformulations.
 */
export class ReasoningAgent {
  constructor(private readonly options: ReasoningAgentOptions) {}

  async run(question: string): Promise<AgentResult> {
    const { registry, maxIterations, logger } = this.options;

    if (registry.size === 0) {
      return { status: 'aborted', abortReason: 'empty_registry', answer: NOTHING_TO_QUERY, steps: [], iterations: 0 };
    }

    const state: AgentState = { question, steps: [], remaining: maxIterations, status: 'thinking' };

    while (state.remaining > 0) {
      state.status = 'thinking';
      const decision = await this.think(state);

      if (decision.type === 'final_answer') {
        state.status = 'finished';
        state.answer = decision.answer;
        logger?.info('Answered question', { iterations: maxIterations - state.remaining, steps: state.steps.length });
        return this.result(state);
      }

      if (decision.type === 'unparseable') {
        logger?.warn('Router replies could not be parsed', { reason: decision.reason });
        return this.abort(state, 'unparseable', `Could not complete: the reasoning model's reply could not be understood (${decision.reason}).`);
      }

      if (decision.type === 'call_failed') {
        this.record(state, {
          thought: '',
          tool: null,
          input: '',
          observation: `Error: reasoning step failed: ${describeError(decision.error)}`,
          ok: false,
        });
        continue;
      }

      state.status = 'action_selected';
      logger?.debug('Selected tool', { tool: decision.tool, input: decision.input, remaining: state.remaining });
      const result = await registry.invoke(decision.tool, decision.input, { timeoutMs: this.options.timeoutMs });

      state.status = 'observing';
      if (!result.ok) {
        logger?.warn('Tool call failed', { tool: decision.tool, error: result.error.message });
      }
      this.record(state, {
        thought: decision.thought,
        tool: decision.tool,
        input: decision.input,
        observation: result.ok ? result.value : `Error: ${result.error.message}`,
        ok: result.ok,
      });
    }

    const exhausted = new AgentExhaustedError(maxIterations);
    logger?.warn(exhausted.message, { question });
    const lastGood = [...state.steps].reverse().find((step) => step.ok);
    const answer =
      `Could not complete: no final answer within ${maxIterations} step${maxIterations === 1 ? '' : 's'}.` +
      (lastGood ? `\n\nBest available information (from ${lastGood.tool}): ${lastGood.observation}` : '');
    return this.abort(state, 'exhausted', answer);
  }

  private async think(state: AgentState): Promise<ThinkOutcome> {
    const { registry, model, maxParseRetries, timeoutMs } = this.options;
    const basePrompt = reasoningPrompt(state.question, registry.list(), state.steps);

    let prompt = basePrompt;
    let reason = '';
    for (let attempt = 0; attempt <= maxParseRetries; attempt++) {
      let reply: string;
      try {
        reply = await withTimeout((signal) => model.complete(prompt, { signal }), timeoutMs, 'Reasoning step');
      } catch (error) {
        return { type: 'call_failed', error };
      }

      const decision = parseDecision(reply);
      if (decision.type !== 'unparseable') return decision;

      reason = decision.reason;
      this.options.logger?.debug('Reformulating unparseable router reply', { attempt, reason });
      prompt = reformulationPrompt(basePrompt, reason);
    }
    return { type: 'unparseable', reason };
  }

  private record(state: AgentState, step: AgentStep): void {
    state.steps.push(step);
    state.remaining -= 1;
  }

  private abort(state: AgentState, reason: AbortReason, answer: string): AgentResult {
    state.status = 'aborted';
    state.answer = answer;
    return { ...this.result(state), abortReason: reason };
  }

  private result(state: AgentState): AgentResult {
    return {
      status: state.status === 'finished' ? 'finished' : 'aborted',
      answer: state.answer ?? '',
      steps: state.steps,
      iterations: this.options.maxIterations - state.remaining,
    };
  }
}
