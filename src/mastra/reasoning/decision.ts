import { extractJsonObject } from '../lib/json';
import { agentDecisionSchema } from '../schemas';

export type ParsedDecision =
  | { type: 'tool_choice'; thought: string; tool: string; input: string }
  | { type: 'final_answer'; thought: string; answer: string }
  | { type: 'unparseable'; reason: string };

/** Reads one router reply into a typed decision. Never throws. */
export function parseDecision(text: string): ParsedDecision {
  const json = extractJsonObject(text);
  if (!json.ok) return { type: 'unparseable', reason: json.error };

  const parsed = agentDecisionSchema.safeParse(json.value);
  if (!parsed.success) {
    return {
      type: 'unparseable',
      reason: 'expected either "action" with "tool" and "input", or "final_answer"',
    };
  }

  const decision = parsed.data;
  if ('action' in decision) {
    return {
      type: 'tool_choice',
      thought: decision.thought,
      tool: decision.action.tool.trim(),
      input: decision.action.input,
    };
  }
  return { type: 'final_answer', thought: decision.thought, answer: decision.final_answer.trim() };
}
