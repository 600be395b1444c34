import type { AgentStep } from '../schemas';
import type { ToolDescriptor } from '../tools/tool-registry';

export const MAX_OBSERVATION_CHARS = 4000;

const truncate = (text: string, max: number) =>
  text.length <= max ? text : `${text.slice(0, max)}… [truncated ${text.length - max} characters]`;

export function formatTools(tools: ToolDescriptor[]): string {
  return tools.map((tool) => `- ${tool.name}: ${tool.description}`).join('\n');
}

export function formatSteps(steps: AgentStep[]): string {
  if (steps.length === 0) return 'none';
  return steps
    .map((step, i) =>
      [
        `Step ${i + 1}`,
        `Thought: ${step.thought || '(none)'}`,
        `Action: ${step.tool ?? '(none)'}`,
        `Input: ${step.input}`,
        `Observation: ${truncate(step.observation, MAX_OBSERVATION_CHARS)}`,
      ].join('\n'),
    )
    .join('\n\n');
}

export function reasoningPrompt(question: string, tools: ToolDescriptor[], steps: AgentStep[]): string {
  return `Tools:
${formatTools(tools)}

Question: ${question}

Steps so far:
${formatSteps(steps)}

Reply with one JSON object: {"thought": "...", "action": {"tool": "...", "input": "..."}} to call a tool, or {"thought": "...", "final_answer": "..."} to answer.`;
}

export function reformulationPrompt(basePrompt: string, reason: string): string {
  return `${basePrompt}

Your previous reply could not be used (${reason}). Reply again with exactly one JSON object in one of the two shapes above.`;
}
