import { z } from 'zod';

export const agentDecisionSchema = z.union([
  z.object({
    thought: z.string().default(''),
    action: z.object({
      tool: z.string().trim().min(1),
      input: z.string(),
    }),
  }),
  z.object({
    thought: z.string().default(''),
    final_answer: z.string().trim().min(1),
  }),
]);

export const agentStatusSchema = z.enum(['thinking', 'action_selected', 'observing', 'finished', 'aborted']);

export const abortReasonSchema = z.enum(['exhausted', 'unparseable', 'empty_registry']);

export const agentStepSchema = z.object({
  thought: z.string(),
  tool: z.string().nullable().describe('Null when the thinking call itself failed'),
  input: z.string(),
  observation: z.string(),
  ok: z.boolean().describe('False when the observation records a failure'),
});

export const agentResultSchema = z.object({
  status: z.enum(['finished', 'aborted']),
  answer: z.string(),
  steps: z.array(agentStepSchema),
  iterations: z.number().int().nonnegative(),
  abortReason: abortReasonSchema.optional(),
});

export type AgentDecision = z.infer<typeof agentDecisionSchema>;
export type AgentStatus = z.infer<typeof agentStatusSchema>;
export type AbortReason = z.infer<typeof abortReasonSchema>;
export type AgentStep = z.infer<typeof agentStepSchema>;
export type AgentResult = z.infer<typeof agentResultSchema>;
