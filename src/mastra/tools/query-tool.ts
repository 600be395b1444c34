import { createTool } from '@mastra/core/tools';
import { z } from 'zod';

export const queryToolInputSchema = z.object({
  query: z.string().min(1).describe('Self-contained question for this file'),
});

export const queryToolOutputSchema = z.object({
  answer: z.string(),
});

export type QueryHandler = (query: string) => Promise<string>;

/** Every file capability has the same shape: a question in, a textual answer out. */
export function createQueryTool(id: string, description: string, handler: QueryHandler) {
  return createTool({
    id,
    description,
    inputSchema: queryToolInputSchema,
    outputSchema: queryToolOutputSchema,
    execute: async (inputData) => ({ answer: await handler(inputData.query) }),
  });
}

export type QueryTool = ReturnType<typeof createQueryTool>;
