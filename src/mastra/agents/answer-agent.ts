import { Agent } from '@mastra/core/agent';

export function createAnswerAgent(model: string): Agent {
  return new Agent({
    id: 'answer-agent',
    name: 'Passage Answer Agent',
    description: 'Answers a question from retrieved passages of one document',
    instructions: `You answer a question using only the numbered passages you are given.

- Quote figures, dates and names exactly as they appear in the passages.
- Cite the page of each fact as [page N].
- If the passages do not contain the answer, reply "The document does not say." and nothing more.
- Keep the answer to a few sentences.`,
    model,
  });
}
