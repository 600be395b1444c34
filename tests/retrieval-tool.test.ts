import { describe, expect, it } from 'vitest';
import { HashingEmbeddingProvider } from '../src/mastra/llm/embedding-provider';
import { chunkPages } from '../src/mastra/retrieval/chunker';
import { buildIndex } from '../src/mastra/retrieval/embedding-index';
import { createRetrievalTool } from '../src/mastra/tools/retrieval-tool';
import { ToolRegistry } from '../src/mastra/tools/tool-registry';
import { replies } from './helpers';

const artifact = { id: 'agenda_pdf', name: 'agenda.pdf', kind: 'document' } as const;

async function setup() {
  const embedder = new HashingEmbeddingProvider();
  const chunks = chunkPages(
    artifact.id,
    [
      { pageNumber: 1, text: 'Catering is provided by a local bakery.' },
      { pageNumber: 2, text: 'The conference starts on 9 March.' },
    ],
    200,
    20,
  );
  const built = await buildIndex(chunks, embedder);
  if (!built.ok) throw built.error;

  const model = replies('  It starts on 9 March.\n');
  const retrieval = createRetrievalTool({ artifact, index: built.value, embedder, model, topK: 2, timeoutMs: 1000 });
  const registry = new ToolRegistry();
  registry.register(retrieval.name, retrieval.description, retrieval.tool);
  return { retrieval, registry, model };
}

describe('createRetrievalTool', () => {
  it('names and describes the tool after its file', async () => {
    const { retrieval } = await setup();

    expect(retrieval.name).toBe('search_agenda_pdf');
    expect(retrieval.description).toBe('Answers questions about the contents of agenda.pdf (document).');
  });

  it('answers from the passages that match the question', async () => {
    const { registry, model } = await setup();

    const result = await registry.invoke('search_agenda_pdf', 'When does the conference start?');

    expect(result).toEqual({ ok: true, value: 'It starts on 9 March.' });
    expect(model.prompts).toEqual([
      'Question: When does the conference start?\n\nPassages:\n[1] (page 2) The conference starts on 9 March.\n\nAnswer the question using only these passages.',
    ]);
  });

  it('reports no passages without asking the model when nothing matches', async () => {
    const { registry, model } = await setup();

    const result = await registry.invoke('search_agenda_pdf', 'zebra');

    expect(result).toEqual({ ok: true, value: 'No relevant passages found in agenda.pdf.' });
    expect(model.prompts).toHaveLength(0);
  });
});
