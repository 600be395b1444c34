import type { Agent } from '@mastra/core/agent';
import type { CompletionOptions } from './language-model';

/** Optical text recognition for image artifacts. Best effort: returns '' when nothing is legible. */
export interface ImageTextReader {
  readText(image: Uint8Array, mimeType: string, options?: CompletionOptions): Promise<string>;
}

const NO_TEXT_MARKER = 'NO_TEXT';

export class AgentImageTextReader implements ImageTextReader {
  constructor(private readonly agent: Agent) {}

  async readText(image: Uint8Array, mimeType: string, options: CompletionOptions = {}): Promise<string> {
    const response = await this.agent.generate(
      [
        {
          role: 'user',
          content: [
            { type: 'text', text: `Transcribe all text in this image. Reply ${NO_TEXT_MARKER} if there is none.` },
            { type: 'image', image: Buffer.from(image).toString('base64'), mediaType: mimeType },
          ],
        },
      ],
      { abortSignal: options.signal },
    );
    const text = response.text.trim();
    return text === NO_TEXT_MARKER ? '' : text;
  }
}
