import { Agent } from '@mastra/core/agent';

export function createImageReaderAgent(model: string): Agent {
  return new Agent({
    id: 'image-reader-agent',
    name: 'Image Text Reader',
    description: 'Transcribes the visible text of an uploaded image',
    instructions: `You are an OCR engine. Output the text visible in the image, line by line, in reading order.
Do not describe the image, translate, or add commentary.`,
    model,
  });
}
