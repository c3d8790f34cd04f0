import { GenerateContentParameters } from '@google/genai';

/** Token for the `models` surface of a `GoogleGenAI` instance. */
export const GEMINI_CLIENT = Symbol('GEMINI_CLIENT');

export interface ModelChunk {
  readonly text?: string | undefined;
}

/** The part of `@google/genai`'s `Models` this service calls. */
export interface ChatModelClient {
  generateContent(params: GenerateContentParameters): Promise<ModelChunk>;
  generateContentStream(params: GenerateContentParameters): Promise<AsyncIterable<ModelChunk>>;
}
