/**
 * Prompt in, text out. No structured-output guarantee.
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

export type ProviderName = 'groq' | 'lmstudio' | 'ollama';
