import { createOpenAI } from '@ai-sdk/openai';
import { createGroq } from '@ai-sdk/groq';
import type { ForgeConfig } from '../config.js';
import type { ProviderName } from './types.js';

type ProviderConfig = Pick<
  ForgeConfig,
  | 'llmProvider'
  | 'groqApiKey'
  | 'groqModel'
  | 'lmstudioBaseUrl'
  | 'lmstudioModel'
  | 'ollamaBaseUrl'
  | 'ollamaModel'
>;

export function createGroqProvider(config: ProviderConfig) {
  return createGroq({ apiKey: config.groqApiKey ?? '' });
}

/**
 * LM Studio speaks the OpenAI API and ignores the key.
 */
export function createLMStudioProvider(config: ProviderConfig) {
  return createOpenAI({
    baseURL: config.lmstudioBaseUrl,
    apiKey: 'lm-studio',
    compatibility: 'compatible',
  });
}

/**
 * Ollama's OpenAI-compatible endpoint lives under /v1.
 */
export function createOllamaProvider(config: ProviderConfig) {
  const baseUrl = config.ollamaBaseUrl.endsWith('/v1')
    ? config.ollamaBaseUrl
    : `${config.ollamaBaseUrl.replace(/\/$/, '')}/v1`;

  return createOpenAI({
    baseURL: baseUrl,
    apiKey: 'ollama',
    compatibility: 'compatible',
  });
}

export function getModelId(config: ProviderConfig): string {
  switch (config.llmProvider) {
    case 'groq':
      return config.groqModel;
    case 'lmstudio':
      return config.lmstudioModel || 'local-model';
    case 'ollama':
      return config.ollamaModel;
  }
}

export function getProviderDisplayName(provider: ProviderName): string {
  switch (provider) {
    case 'groq':
      return 'Groq';
    case 'lmstudio':
      return 'LM Studio';
    case 'ollama':
      return 'Ollama';
  }
}
