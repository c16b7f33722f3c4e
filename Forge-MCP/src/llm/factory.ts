import type { LanguageModel } from 'ai';
import type { ForgeConfig } from '../config.js';
import { ConfigurationError } from '@appforge/shared/Types/errors.js';
import { Logger } from '@appforge/shared/Utils/logger.js';
import {
  createGroqProvider,
  createLMStudioProvider,
  createOllamaProvider,
  getModelId,
  getProviderDisplayName,
} from './providers.js';

const logger = new Logger('forge:llm');

/**
 * Build the language model for the configured provider.
 */
export function createLanguageModel(config: ForgeConfig): LanguageModel {
  const modelId = getModelId(config);
  logger.info(`Initializing ${getProviderDisplayName(config.llmProvider)} with model: ${modelId}`);

  switch (config.llmProvider) {
    case 'groq':
      return createGroqProvider(config)(modelId);
    case 'lmstudio':
      return createLMStudioProvider(config)(modelId);
    case 'ollama':
      return createOllamaProvider(config)(modelId);
  }
}

/**
 * Fail fast on provider settings that can never work.
 */
export function validateProviderConfig(config: ForgeConfig): void {
  if (config.llmProvider === 'groq' && !config.groqApiKey) {
    throw new ConfigurationError('GROQ_API_KEY is required when using the Groq provider');
  }
}
