/**
 * TextGenerator backed by the AI SDK.
 */

import { generateText, type LanguageModel } from 'ai';
import { Logger } from '@appforge/shared/Utils/logger.js';
import type { ForgeConfig } from '../config.js';
import type { TextGenerator } from './types.js';

const logger = new Logger('forge:llm');

export interface AiTextGeneratorOptions {
  temperature?: number;
  maxTokens?: number;
  /** Per-call timeout in ms */
  timeoutMs?: number;
}

export function generatorOptionsFromConfig(
  config: Pick<ForgeConfig, 'temperature' | 'llmMaxTokens' | 'llmTimeoutMs'>,
): AiTextGeneratorOptions {
  return {
    temperature: config.temperature,
    maxTokens: config.llmMaxTokens,
    timeoutMs: config.llmTimeoutMs,
  };
}

export class AiTextGenerator implements TextGenerator {
  constructor(
    private readonly model: LanguageModel,
    private readonly options: AiTextGeneratorOptions = {},
  ) {}

  async generate(prompt: string): Promise<string> {
    const startTime = Date.now();
    const result = await generateText({
      model: this.model,
      prompt,
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
      abortSignal: this.options.timeoutMs ? AbortSignal.timeout(this.options.timeoutMs) : undefined,
    });

    logger.debug('Generation finished', {
      duration_ms: Date.now() - startTime,
      finish_reason: result.finishReason,
      prompt_tokens: result.usage.promptTokens,
      completion_tokens: result.usage.completionTokens,
    });
    return result.text;
  }
}
