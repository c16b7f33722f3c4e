/**
 * Specification Generator — free-text requirements → AppSpecification.
 *
 * Never throws. An unparseable response yields a minimal one-agent
 * specification; a collaborator error yields an empty one. Both carry `error`.
 */

import { Logger } from '@appforge/shared/Utils/logger.js';
import { toErrorMessage } from '@appforge/shared/Types/errors.js';
import { extractJsonObject } from '../utils/llm-output.js';
import { AppSpecificationSchema, type AppSpecification } from './types.js';
import type { TextGenerator } from '../llm/types.js';

const logger = new Logger('forge:spec');

const RAW_RESPONSE_PREVIEW = 200;

export function buildSpecPrompt(requirements: string): string {
  return `You are a JSON generator. Your task is to convert the user's app requirements into a JSON specification.

IMPORTANT: Your response must contain ONLY valid JSON - no other text, no markdown, no explanations.

Required JSON structure:
{
  "name": "string",
  "agents": [
    { "name": "string", "purpose": "string", "tools": ["string"] }
  ],
  "workflow": { "steps": ["string"], "dependencies": ["string"] },
  "ui": { "components": ["string"], "layouts": ["string"] },
  "integrations": ["string"]
}

User prompt: ${requirements}`;
}

export function fallbackSpecification(error: string, rawResponse: string): AppSpecification {
  return {
    error,
    raw_response: rawResponse.slice(0, RAW_RESPONSE_PREVIEW) + '...',
    agents: [{ name: 'DefaultAgent', purpose: 'Basic functionality', tools: ['basic_tools'] }],
    workflow: { steps: ['initialize', 'process', 'complete'], dependencies: [] },
    ui: { components: ['basic_form'], layouts: ['single_column'] },
    integrations: [],
  };
}

export function emptySpecification(error: string): AppSpecification {
  return {
    error,
    agents: [],
    workflow: { steps: [], dependencies: [] },
    ui: { components: [], layouts: [] },
    integrations: [],
  };
}

export class SpecGenerator {
  constructor(private readonly generator: TextGenerator) {}

  async analyze(requirements: string): Promise<AppSpecification> {
    let response: string;
    try {
      response = await this.generator.generate(buildSpecPrompt(requirements));
    } catch (err) {
      logger.error(`Specification request failed: ${toErrorMessage(err)}`);
      return emptySpecification(`API Error: ${toErrorMessage(err)}`);
    }

    const json = extractJsonObject(response);
    if (json === null) {
      logger.warn('No JSON object in specification response');
      return fallbackSpecification('Failed to generate valid specification', response);
    }

    const parsed = AppSpecificationSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
      logger.warn(`Specification failed validation: ${issues}`);
      return fallbackSpecification(`Failed to generate valid specification: ${issues}`, response);
    }

    logger.debug(`Specification with ${parsed.data.agents.length} agent(s)`);
    return parsed.data;
  }
}
