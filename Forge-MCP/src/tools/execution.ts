/**
 * Execution tool schemas and handlers.
 *
 * execute_code, infer_dependencies
 */

import { z } from 'zod';
import { RUNTIME_LANGUAGES, type RuntimeProfiles } from '../runtime/profiles.js';
import type { DependencyInferencer } from '../dependencies/inferencer.js';
import type { ExecutionOrchestrator } from '../orchestrator/orchestrator.js';

const languageSchema = z
  .enum(RUNTIME_LANGUAGES)
  .default('python')
  .describe('Program language (default: python)');

// ── execute_code ────────────────────────────────────────────────────────────

export const executeCodeSchema = z.object({
  code: z.string().min(1).describe('Complete program source'),
  language: languageSchema,
  timeout_ms: z
    .number()
    .int()
    .positive()
    .nullish()
    .describe('Run timeout in ms (default: 30000, clamped to the configured maximum)'),
});

export type ExecuteCodeInput = z.infer<typeof executeCodeSchema>;

export function handleExecuteCode(orchestrator: ExecutionOrchestrator) {
  return async (input: ExecuteCodeInput) => {
    return orchestrator.execute({
      source: input.code,
      language: input.language,
      mode: 'ephemeral',
      timeout_ms: input.timeout_ms ?? undefined,
    });
  };
}

// ── infer_dependencies ──────────────────────────────────────────────────────

export const inferDependenciesSchema = z.object({
  code: z.string().min(1).describe('Program source to analyse'),
  language: languageSchema,
});

export type InferDependenciesInput = z.infer<typeof inferDependenciesSchema>;

export function handleInferDependencies(inferencer: DependencyInferencer, profiles: RuntimeProfiles) {
  return async (input: InferDependenciesInput) => {
    const dependencies = await inferencer.infer(input.code, profiles[input.language]);
    return { language: input.language, dependencies };
  };
}
