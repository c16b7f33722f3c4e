/**
 * Service tool schemas and handlers.
 *
 * start_service, stop_service, list_services
 */

import { z } from 'zod';
import { RUNTIME_LANGUAGES } from '../runtime/profiles.js';
import type { ExecutionOrchestrator } from '../orchestrator/orchestrator.js';
import type { ServiceManager } from '../services/manager.js';

// ── start_service ───────────────────────────────────────────────────────────

export const startServiceSchema = z.object({
  code: z.string().min(1).describe('Program source of the service'),
  language: z.enum(RUNTIME_LANGUAGES).default('python').describe('Program language (default: python)'),
  launcher: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Launcher must be a plain command name')
    .nullish()
    .describe('Console entry point installed with the dependencies, e.g. "streamlit"'),
});

export type StartServiceInput = z.infer<typeof startServiceSchema>;

export function handleStartService(orchestrator: ExecutionOrchestrator) {
  return async (input: StartServiceInput) => {
    return orchestrator.startService({
      source: input.code,
      language: input.language,
      mode: 'long_running',
      launcher: input.launcher ?? undefined,
    });
  };
}

// ── stop_service ────────────────────────────────────────────────────────────

export const stopServiceSchema = z.object({
  service_id: z.string().min(1).describe('Service ID from start_service'),
});

export type StopServiceInput = z.infer<typeof stopServiceSchema>;

export function handleStopService(manager: ServiceManager) {
  return async (input: StopServiceInput) => {
    return manager.stop(input.service_id);
  };
}

// ── list_services ───────────────────────────────────────────────────────────

export const listServicesSchema = z.object({});

export function handleListServices(manager: ServiceManager) {
  return async () => {
    return { services: manager.list() };
  };
}
