/**
 * Execution Orchestrator request/result types.
 */

import type { FailureKind } from '../executor/types.js';
import type { RuntimeLanguage } from '../runtime/profiles.js';
import type { ServiceHandle } from '../services/types.js';

export type ExecutionMode = 'ephemeral' | 'long_running';

/** Where a failed request stopped */
export type FailurePhase = 'provisioning' | 'population' | 'running' | 'repairing' | 're_running';

/** Orchestrator states, in order; `failed`/`succeeded` are terminal */
export type OrchestratorState =
  | 'inferring'
  | 'provisioning'
  | 'running'
  | 'repairing'
  | 're_running'
  | 'succeeded'
  | 'failed';

export interface ExecutionRequest {
  readonly source: string;
  readonly language: RuntimeLanguage;
  readonly mode: ExecutionMode;
  /** Ephemeral only; clamped to `maxTimeoutMs` */
  readonly timeout_ms?: number;
  /** Long-running only; console entry point installed with the dependencies */
  readonly launcher?: string;
}

export interface AttemptSummary {
  execution_id: string;
  exit_code: number | null;
  timed_out: boolean;
  /** null for an attempt that succeeded */
  failure_kind: FailureKind | null;
  duration_ms: number;
}

export interface ExecutionResult {
  success: boolean;
  execution_id: string;
  output: string | null;
  error: string | null;
  /** Code of the error behind `error`, e.g. RUNTIME_FAILURE or POPULATION_ERROR */
  error_code: string | null;
  /** Classification of the last failed run */
  failure_kind: FailureKind | null;
  /** Corrected program, when a repair produced one */
  fixed_code: string | null;
  dependencies: string[];
  repaired: boolean;
  failed_phase: FailurePhase | null;
  attempts: AttemptSummary[];
  /** Set only for a successful long-running start */
  service: ServiceHandle | null;
}

export interface ServiceStartResult {
  success: boolean;
  execution_id: string;
  error: string | null;
  error_code: string | null;
  failure_kind: FailureKind | null;
  service: ServiceHandle | null;
  fixed_code: string | null;
  dependencies: string[];
  failed_phase: FailurePhase | null;
  attempts: AttemptSummary[];
}
