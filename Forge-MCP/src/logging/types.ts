/**
 * Log entry types for JSONL audit logs.
 *
 * - ExecutionLogEntry: one line per orchestrated request (daily rotation)
 * - ServiceLogEntry: long-running service lifecycle events (daily rotation)
 */

import type { RuntimeLanguage } from '../runtime/profiles.js';
import type { FailureKind } from '../executor/types.js';
import type { AttemptSummary, FailurePhase } from '../orchestrator/types.js';

// ── Executions ──────────────────────────────────────────────────────────────

export interface ExecutionLogEntry {
  type: 'execution';
  execution_id: string;
  language: RuntimeLanguage;
  mode: 'ephemeral' | 'long_running';
  env_id: string | null;
  dependencies: string[];
  success: boolean;
  repaired: boolean;
  failed_phase: FailurePhase | null;
  attempts: AttemptSummary[];
  source_chars: number;
  error: string | null;
  error_code: string | null;
  failure_kind: FailureKind | null;
  duration_ms: number;
  executed_at: string;
}

// ── Services ────────────────────────────────────────────────────────────────

export interface ServiceStartLogEntry {
  type: 'service_start';
  service_id: string;
  env_id: string;
  language: RuntimeLanguage;
  pid: number;
  launcher: string | null;
  at: string;
}

export interface ServiceStopLogEntry {
  type: 'service_stop';
  service_id: string;
  reason: 'manual' | 'shutdown';
  uptime_ms: number;
  at: string;
}

export interface ServiceExitLogEntry {
  type: 'service_exit';
  service_id: string;
  exit_code: number | null;
  signal: string | null;
  uptime_ms: number;
  stderr_tail: string;
  at: string;
}

export type ServiceLogEntry = ServiceStartLogEntry | ServiceStopLogEntry | ServiceExitLogEntry;
