/**
 * Process runner types.
 */

import type { ChildProcess } from 'node:child_process';
import type { OutputBuffer } from './output-buffer.js';

/** Why a program failed, read from its stderr by the runtime profile */
export type FailureKind = 'missing_dependency' | 'syntax' | 'timeout' | 'runtime';

/** Outcome of one run-to-completion execution */
export interface RunOutcome {
  execution_id: string;
  exit_code: number | null;
  stdout: string;
  stderr: string;
  timed_out: boolean;
  truncated: boolean;
  duration_ms: number;
}

export interface StartOptions {
  /** Console entry point installed in the environment, e.g. `streamlit` */
  launcher?: string;
  /** How long the process must survive to count as started */
  graceMs?: number;
}

/** Service survived the grace window; the caller now owns the process */
export interface ServiceStarted {
  started: true;
  execution_id: string;
  process: ChildProcess;
  pid: number;
  script_path: string;
  stdout: OutputBuffer;
  stderr: OutputBuffer;
  /** Time spent in the grace window */
  duration_ms: number;
}

/** Service exited (or never spawned) inside the grace window */
export interface ServiceStartFailed {
  started: false;
  execution_id: string;
  exit_code: number | null;
  stdout: string;
  stderr: string;
  duration_ms: number;
}

export type StartOutcome = ServiceStarted | ServiceStartFailed;
