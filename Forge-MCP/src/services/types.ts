/**
 * Long-running service types.
 */

import type { ChildProcess } from 'node:child_process';
import type { Environment } from '../environment/types.js';
import type { OutputBuffer } from '../executor/output-buffer.js';
import type { RuntimeLanguage } from '../runtime/profiles.js';

/** Internal service state (includes process and environment) */
export interface Service {
  service_id: string;
  language: RuntimeLanguage;
  pid: number;
  process: ChildProcess;
  environment: Environment;
  script_path: string;
  launcher: string | null;
  started_at: string;
  stdout: OutputBuffer;
  stderr: OutputBuffer;
}

/** What the caller keeps to stop the service later */
export interface ServiceHandle {
  service_id: string;
  pid: number;
  env_id: string;
  started_at: string;
}

/** Public-facing service info (no process reference) */
export interface ServiceInfo extends ServiceHandle {
  language: RuntimeLanguage;
  launcher: string | null;
  uptime_ms: number;
  stdout_tail: string;
  stderr_tail: string;
}

export interface StopServiceResult {
  service_id: string;
  uptime_ms: number;
  reason: 'manual' | 'shutdown';
}

/** A claimed service slot; released on register or when the start fails */
export interface ServiceSlot {
  release(): void;
}
