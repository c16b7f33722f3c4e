/**
 * Provisioned environment types.
 */

import type { RuntimeLanguage, RuntimeProfile } from '../runtime/profiles.js';
import type { PopulationError } from '../errors.js';

export type EnvironmentState = 'created' | 'populated' | 'in_use' | 'destroyed';

/** One disposable sandbox, owned by exactly one request */
export interface Environment {
  env_id: string;
  language: RuntimeLanguage;
  dir: string;
  bin_dir: string;
  interpreter: string;
  manifest_path: string;
  state: EnvironmentState;
  created_at: string;
  profile: RuntimeProfile;
}

export type PopulateResult =
  | { ok: true; dependencies: string[]; install_output: string }
  | { ok: false; error: PopulationError };

/** Returned by a `withEnvironment` callback that hands the environment to a new owner */
export interface KeepEnvironment<T> {
  keep: true;
  value: T;
}
