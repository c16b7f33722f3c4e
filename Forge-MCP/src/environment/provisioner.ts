/**
 * Environment Provisioner — creates, populates and destroys disposable
 * sandbox environments.
 *
 * Every environment lives in its own `env_<id>` directory under the sandbox
 * root and is never reused. `withEnvironment` pairs creation with destruction
 * so cleanup does not depend on the caller's happy path.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { getStrippedEnv, type ForgeConfig } from '../config.js';
import { generateEnvironmentId } from '../utils/id-generator.js';
import { Logger } from '@appforge/shared/Utils/logger.js';
import { toErrorMessage } from '@appforge/shared/Types/errors.js';
import { PopulationError, ProvisioningError } from '../errors.js';
import { spawnAndCollect, type SpawnOutcome } from '../executor/spawn.js';
import { MANIFEST_FILE, readManifest, writeManifest } from './manifest.js';
import type { RuntimeLanguage, RuntimeProfiles, CommandSpec } from '../runtime/profiles.js';
import type { Environment, KeepEnvironment, PopulateResult } from './types.js';

const logger = new Logger('forge:provisioner');

type ProvisionerConfig = Pick<
  ForgeConfig,
  'sandboxDir' | 'installTimeoutMs' | 'killGraceMs' | 'maxOutputChars' | 'truncationHead' | 'truncationTail'
>;

export class EnvironmentProvisioner {
  constructor(
    private readonly config: ProvisionerConfig,
    private readonly profiles: RuntimeProfiles,
  ) {}

  // ── Create ────────────────────────────────────────────────────────────────

  async create(language: RuntimeLanguage): Promise<Environment> {
    const profile = this.profiles[language];
    const envId = generateEnvironmentId();
    const dir = join(this.config.sandboxDir, envId);

    let created = false;
    try {
      await mkdir(this.config.sandboxDir, { recursive: true });
      // Non-recursive: an existing directory means an id collision
      await mkdir(dir);
      created = true;

      const init = profile.initCommand(dir);
      if (init) {
        const outcome = await this.runTool(init, this.config.sandboxDir);
        if (outcome.exitCode !== 0) {
          throw new ProvisioningError(
            `Failed to initialise ${language} environment: ${outcome.stderr.trim() || `exit code ${outcome.exitCode}`}`,
            { env_id: envId, exitCode: outcome.exitCode },
          );
        }
      }

      for (const [file, content] of Object.entries(profile.initFiles(dir))) {
        await writeFile(join(dir, file), content, 'utf-8');
      }
    } catch (err) {
      // A colliding directory belongs to another environment
      if (created) await this.removeDir(dir);
      if (err instanceof ProvisioningError) throw err;
      throw new ProvisioningError(`Failed to create environment ${envId}: ${toErrorMessage(err)}`, {
        env_id: envId,
      });
    }

    const env: Environment = {
      env_id: envId,
      language,
      dir,
      bin_dir: profile.binDir(dir),
      interpreter: profile.interpreter(dir),
      manifest_path: join(dir, MANIFEST_FILE),
      state: 'created',
      created_at: new Date().toISOString(),
      profile,
    };
    logger.debug(`Created environment ${envId}`, { language, dir });
    return env;
  }

  // ── Populate ──────────────────────────────────────────────────────────────

  async populate(env: Environment, dependencies: readonly string[]): Promise<PopulateResult> {
    await writeManifest(env.manifest_path, dependencies);
    const manifest = await readManifest(env.manifest_path);

    if (manifest.length === 0) {
      env.state = 'populated';
      return { ok: true, dependencies: [], install_output: '' };
    }

    logger.info(`Installing ${manifest.length} package(s) into ${env.env_id}`, { dependencies: manifest });
    const outcome = await this.runTool(
      env.profile.installCommand(env.dir, env.manifest_path, manifest),
      env.dir,
      env.profile.environmentVariables(env.dir, getStrippedEnv()),
    );
    const combined = [outcome.stdout.trim(), outcome.stderr.trim()].filter(Boolean).join('\n');

    if (outcome.exitCode !== 0 || outcome.timedOut) {
      const reason = outcome.timedOut
        ? `timed out after ${this.config.installTimeoutMs}ms`
        : `exited with code ${outcome.exitCode}`;
      logger.warn(`Dependency install for ${env.env_id} ${reason}`);
      return {
        ok: false,
        error: new PopulationError(
          `${env.profile.packageManager} install ${reason}`,
          combined,
          outcome.exitCode,
        ),
      };
    }

    env.state = 'populated';
    return { ok: true, dependencies: manifest, install_output: combined };
  }

  // ── Destroy ───────────────────────────────────────────────────────────────

  /**
   * Remove the environment directory. Idempotent; never throws.
   */
  async destroy(env: Environment): Promise<void> {
    if (env.state === 'destroyed') return;
    await this.removeDir(env.dir);
    env.state = 'destroyed';
    logger.debug(`Destroyed environment ${env.env_id}`);
  }

  // ── Scoped acquire/release ───────────────────────────────────────────────

  /**
   * Create an environment, hand it to `fn`, and destroy it afterwards, on
   * every exit path. `fn` may return `{ keep: true, value }` to transfer the
   * environment to a new owner instead.
   */
  async withEnvironment<T>(
    language: RuntimeLanguage,
    fn: (env: Environment) => Promise<T | KeepEnvironment<T>>,
  ): Promise<T> {
    const env = await this.create(language);
    let keep = false;
    try {
      const result = await fn(env);
      if (isKeep(result)) {
        keep = true;
        return result.value;
      }
      return result;
    } finally {
      if (!keep) await this.destroy(env);
    }
  }

  // ── Helpers ───────────────────────────────────────────────────────────────

  private runTool(spec: CommandSpec, cwd: string, env: Record<string, string> = getStrippedEnv()): Promise<SpawnOutcome> {
    return spawnAndCollect(spec, {
      cwd,
      env,
      timeoutMs: this.config.installTimeoutMs,
      killGraceMs: this.config.killGraceMs,
      output: {
        maxChars: this.config.maxOutputChars,
        head: this.config.truncationHead,
        tail: this.config.truncationTail,
      },
    });
  }

  private async removeDir(dir: string): Promise<void> {
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (err) {
      logger.warn(`Failed to remove ${dir}: ${toErrorMessage(err)}`);
    }
  }
}

export function keepEnvironment<T>(value: T): KeepEnvironment<T> {
  return { keep: true, value };
}

function isKeep<T>(value: T | KeepEnvironment<T>): value is KeepEnvironment<T> {
  return typeof value === 'object' && value !== null && 'keep' in value && value.keep === true;
}
