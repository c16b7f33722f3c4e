/**
 * Process Runner — executes a program inside a provisioned environment.
 *
 * Ephemeral mode runs to completion under a hard timeout. Long-running mode
 * starts a service and treats survival past a grace window as success.
 */

import { writeFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { ChildProcess } from 'node:child_process';
import { getStrippedEnv, type ForgeConfig } from '../config.js';
import { generateExecutionId } from '../utils/id-generator.js';
import { Logger } from '@appforge/shared/Utils/logger.js';
import { toErrorMessage } from '@appforge/shared/Types/errors.js';
import { OutputBuffer } from './output-buffer.js';
import {
  spawnAndCollect,
  spawnDetached,
  signalProcessTree,
  withResourceLimits,
  releaseStdio,
  SPAWN_FAILURE_EXIT_CODE,
  EXIT_DRAIN_MS,
} from './spawn.js';
import type { Environment } from '../environment/types.js';
import type { RunOutcome, StartOptions, StartOutcome } from './types.js';

const logger = new Logger('forge:runner');

type RunnerConfig = Pick<
  ForgeConfig,
  | 'serviceGraceMs'
  | 'killGraceMs'
  | 'maxOutputChars'
  | 'truncationHead'
  | 'truncationTail'
  | 'maxProcesses'
  | 'maxFileSizeBytes'
>;

export class ProcessRunner {
  constructor(private readonly config: RunnerConfig) {}

  // ── Ephemeral ─────────────────────────────────────────────────────────────

  async run(env: Environment, source: string, timeoutMs: number): Promise<RunOutcome> {
    const executionId = generateExecutionId();
    const scriptPath = await this.writeScript(env, executionId, source);
    env.state = 'in_use';

    try {
      const command = withResourceLimits(
        { command: env.interpreter, args: [scriptPath] },
        this.config,
      );
      const outcome = await spawnAndCollect(command, {
        cwd: env.dir,
        env: env.profile.environmentVariables(env.dir, getStrippedEnv()),
        timeoutMs,
        killGraceMs: this.config.killGraceMs,
        output: this.truncateConfig(),
      });

      logger.debug(`Run ${executionId} finished`, {
        env_id: env.env_id,
        exit_code: outcome.exitCode,
        timed_out: outcome.timedOut,
        duration_ms: outcome.durationMs,
      });

      return {
        execution_id: executionId,
        exit_code: outcome.exitCode,
        stdout: outcome.stdout,
        stderr: outcome.timedOut
          ? appendLine(outcome.stderr, `Execution timed out after ${timeoutMs}ms`)
          : outcome.stderr,
        timed_out: outcome.timedOut,
        truncated: outcome.truncated,
        duration_ms: outcome.durationMs,
      };
    } finally {
      await removeScript(scriptPath);
    }
  }

  // ── Long-running ──────────────────────────────────────────────────────────

  async start(env: Environment, source: string, opts: StartOptions = {}): Promise<StartOutcome> {
    const executionId = generateExecutionId();
    const graceMs = opts.graceMs ?? this.config.serviceGraceMs;
    const scriptPath = await this.writeScript(env, executionId, source);
    env.state = 'in_use';

    const command = withResourceLimits(
      env.profile.serviceCommand(env.dir, scriptPath, opts.launcher),
      this.config,
    );
    const stdout = new OutputBuffer(this.truncateConfig());
    const stderr = new OutputBuffer(this.truncateConfig());
    const startTime = Date.now();

    const child = spawnDetached(command, {
      cwd: env.dir,
      env: env.profile.environmentVariables(env.dir, getStrippedEnv()),
    });
    child.stdout?.on('data', (chunk: string) => stdout.append(chunk));
    child.stderr?.on('data', (chunk: string) => stderr.append(chunk));

    // Resolves with the exit code if the process dies inside the window, null if it survives
    const exited = await new Promise<{ code: number | null } | null>((resolve) => {
      const timer = setTimeout(() => {
        cleanupListeners();
        resolve(null);
      }, graceMs);

      const onExit = (code: number | null) => {
        clearTimeout(timer);
        cleanupListeners();
        resolve({ code });
      };
      const onError = (err: Error) => {
        stderr.append(err.message);
        clearTimeout(timer);
        cleanupListeners();
        signalProcessTree(child, 'SIGKILL');
        resolve({ code: SPAWN_FAILURE_EXIT_CODE });
      };
      const cleanupListeners = () => {
        child.off('exit', onExit);
        child.off('error', onError);
      };

      child.on('exit', onExit);
      child.on('error', onError);
    });

    if (exited) {
      await drainOutput(child);
      logger.info(`Service ${executionId} exited during the ${graceMs}ms grace window`, {
        env_id: env.env_id,
        exit_code: exited.code,
      });
      return {
        started: false,
        execution_id: executionId,
        exit_code: exited.code,
        stdout: stdout.toString(),
        stderr: stderr.toString() || `Process exited with code ${exited.code} during startup`,
        duration_ms: Date.now() - startTime,
      };
    }

    if (child.pid === undefined) {
      // Never happens for a process that outlived the window; keeps pid typed as number
      signalProcessTree(child, 'SIGKILL');
      return {
        started: false,
        execution_id: executionId,
        exit_code: null,
        stdout: stdout.toString(),
        stderr: 'Service process has no pid',
        duration_ms: Date.now() - startTime,
      };
    }

    logger.info(`Service ${executionId} alive after ${graceMs}ms`, { env_id: env.env_id, pid: child.pid });
    return {
      started: true,
      execution_id: executionId,
      process: child,
      pid: child.pid,
      script_path: scriptPath,
      stdout,
      stderr,
      duration_ms: Date.now() - startTime,
    };
  }

  // ── Helpers ───────────────────────────────────────────────────────────────

  private async writeScript(env: Environment, executionId: string, source: string): Promise<string> {
    const scriptPath = join(env.dir, `_forge_${executionId}${env.profile.scriptExtension}`);
    await writeFile(scriptPath, source, 'utf-8');
    return scriptPath;
  }

  private truncateConfig() {
    return {
      maxChars: this.config.maxOutputChars,
      head: this.config.truncationHead,
      tail: this.config.truncationTail,
    };
  }
}

function appendLine(text: string, line: string): string {
  if (!text) return line;
  return text.endsWith('\n') ? `${text}${line}` : `${text}\n${line}`;
}

/** Wait for the pipes of an exited child to close, at most EXIT_DRAIN_MS */
function drainOutput(child: ChildProcess): Promise<void> {
  return new Promise<void>((resolve) => {
    const done = () => {
      clearTimeout(timer);
      child.off('close', done);
      releaseStdio(child);
      resolve();
    };
    const timer = setTimeout(done, EXIT_DRAIN_MS);
    child.once('close', done);
  });
}

async function removeScript(scriptPath: string): Promise<void> {
  try {
    await unlink(scriptPath);
  } catch (err) {
    logger.debug(`Script cleanup skipped for ${scriptPath}: ${toErrorMessage(err)}`);
  }
}
