/**
 * Spawn a command, collect bounded output, enforce a wall-clock timeout.
 *
 * Children run in their own process group so a timeout or stop reaches
 * everything the program forked (SIGTERM → grace → SIGKILL).
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { OutputBuffer, type TruncateConfig } from './output-buffer.js';
import type { CommandSpec } from '../runtime/profiles.js';

export interface SpawnOptions {
  cwd: string;
  env: Record<string, string>;
  timeoutMs: number;
  killGraceMs: number;
  output: TruncateConfig;
}

export interface SpawnOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  truncated: boolean;
  durationMs: number;
}

/** Exit code reported when the command could not be started at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * How long to keep reading stdout/stderr after the child exits. A descendant
 * outside the process group can hold the pipes open forever.
 */
export const EXIT_DRAIN_MS = 250;

/**
 * Stop reading the child's pipes. Whatever still holds them writes into a closed pipe.
 */
export function releaseStdio(child: ChildProcess): void {
  child.stdout?.destroy();
  child.stderr?.destroy();
}

/**
 * Send `signal` to the child's process group, falling back to the child alone.
 */
export function signalProcessTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) return;
  try {
    process.kill(-child.pid, signal);
  } catch {
    try {
      child.kill(signal);
    } catch {
      // Process already gone
    }
  }
}

/**
 * Wrap a command so it runs under per-process resource limits.
 * `$0`/`$@` carry the real command, so paths need no shell quoting.
 */
export function withResourceLimits(
  spec: CommandSpec,
  limits: { maxProcesses: number; maxFileSizeBytes: number },
): CommandSpec {
  const maxFileBlocks = Math.floor(limits.maxFileSizeBytes / 512);
  return {
    command: 'bash',
    args: [
      '-c',
      `ulimit -u ${limits.maxProcesses} -f ${maxFileBlocks} && exec "$0" "$@"`,
      spec.command,
      ...spec.args,
    ],
  };
}

export function spawnDetached(spec: CommandSpec, opts: Pick<SpawnOptions, 'cwd' | 'env'>): ChildProcess {
  const child = spawn(spec.command, spec.args, {
    cwd: opts.cwd,
    env: opts.env,
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: true,
  });
  child.stdout?.setEncoding('utf-8');
  child.stderr?.setEncoding('utf-8');
  return child;
}

export function spawnAndCollect(spec: CommandSpec, opts: SpawnOptions): Promise<SpawnOutcome> {
  const startTime = Date.now();
  const stdout = new OutputBuffer(opts.output);
  const stderr = new OutputBuffer(opts.output);

  return new Promise<SpawnOutcome>((resolve) => {
    let timedOut = false;
    let settled = false;
    let killTimer: ReturnType<typeof setTimeout> | null = null;
    let drainTimer: ReturnType<typeof setTimeout> | null = null;

    const child = spawnDetached(spec, opts);
    child.stdout?.on('data', (chunk: string) => stdout.append(chunk));
    child.stderr?.on('data', (chunk: string) => stderr.append(chunk));

    const finish = (exitCode: number | null, signal: NodeJS.Signals | null, spawnError?: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      if (drainTimer) clearTimeout(drainTimer);
      releaseStdio(child);

      if (spawnError) stderr.append(spawnError.message);
      const out = stdout.result();
      const err = stderr.result();
      resolve({
        exitCode,
        signal,
        stdout: out.text,
        stderr: err.text,
        timedOut,
        truncated: out.truncated || err.truncated,
        durationMs: Date.now() - startTime,
      });
    };

    // Settle a bounded time after the process is gone, even if its pipes never close
    const drainThenFinish = () => {
      if (settled || drainTimer) return;
      drainTimer = setTimeout(() => finish(child.exitCode, child.signalCode), EXIT_DRAIN_MS);
    };

    const timeoutTimer = setTimeout(() => {
      timedOut = true;
      signalProcessTree(child, 'SIGTERM');
      killTimer = setTimeout(() => {
        signalProcessTree(child, 'SIGKILL');
        drainThenFinish();
      }, opts.killGraceMs);
    }, opts.timeoutMs);

    // e.g. command not found
    child.on('error', (err) => finish(SPAWN_FAILURE_EXIT_CODE, null, err));
    child.on('exit', drainThenFinish);
    child.on('close', (code, signal) => finish(code, signal));
  });
}
