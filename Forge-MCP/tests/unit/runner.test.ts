/**
 * Unit tests for the Process Runner (node runtime).
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir } from 'node:fs/promises';
import type { ChildProcess } from 'node:child_process';
import { EnvironmentProvisioner } from '../../src/environment/provisioner.js';
import { ProcessRunner } from '../../src/executor/runner.js';
import { signalProcessTree } from '../../src/executor/spawn.js';
import { createRuntimeProfiles } from '../../src/runtime/profiles.js';
import type { Environment } from '../../src/environment/types.js';
import { createTestDirs, type TestDirs } from '../helpers.js';

let dirs: TestDirs;
let provisioner: EnvironmentProvisioner;
let runner: ProcessRunner;
let env: Environment;

beforeEach(async () => {
  dirs = await createTestDirs();
  provisioner = new EnvironmentProvisioner(dirs.config, createRuntimeProfiles(dirs.config));
  runner = new ProcessRunner(dirs.config);
  env = await provisioner.create('node');
});

afterEach(async () => {
  await provisioner.destroy(env);
  await dirs.cleanup();
});

/** Program that leaves a detached grandchild holding its stdout and stderr, then runs `tail` */
function withOrphan(tail: string): string {
  return [
    "import { spawn } from 'node:child_process';",
    "const orphan = spawn(process.execPath, ['-e', 'setTimeout(() => {}, 5000)'], {",
    "  detached: true,",
    "  stdio: ['ignore', 'inherit', 'inherit'],",
    '});',
    'orphan.unref();',
    'console.log(`orphan ${orphan.pid}`);',
    tail,
  ].join('\n');
}

function killOrphan(stdout: string): void {
  const match = /orphan (\d+)/.exec(stdout);
  if (!match) return;
  try {
    process.kill(Number(match[1]), 'SIGKILL');
  } catch {
    // already exited
  }
}

function waitForClose(child: ChildProcess): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null) return Promise.resolve();
  return new Promise((resolve) => child.once('close', () => resolve()));
}

describe('run', () => {
  it('should capture stdout and exit code 0', async () => {
    const outcome = await runner.run(env, 'console.log("hello from node")', 5_000);

    expect(outcome.stdout).toBe('hello from node\n');
    expect(outcome.stderr).toBe('');
    expect(outcome.exit_code).toBe(0);
    expect(outcome.timed_out).toBe(false);
    expect(outcome.execution_id).toMatch(/^exec_[0-9a-f]{12}$/);
  });

  it('should report a non-zero exit code with stderr', async () => {
    const outcome = await runner.run(env, 'console.error("bad input"); process.exit(4)', 5_000);

    expect(outcome.exit_code).toBe(4);
    expect(outcome.stderr).toBe('bad input\n');
  });

  it('should kill a program that exceeds its timeout', async () => {
    const outcome = await runner.run(env, 'setInterval(() => {}, 1000)', 500);

    expect(outcome.timed_out).toBe(true);
    expect(outcome.stderr).toBe('Execution timed out after 500ms');
    expect(outcome.duration_ms).toBeLessThan(5_000);
  });

  it('should return once the program exits even if a grandchild keeps its output open', async () => {
    const startTime = Date.now();
    const outcome = await runner.run(env, withOrphan(''), 5_000);
    killOrphan(outcome.stdout);

    expect(outcome.exit_code).toBe(0);
    expect(outcome.timed_out).toBe(false);
    expect(outcome.stdout).toMatch(/^orphan \d+\n$/);
    expect(Date.now() - startTime).toBeLessThan(3_000);
  });

  it('should honour the timeout when a grandchild keeps its output open', async () => {
    const startTime = Date.now();
    const outcome = await runner.run(env, withOrphan('setInterval(() => {}, 1000);'), 500);
    killOrphan(outcome.stdout);

    expect(outcome.timed_out).toBe(true);
    expect(outcome.stderr).toBe('Execution timed out after 500ms');
    expect(Date.now() - startTime).toBeLessThan(4_000);
  });

  it('should remove the script file on every path', async () => {
    await runner.run(env, 'console.log(1)', 5_000);
    await runner.run(env, 'process.exit(1)', 5_000);
    await runner.run(env, 'setInterval(() => {}, 1000)', 300);

    expect(await readdir(env.dir)).toEqual(['package.json']);
  });

  it('should not pass secrets from the parent environment', async () => {
    process.env.GROQ_API_KEY = 'test-secret';
    try {
      const outcome = await runner.run(env, 'console.log(process.env.GROQ_API_KEY ?? "unset")', 5_000);
      expect(outcome.stdout).toBe('unset\n');
    } finally {
      delete process.env.GROQ_API_KEY;
    }
  });
});

describe('start', () => {
  it('should report a process alive after the grace window as started', async () => {
    const outcome = await runner.start(env, 'console.log("up"); setInterval(() => {}, 1000)', { graceMs: 500 });

    expect(outcome.started).toBe(true);
    if (!outcome.started) return;
    expect(outcome.pid).toBeGreaterThan(0);
    expect(outcome.stdout.toString()).toBe('up\n');

    signalProcessTree(outcome.process, 'SIGKILL');
    await waitForClose(outcome.process);
  });

  it('should report a process that exits inside the window as failed', async () => {
    const outcome = await runner.start(env, 'console.error("crash"); process.exit(2)', { graceMs: 2_000 });

    expect(outcome.started).toBe(false);
    if (outcome.started) return;
    expect(outcome.exit_code).toBe(2);
    expect(outcome.stderr).toBe('crash\n');
    expect(outcome.duration_ms).toBeLessThan(2_000);
  });

  it('should report a program that exits while a grandchild holds its output as failed', async () => {
    const outcome = await runner.start(env, withOrphan('process.exit(1);'), { graceMs: 2_000 });

    expect(outcome.started).toBe(false);
    if (outcome.started) return;
    killOrphan(outcome.stdout);
    expect(outcome.exit_code).toBe(1);
    expect(outcome.stdout).toMatch(/^orphan \d+\n$/);
    expect(outcome.duration_ms).toBeLessThan(2_000);
  });

  it('should count a clean exit inside the window as a failure', async () => {
    const outcome = await runner.start(env, 'process.exit(0)', { graceMs: 2_000 });

    expect(outcome.started).toBe(false);
    if (outcome.started) return;
    expect(outcome.exit_code).toBe(0);
    expect(outcome.stderr).toBe('Process exited with code 0 during startup');
  });
});
