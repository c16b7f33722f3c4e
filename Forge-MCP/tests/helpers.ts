/**
 * Shared test fixtures: temp-dir config, scripted text generator, python availability check.
 */

import { spawnSync } from 'node:child_process';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getStrippedEnv, parseConfig, type ForgeConfig, type ForgeConfigInput } from '../src/config.js';
import type { TextGenerator } from '../src/llm/types.js';

export interface TestDirs {
  root: string;
  config: ForgeConfig;
  cleanup(): Promise<void>;
}

/**
 * Config rooted in a fresh temp dir, with short grace windows so subprocess
 * tests stay fast.
 */
export async function createTestDirs(overrides: ForgeConfigInput = {}): Promise<TestDirs> {
  const root = await mkdtemp(join(tmpdir(), 'forge-test-'));
  const config = parseConfig({
    sandboxDir: join(root, 'sandbox'),
    logDir: join(root, 'logs'),
    libraryDir: join(root, 'apps'),
    serviceGraceMs: 1_000,
    killGraceMs: 1_000,
    defaultTimeoutMs: 10_000,
    maxProcesses: 4_096,
    ...overrides,
  });
  return {
    root,
    config,
    cleanup: () => rm(root, { recursive: true, force: true }),
  };
}

type Reply = string | Error | ((prompt: string) => string);

/**
 * TextGenerator that answers from a queue, in order, and records every prompt.
 * Running out of replies is an error.
 */
export class ScriptedGenerator implements TextGenerator {
  readonly prompts: string[] = [];
  private readonly replies: Reply[];

  constructor(replies: Reply[] = []) {
    this.replies = [...replies];
  }

  push(...replies: Reply[]): this {
    this.replies.push(...replies);
    return this;
  }

  get calls(): number {
    return this.prompts.length;
  }

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('ScriptedGenerator: no reply queued');
    }
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(prompt) : reply;
  }
}

/** `python3` with venv + ensurepip, reachable from the sandbox environment */
export const pythonAvailable: boolean = (() => {
  const check = spawnSync('python3', ['-c', 'import venv, ensurepip'], { stdio: 'ignore', env: getStrippedEnv() });
  return check.status === 0;
})();

export function fenced(code: string, tag = 'javascript'): string {
  return '```' + tag + '\n' + code + '\n```';
}
