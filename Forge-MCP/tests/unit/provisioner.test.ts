/**
 * Unit tests for the Environment Provisioner (node runtime; python when available).
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { EnvironmentProvisioner, keepEnvironment } from '../../src/environment/provisioner.js';
import { PopulationError, ProvisioningError } from '../../src/errors.js';
import { createNodeProfile, createRuntimeProfiles, type RuntimeProfiles } from '../../src/runtime/profiles.js';
import type { Environment } from '../../src/environment/types.js';
import { createTestDirs, pythonAvailable, type TestDirs } from '../helpers.js';

let dirs: TestDirs;
let provisioner: EnvironmentProvisioner;

/** Node profile whose installer always fails */
function failingInstallerProfiles(config: TestDirs['config']): RuntimeProfiles {
  const profiles = createRuntimeProfiles(config);
  return {
    ...profiles,
    node: {
      ...createNodeProfile(),
      installCommand: () => ({
        command: process.execPath,
        args: ['-e', 'console.error("no such package"); process.exit(3)'],
      }),
    },
  };
}

beforeEach(async () => {
  dirs = await createTestDirs();
  provisioner = new EnvironmentProvisioner(dirs.config, createRuntimeProfiles(dirs.config));
});

afterEach(async () => {
  await dirs.cleanup();
});

describe('create', () => {
  it('should create a fresh, initialised directory under the sandbox root', async () => {
    const env = await provisioner.create('node');

    expect(env.env_id).toMatch(/^env_[0-9a-f]{12}$/);
    expect(env.state).toBe('created');
    expect(dirname(env.dir)).toBe(dirs.config.sandboxDir);
    expect(env.manifest_path).toBe(join(env.dir, 'requirements.txt'));
    expect(existsSync(join(env.dir, 'package.json'))).toBe(true);
  });

  it('should never hand out the same environment twice', async () => {
    const [a, b] = await Promise.all([provisioner.create('node'), provisioner.create('node')]);

    expect(a.env_id).not.toBe(b.env_id);
    expect(a.dir).not.toBe(b.dir);
  });

  it('should leave a sibling environment intact when one is destroyed', async () => {
    const [a, b] = await Promise.all([provisioner.create('node'), provisioner.create('node')]);
    await writeFile(join(b.dir, 'main.mjs'), 'console.log("b")', 'utf-8');

    await provisioner.destroy(a);

    expect(existsSync(a.dir)).toBe(false);
    expect(existsSync(join(b.dir, 'package.json'))).toBe(true);
    expect(await readFile(join(b.dir, 'main.mjs'), 'utf-8')).toBe('console.log("b")');
    expect(b.state).toBe('created');
  });

  it('should remove the partial directory when initialisation fails', async () => {
    const profiles = createRuntimeProfiles(dirs.config);
    const broken = new EnvironmentProvisioner(dirs.config, {
      ...profiles,
      node: {
        ...profiles.node,
        initCommand: () => ({ command: process.execPath, args: ['-e', 'process.exit(2)'] }),
      },
    });

    await expect(broken.create('node')).rejects.toThrow(ProvisioningError);
    expect(await readdir(dirs.config.sandboxDir)).toEqual([]);
  });

  it.skipIf(!pythonAvailable)('should create a python virtualenv', async () => {
    const env = await provisioner.create('python');

    expect(env.interpreter).toBe(join(env.dir, 'bin', 'python'));
    expect(existsSync(env.interpreter)).toBe(true);
    await provisioner.destroy(env);
  }, 60_000);
});

describe('populate', () => {
  it('should skip the installer for an empty dependency list', async () => {
    const env = await provisioner.create('node');

    const result = await provisioner.populate(env, []);

    expect(result).toEqual({ ok: true, dependencies: [], install_output: '' });
    expect(env.state).toBe('populated');
    expect(await readFile(env.manifest_path, 'utf-8')).toBe('');
  });

  it('should return a PopulationError carrying the installer output', async () => {
    const failing = new EnvironmentProvisioner(dirs.config, failingInstallerProfiles(dirs.config));
    const env = await failing.create('node');

    const result = await failing.populate(env, ['left-pad', 'left-pad']);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(PopulationError);
    expect(result.error.message).toBe('npm install exited with code 3');
    expect(result.error.output).toBe('no such package');
    expect(env.state).toBe('created');
    expect(await readFile(env.manifest_path, 'utf-8')).toBe('left-pad\n');
  });
});

describe('destroy', () => {
  it('should remove the directory and be idempotent', async () => {
    const env = await provisioner.create('node');

    await provisioner.destroy(env);
    await provisioner.destroy(env);

    expect(env.state).toBe('destroyed');
    expect(existsSync(env.dir)).toBe(false);
  });

  it('should not throw when the directory is already gone', async () => {
    const env = await provisioner.create('node');
    await rm(env.dir, { recursive: true, force: true });

    await expect(provisioner.destroy(env)).resolves.toBeUndefined();
    expect(env.state).toBe('destroyed');
  });
});

describe('withEnvironment', () => {
  it('should destroy the environment after the callback returns', async () => {
    let dir = '';
    const value = await provisioner.withEnvironment('node', async (env) => {
      dir = env.dir;
      return 42;
    });

    expect(value).toBe(42);
    expect(existsSync(dir)).toBe(false);
  });

  it('should destroy the environment when the callback throws', async () => {
    let dir = '';
    await expect(
      provisioner.withEnvironment('node', async (env) => {
        dir = env.dir;
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(dir).not.toBe('');
    expect(existsSync(dir)).toBe(false);
  });

  it('should keep the environment when the callback hands it over', async () => {
    const env = await provisioner.withEnvironment<Environment>('node', async (created) => keepEnvironment(created));

    expect(existsSync(env.dir)).toBe(true);
    await provisioner.destroy(env);
  });
});
