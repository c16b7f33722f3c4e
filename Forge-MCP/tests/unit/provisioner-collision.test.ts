/**
 * Environment id collisions must not touch the directory that already exists.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

vi.mock('../../src/utils/id-generator.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/utils/id-generator.js')>();
  return { ...actual, generateEnvironmentId: () => 'env_000000000abc' };
});

import { EnvironmentProvisioner } from '../../src/environment/provisioner.js';
import { ProvisioningError } from '../../src/errors.js';
import { createRuntimeProfiles } from '../../src/runtime/profiles.js';
import { createTestDirs, type TestDirs } from '../helpers.js';

let dirs: TestDirs;

beforeEach(async () => {
  dirs = await createTestDirs();
});

afterEach(async () => {
  await dirs.cleanup();
});

describe('create with a colliding id', () => {
  it('should fail and keep the existing environment directory', async () => {
    const existing = join(dirs.config.sandboxDir, 'env_000000000abc');
    await mkdir(existing, { recursive: true });
    await writeFile(join(existing, 'main.mjs'), 'console.log("live")', 'utf-8');
    const provisioner = new EnvironmentProvisioner(dirs.config, createRuntimeProfiles(dirs.config));

    const created = provisioner.create('node');

    await expect(created).rejects.toThrow(ProvisioningError);
    await expect(created).rejects.toThrow('Failed to create environment env_000000000abc: EEXIST');
    expect(await readFile(join(existing, 'main.mjs'), 'utf-8')).toBe('console.log("live")');
  });
});
