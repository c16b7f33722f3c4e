/**
 * Unit tests for Forge configuration.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigurationError } from '@appforge/shared/Types/errors.js';
import { expandHome, getConfig, getStrippedEnv, parseConfig, resetConfig } from '../../src/config.js';

const savedEnv = { ...process.env };

afterEach(() => {
  for (const key of Object.keys(process.env)) {
    if (!(key in savedEnv)) delete process.env[key];
  }
  Object.assign(process.env, savedEnv);
  resetConfig();
});

describe('parseConfig', () => {
  it('should apply defaults', () => {
    const config = parseConfig({});

    expect(config.defaultTimeoutMs).toBe(30_000);
    expect(config.maxTimeoutMs).toBe(300_000);
    expect(config.installTimeoutMs).toBe(120_000);
    expect(config.serviceGraceMs).toBe(5_000);
    expect(config.killGraceMs).toBe(5_000);
    expect(config.maxServices).toBe(5);
    expect(config.pythonBin).toBe('python3');
    expect(config.repairServices).toBe(false);
    expect(config.llmProvider).toBe('groq');
    expect(config.llmTimeoutMs).toBe(60_000);
    expect(config.llmMaxTokens).toBeUndefined();
    expect(config.sandboxDir).toBe(resolve(homedir(), '.appforge/sandbox'));
  });

  it('should coerce env-style strings', () => {
    const config = parseConfig({ defaultTimeoutMs: '5000', repairServices: 'true', temperature: '0.5' });

    expect(config.defaultTimeoutMs).toBe(5_000);
    expect(config.repairServices).toBe(true);
    expect(config.temperature).toBe(0.5);
  });

  it('should read "1" as true and anything else as false for booleans', () => {
    expect(parseConfig({ repairServices: '1' }).repairServices).toBe(true);
    expect(parseConfig({ repairServices: 'no' }).repairServices).toBe(false);
  });

  it('should treat empty strings as unset', () => {
    expect(parseConfig({ maxServices: '' }).maxServices).toBe(5);
  });

  it('should reject an unknown provider', () => {
    expect(() => parseConfig({ llmProvider: 'openai' })).toThrow(ConfigurationError);
  });

  it('should reject truncation windows larger than the output limit', () => {
    expect(() => parseConfig({ maxOutputChars: 100, truncationHead: 60, truncationTail: 60 })).toThrow(
      'truncationHead + truncationTail must not exceed maxOutputChars',
    );
  });
});

describe('expandHome', () => {
  it('should expand a leading ~', () => {
    expect(expandHome('~/apps')).toBe(`${homedir()}/apps`);
    expect(expandHome('/srv/apps')).toBe('/srv/apps');
  });
});

describe('getConfig', () => {
  it('should read FORGE_* variables and cache the result', () => {
    process.env.FORGE_MAX_SERVICES = '2';
    process.env.FORGE_SANDBOX_DIR = '/tmp/forge-config-test';
    process.env.FORGE_LLM_TIMEOUT_MS = '15000';
    process.env.FORGE_LLM_MAX_TOKENS = '2048';
    resetConfig();

    const config = getConfig();
    expect(config.maxServices).toBe(2);
    expect(config.sandboxDir).toBe('/tmp/forge-config-test');
    expect(config.llmTimeoutMs).toBe(15_000);
    expect(config.llmMaxTokens).toBe(2_048);

    process.env.FORGE_MAX_SERVICES = '3';
    expect(getConfig().maxServices).toBe(2);
  });
});

describe('getStrippedEnv', () => {
  it('should pass allowlisted variables only', () => {
    process.env.GROQ_API_KEY = 'test-secret';
    process.env.HOME = '/home/tester';

    const env = getStrippedEnv();
    expect(env.HOME).toBe('/home/tester');
    expect(env.GROQ_API_KEY).toBeUndefined();
  });
});
