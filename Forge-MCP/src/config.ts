/**
 * Forge MCP Configuration
 *
 * Zod-validated environment config and environment stripping for
 * sandboxed subprocesses.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigurationError } from '@appforge/shared/Types/errors.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const envBoolean = z.preprocess(
  (v) => (typeof v === 'string' ? v.toLowerCase() === 'true' || v === '1' : v),
  z.boolean(),
);

export const LLMProviderSchema = z.enum(['groq', 'lmstudio', 'ollama']);
export type LLMProvider = z.infer<typeof LLMProviderSchema>;

const configSchema = z.object({
  // Filesystem
  sandboxDir: z.string().default('~/.appforge/sandbox'),
  logDir: z.string().default('~/.appforge/logs'),
  libraryDir: z.string().default('~/.appforge/apps'),

  // Time bounds
  defaultTimeoutMs: z.coerce.number().int().positive().default(30_000),
  maxTimeoutMs: z.coerce.number().int().positive().default(300_000),
  installTimeoutMs: z.coerce.number().int().positive().default(120_000),
  serviceGraceMs: z.coerce.number().int().positive().default(5_000),
  killGraceMs: z.coerce.number().int().positive().default(5_000),

  // Output capture
  maxOutputChars: z.coerce.number().int().positive().default(10_000),
  truncationHead: z.coerce.number().int().positive().default(4_000),
  truncationTail: z.coerce.number().int().positive().default(4_000),

  // Resource limits
  maxProcesses: z.coerce.number().int().positive().default(256),
  maxFileSizeBytes: z.coerce.number().int().positive().default(52_428_800), // 50MB
  maxServices: z.coerce.number().int().positive().default(5),

  // Runtimes
  pythonBin: z.string().min(1).default('python3'),
  repairServices: envBoolean.default(false),

  // LLM collaborator
  llmProvider: LLMProviderSchema.default('groq'),
  groqApiKey: z.string().optional(),
  groqModel: z.string().default('llama-3.3-70b-versatile'),
  lmstudioBaseUrl: z.string().url().default('http://localhost:1234/v1'),
  lmstudioModel: z.string().optional(),
  ollamaBaseUrl: z.string().url().default('http://localhost:11434'),
  ollamaModel: z.string().default('qwen2.5-coder'),
  temperature: z.coerce.number().min(0).max(2).default(0.2),
  llmTimeoutMs: z.coerce.number().int().positive().default(60_000),
  llmMaxTokens: z.coerce.number().int().positive().optional(),
});

export type ForgeConfig = z.infer<typeof configSchema>;
export type ForgeConfigInput = z.input<typeof configSchema>;

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

/**
 * Validate a raw config object, apply defaults and resolve paths.
 * Undefined keys fall back to their defaults.
 */
export function parseConfig(raw: Record<string, unknown> = {}): ForgeConfig {
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined && v !== ''),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigurationError(`Forge config error:\n${errors}`, { issues: result.error.errors });
  }

  const config = result.data;
  if (config.truncationHead + config.truncationTail > config.maxOutputChars) {
    throw new ConfigurationError(
      'Forge config error: truncationHead + truncationTail must not exceed maxOutputChars',
    );
  }

  config.sandboxDir = resolve(expandHome(config.sandboxDir));
  config.logDir = resolve(expandHome(config.logDir));
  config.libraryDir = resolve(expandHome(config.libraryDir));
  return config;
}

// ── Singleton (entry point only; components receive config explicitly) ─────

let cached: ForgeConfig | null = null;

export function getConfig(): ForgeConfig {
  if (cached) return cached;

  cached = parseConfig({
    sandboxDir: process.env.FORGE_SANDBOX_DIR,
    logDir: process.env.FORGE_LOG_DIR,
    libraryDir: process.env.FORGE_LIBRARY_DIR,
    defaultTimeoutMs: process.env.FORGE_DEFAULT_TIMEOUT_MS,
    maxTimeoutMs: process.env.FORGE_MAX_TIMEOUT_MS,
    installTimeoutMs: process.env.FORGE_INSTALL_TIMEOUT_MS,
    serviceGraceMs: process.env.FORGE_SERVICE_GRACE_MS,
    killGraceMs: process.env.FORGE_KILL_GRACE_MS,
    maxOutputChars: process.env.FORGE_MAX_OUTPUT_CHARS,
    truncationHead: process.env.FORGE_TRUNCATION_HEAD,
    truncationTail: process.env.FORGE_TRUNCATION_TAIL,
    maxProcesses: process.env.FORGE_MAX_PROCESSES,
    maxFileSizeBytes: process.env.FORGE_MAX_FILE_SIZE_BYTES,
    maxServices: process.env.FORGE_MAX_SERVICES,
    pythonBin: process.env.FORGE_PYTHON_BIN,
    repairServices: process.env.FORGE_REPAIR_SERVICES,
    llmProvider: process.env.FORGE_LLM_PROVIDER,
    groqApiKey: process.env.GROQ_API_KEY,
    groqModel: process.env.GROQ_MODEL,
    lmstudioBaseUrl: process.env.LMSTUDIO_BASE_URL,
    lmstudioModel: process.env.LMSTUDIO_MODEL,
    ollamaBaseUrl: process.env.OLLAMA_BASE_URL,
    ollamaModel: process.env.OLLAMA_MODEL,
    temperature: process.env.FORGE_LLM_TEMPERATURE,
    llmTimeoutMs: process.env.FORGE_LLM_TIMEOUT_MS,
    llmMaxTokens: process.env.FORGE_LLM_MAX_TOKENS,
  });
  return cached;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}

// ── Stripped Environment ─────────────────────────────────────────────────────

const ENV_ALLOWLIST = ['PATH', 'HOME', 'LANG', 'TERM', 'TMPDIR', 'USER'];

/**
 * Minimal environment for sandboxed subprocesses.
 * Only allowlisted vars pass through, so API keys never reach generated code.
 */
export function getStrippedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of ENV_ALLOWLIST) {
    const val = process.env[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  return env;
}
