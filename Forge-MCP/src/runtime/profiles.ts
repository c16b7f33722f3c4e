/**
 * How each supported language builds, populates and runs a sandbox environment.
 *
 * Python environments are virtualenvs populated with pip; Node environments
 * are private package directories populated with npm.
 */

import { builtinModules } from 'node:module';
import { join } from 'node:path';
import pythonStdlib from './python-stdlib.json' with { type: 'json' };
import type { ForgeConfig } from '../config.js';
import type { FailureKind } from '../executor/types.js';

export type RuntimeLanguage = 'python' | 'node';

export const RUNTIME_LANGUAGES = ['python', 'node'] as const satisfies readonly RuntimeLanguage[];

export interface CommandSpec {
  command: string;
  args: string[];
}

export interface RuntimeProfile {
  language: RuntimeLanguage;
  /** Human-readable name used in prompts */
  displayName: string;
  packageManager: string;
  /** Info string for fenced code blocks */
  fenceTag: string;
  scriptExtension: string;
  /** Command that initialises an empty environment directory, if any */
  initCommand(envDir: string): CommandSpec | null;
  /** Files written into a fresh environment directory */
  initFiles(envDir: string): Record<string, string>;
  binDir(envDir: string): string;
  interpreter(envDir: string): string;
  installCommand(envDir: string, manifestPath: string, dependencies: readonly string[]): CommandSpec;
  serviceCommand(envDir: string, scriptPath: string, launcher?: string): CommandSpec;
  environmentVariables(envDir: string, baseEnv: Record<string, string>): Record<string, string>;
  isStandardModule(name: string): boolean;
  /** stderr patterns that mark a failure as a missing package or a syntax error */
  failurePatterns: { missingDependency: RegExp; syntax: RegExp };
}

/**
 * Classify a failed run. A timeout wins over whatever stderr says.
 */
export function classifyFailure(profile: RuntimeProfile, stderr: string, timedOut: boolean): FailureKind {
  if (timedOut) return 'timeout';
  if (profile.failurePatterns.missingDependency.test(stderr)) return 'missing_dependency';
  if (profile.failurePatterns.syntax.test(stderr)) return 'syntax';
  return 'runtime';
}

// ── Python ──────────────────────────────────────────────────────────────────

const PYTHON_STDLIB = new Set(pythonStdlib.map((n) => n.toLowerCase()));

/** Launchers that take the script through a `run` subcommand */
const PYTHON_LAUNCHER_ARGS: Record<string, (script: string) => string[]> = {
  streamlit: (script) => ['run', script, '--server.headless', 'true'],
};

/** `requests>=2.0`, `uvicorn[standard]`, `google.cloud` → top-level name */
function topLevelPythonName(requirement: string): string {
  return requirement.trim().split(/[<>=!~[;\s]/)[0].split('.')[0].toLowerCase();
}

function prependPath(dir: string, baseEnv: Record<string, string>): string {
  return baseEnv.PATH ? `${dir}:${baseEnv.PATH}` : dir;
}

export function createPythonProfile(pythonBin: string): RuntimeProfile {
  const binDir = (envDir: string) => join(envDir, 'bin');

  return {
    language: 'python',
    displayName: 'Python',
    packageManager: 'pip',
    fenceTag: 'python',
    scriptExtension: '.py',
    initCommand: (envDir) => ({ command: pythonBin, args: ['-m', 'venv', envDir] }),
    initFiles: () => ({}),
    binDir,
    interpreter: (envDir) => join(binDir(envDir), 'python'),
    installCommand: (envDir, manifestPath) => ({
      command: join(binDir(envDir), 'python'),
      args: ['-m', 'pip', 'install', '--no-input', '--disable-pip-version-check', '-r', manifestPath],
    }),
    serviceCommand: (envDir, scriptPath, launcher) => {
      if (!launcher) {
        return { command: join(binDir(envDir), 'python'), args: [scriptPath] };
      }
      const launcherArgs = PYTHON_LAUNCHER_ARGS[launcher] ?? ((script: string) => [script]);
      return { command: join(binDir(envDir), launcher), args: launcherArgs(scriptPath) };
    },
    environmentVariables: (envDir, baseEnv) => ({
      ...baseEnv,
      VIRTUAL_ENV: envDir,
      PATH: prependPath(binDir(envDir), baseEnv),
      PYTHONUNBUFFERED: '1',
    }),
    isStandardModule: (name) => PYTHON_STDLIB.has(topLevelPythonName(name)),
    failurePatterns: {
      missingDependency: /\b(ModuleNotFoundError|ImportError)\b/,
      syntax: /\b(SyntaxError|IndentationError|TabError)\b/,
    },
  };
}

// ── Node ────────────────────────────────────────────────────────────────────

const NODE_BUILTINS = new Set(builtinModules);

/** `lodash@4`, `@scope/pkg/sub`, `node:fs` → package or module name */
function nodePackageName(spec: string): string {
  const trimmed = spec.trim();
  if (trimmed.startsWith('node:')) return trimmed;
  const parts = trimmed.split('/');
  const name = trimmed.startsWith('@') ? parts.slice(0, 2).join('/') : parts[0];
  return name.replace(/(.)@.*$/, '$1');
}

export function createNodeProfile(nodeBin: string = process.execPath): RuntimeProfile {
  const binDir = (envDir: string) => join(envDir, 'node_modules', '.bin');

  return {
    language: 'node',
    displayName: 'JavaScript (Node.js, ES modules)',
    packageManager: 'npm',
    fenceTag: 'javascript',
    scriptExtension: '.mjs',
    initCommand: () => null,
    initFiles: () => ({
      'package.json': JSON.stringify({ name: 'forge-sandbox', private: true, type: 'module' }, null, 2) + '\n',
    }),
    binDir,
    interpreter: () => nodeBin,
    installCommand: (_envDir, _manifestPath, dependencies) => ({
      command: 'npm',
      args: ['install', '--no-audit', '--no-fund', '--no-package-lock', ...dependencies],
    }),
    serviceCommand: (envDir, scriptPath, launcher) =>
      launcher
        ? { command: join(binDir(envDir), launcher), args: [scriptPath] }
        : { command: nodeBin, args: [scriptPath] },
    environmentVariables: (envDir, baseEnv) => ({
      ...baseEnv,
      NODE_PATH: join(envDir, 'node_modules'),
      PATH: prependPath(binDir(envDir), baseEnv),
    }),
    isStandardModule: (name) => {
      const pkg = nodePackageName(name);
      return pkg.startsWith('node:') || NODE_BUILTINS.has(pkg);
    },
    failurePatterns: {
      missingDependency: /\bERR_MODULE_NOT_FOUND\b|Cannot find (module|package)/,
      syntax: /\bSyntaxError\b/,
    },
  };
}

// ── Registry ────────────────────────────────────────────────────────────────

export type RuntimeProfiles = Record<RuntimeLanguage, RuntimeProfile>;

export function createRuntimeProfiles(config: Pick<ForgeConfig, 'pythonBin'>): RuntimeProfiles {
  return {
    python: createPythonProfile(config.pythonBin),
    node: createNodeProfile(),
  };
}
