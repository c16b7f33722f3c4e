// Manifest format: plain UTF-8 text, one package name per line.

import { readFile, writeFile } from 'node:fs/promises';

export const MANIFEST_FILE = 'requirements.txt';

/**
 * Trim, drop blanks, and keep the first occurrence of each name.
 */
export function normalizeDependencies(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of names) {
    const name = raw.trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    result.push(name);
  }
  return result;
}

export function serializeManifest(dependencies: readonly string[]): string {
  const names = normalizeDependencies(dependencies);
  return names.length === 0 ? '' : names.join('\n') + '\n';
}

/** Comment lines (`#`) and blank lines are ignored */
export function parseManifest(text: string): string[] {
  return normalizeDependencies(
    text.split(/\r?\n/).filter((line) => !line.trim().startsWith('#')),
  );
}

export async function writeManifest(path: string, dependencies: readonly string[]): Promise<void> {
  await writeFile(path, serializeManifest(dependencies), 'utf-8');
}

export async function readManifest(path: string): Promise<string[]> {
  return parseManifest(await readFile(path, 'utf-8'));
}
