import { config as dotenvConfig } from 'dotenv';
import { existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Load `.env` from a package root without letting dotenv print to stdout
 * (the MCP stdio transport owns stdout).
 *
 * @param importMetaUrl - `import.meta.url` of the calling module
 * @param levelsUp - directories between the calling module and the package root
 * @returns whether a `.env` file was found and loaded
 */
export function loadEnvSafely(importMetaUrl: string, levelsUp = 1): boolean {
  let dir = dirname(fileURLToPath(importMetaUrl));
  for (let i = 0; i < levelsUp; i++) {
    dir = dirname(dir);
  }
  const envPath = resolve(dir, '.env');
  if (!existsSync(envPath)) return false;
  dotenvConfig({ path: envPath, quiet: true });
  return true;
}
