/**
 * App Library — filesystem catalog of generated app bundles.
 *
 * Each app is a directory holding its source files plus metadata.json.
 * A consolidated index.json enables fast listing/searching and is rebuilt
 * from the app directories when missing or corrupt.
 */

import { readFile, writeFile, mkdir, rm, readdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { basename, join } from 'node:path';
import { Logger } from '@appforge/shared/Utils/logger.js';
import { ValidationError, toErrorMessage } from '@appforge/shared/Types/errors.js';
import { AppNotFoundError } from '../errors.js';
import {
  AppIndexSchema,
  AppMetadataSchema,
  type AppMetadata,
  type DeleteAppResult,
  type GetAppResult,
  type SaveAppOptions,
  type SaveAppResult,
} from './types.js';

const logger = new Logger('forge:library');

const METADATA_FILE = 'metadata.json';

export class AppLibrary {
  constructor(private readonly baseDir: string) {}

  // ── Save ─────────────────────────────────────────────────────────────────

  async save(opts: SaveAppOptions): Promise<SaveAppResult> {
    const slug = this.slugify(opts.name);
    if (!slug) {
      throw new ValidationError('App name must contain at least one alphanumeric character');
    }
    const fileNames = Object.keys(opts.files);
    if (fileNames.length === 0) {
      throw new ValidationError('An app needs at least one file');
    }
    for (const file of fileNames) {
      assertPlainFileName(file);
    }

    const appDir = this.getAppDir(slug);
    const isNew = !existsSync(appDir);
    const existing = isNew ? null : await this.readMetadata(slug).catch(() => null);

    try {
      await mkdir(appDir, { recursive: true });

      for (const [file, content] of Object.entries(opts.files)) {
        await writeFile(join(appDir, file), content, 'utf-8');
      }

      const now = new Date().toISOString();
      const metadata: AppMetadata = {
        name: slug,
        display_name: opts.name,
        description: opts.description,
        files: fileNames,
        tags: opts.tags ?? [],
        dependencies: opts.dependencies ?? [],
        created_at: existing?.created_at ?? now,
        updated_at: now,
      };
      await writeFile(join(appDir, METADATA_FILE), JSON.stringify(metadata, null, 2), 'utf-8');

      // Files from the previous bundle that the new one no longer has
      for (const stale of existing?.files ?? []) {
        if (!fileNames.includes(stale) && isPlainFileName(stale)) {
          await rm(join(appDir, stale), { force: true });
        }
      }

      await this.updateIndex(metadata);
    } catch (err) {
      if (isNew) {
        await rm(appDir, { recursive: true, force: true }).catch((rmErr) =>
          logger.warn(`Failed to remove partial app dir ${appDir}: ${toErrorMessage(rmErr)}`),
        );
      }
      throw err;
    }

    logger.info(`Saved app "${slug}"`, { files: fileNames, created: isNew });
    return { name: slug, path: appDir, files: fileNames, created: isNew };
  }

  // ── Get ──────────────────────────────────────────────────────────────────

  async get(name: string): Promise<GetAppResult> {
    const slug = this.slugify(name);
    const metadata = await this.readMetadata(slug);
    const appDir = this.getAppDir(slug);

    const files: Record<string, string> = {};
    for (const file of metadata.files) {
      if (!isPlainFileName(file)) continue;
      try {
        files[file] = await readFile(join(appDir, file), 'utf-8');
      } catch {
        throw new AppNotFoundError(`${slug}/${file}`);
      }
    }

    return { metadata, path: appDir, files };
  }

  // ── List ─────────────────────────────────────────────────────────────────

  async list(filters?: { tag?: string }): Promise<AppMetadata[]> {
    const index = await this.readIndex();
    if (!filters?.tag) return index;

    const tagLower = filters.tag.toLowerCase();
    return index.filter((app) => app.tags.some((t) => t.toLowerCase() === tagLower));
  }

  // ── Search ───────────────────────────────────────────────────────────────

  async search(query: string): Promise<AppMetadata[]> {
    const index = await this.readIndex();
    const terms = query.toLowerCase().split(/\s+/).filter(Boolean);

    if (terms.length === 0) return index;

    return index.filter((app) => {
      const searchable = [app.name, app.display_name, app.description, ...app.tags].join(' ').toLowerCase();
      return terms.every((term) => searchable.includes(term));
    });
  }

  // ── Delete ───────────────────────────────────────────────────────────────

  async delete(name: string): Promise<DeleteAppResult> {
    const slug = this.slugify(name);
    const appDir = this.getAppDir(slug);

    if (!slug || !existsSync(appDir)) {
      throw new AppNotFoundError(name);
    }

    await rm(appDir, { recursive: true, force: true });
    await this.removeFromIndex(slug);

    return { name: slug, deleted: true };
  }

  // ── Index Management ─────────────────────────────────────────────────────

  private get indexPath(): string {
    return join(this.baseDir, 'index.json');
  }

  async readIndex(): Promise<AppMetadata[]> {
    try {
      const raw = await readFile(this.indexPath, 'utf-8');
      const parsed = AppIndexSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      logger.warn('App index failed validation, rebuilding');
    } catch (err) {
      logger.debug(`App index unreadable (${toErrorMessage(err)}), rebuilding`);
    }
    return this.rebuildIndex();
  }

  private async writeIndex(index: AppMetadata[]): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    await writeFile(this.indexPath, JSON.stringify(index, null, 2), 'utf-8');
  }

  private async updateIndex(metadata: AppMetadata): Promise<void> {
    const index = await this.readIndex();
    const existing = index.findIndex((app) => app.name === metadata.name);
    if (existing >= 0) {
      index[existing] = metadata;
    } else {
      index.push(metadata);
    }
    await this.writeIndex(index);
  }

  private async removeFromIndex(slug: string): Promise<void> {
    const index = await this.readIndex();
    await this.writeIndex(index.filter((app) => app.name !== slug));
  }

  private async rebuildIndex(): Promise<AppMetadata[]> {
    const index: AppMetadata[] = [];

    let entries: string[] = [];
    try {
      entries = (await readdir(this.baseDir, { withFileTypes: true }))
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name);
    } catch {
      // No base directory yet
      return index;
    }

    for (const entry of entries.sort()) {
      try {
        index.push(await this.readMetadata(entry));
      } catch {
        logger.debug(`Skipping ${entry}: no valid ${METADATA_FILE}`);
      }
    }

    await this.writeIndex(index).catch((err) => logger.warn(`Failed to persist rebuilt index: ${toErrorMessage(err)}`));
    return index;
  }

  // ── Helpers ──────────────────────────────────────────────────────────────

  private async readMetadata(slug: string): Promise<AppMetadata> {
    try {
      const raw = await readFile(join(this.getAppDir(slug), METADATA_FILE), 'utf-8');
      return AppMetadataSchema.parse(JSON.parse(raw));
    } catch {
      throw new AppNotFoundError(slug);
    }
  }

  private getAppDir(slug: string): string {
    return join(this.baseDir, slug);
  }

  slugify(name: string): string {
    return name
      .toLowerCase()
      .trim()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '');
  }
}

function isPlainFileName(file: string): boolean {
  return file !== '' && file !== '.' && file !== '..' && basename(file) === file && !file.includes('\\');
}

function assertPlainFileName(file: string): void {
  if (!isPlainFileName(file) || file === METADATA_FILE) {
    throw new ValidationError(`Invalid app file name: "${file}"`, { file });
  }
}
