/**
 * App Library types.
 */

import { z } from 'zod';

export const AppMetadataSchema = z.object({
  name: z.string(),
  display_name: z.string(),
  description: z.string(),
  files: z.array(z.string()),
  tags: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  created_at: z.string(),
  updated_at: z.string(),
});

export type AppMetadata = z.infer<typeof AppMetadataSchema>;

export const AppIndexSchema = z.array(AppMetadataSchema);

export interface SaveAppOptions {
  name: string;
  description: string;
  /** File name → content; names are plain base names */
  files: Record<string, string>;
  tags?: string[];
  dependencies?: string[];
}

export interface SaveAppResult {
  name: string;
  path: string;
  files: string[];
  created: boolean;
}

export interface GetAppResult {
  metadata: AppMetadata;
  path: string;
  files: Record<string, string>;
}

export interface DeleteAppResult {
  name: string;
  deleted: boolean;
}
