/**
 * App generation and library tool schemas and handlers.
 *
 * generate_spec, build_app, save_app, get_app, list_apps, search_apps, delete_app
 */

import { z } from 'zod';
import type { AppLibrary } from '../library/app-library.js';
import type { SpecGenerator } from '../generation/spec-generator.js';
import type { AppBuilder } from '../pipeline/app-builder.js';

// ── generate_spec ───────────────────────────────────────────────────────────

export const generateSpecSchema = z.object({
  prompt: z.string().min(1).describe('Free-text description of the app'),
});

export type GenerateSpecInput = z.infer<typeof generateSpecSchema>;

export function handleGenerateSpec(specs: SpecGenerator) {
  return async (input: GenerateSpecInput) => {
    return specs.analyze(input.prompt);
  };
}

// ── build_app ───────────────────────────────────────────────────────────────

export const buildAppSchema = z.object({
  prompt: z.string().min(1).describe('Free-text description of the app'),
  name: z.string().min(1).nullish().describe('App name (default: from the specification)'),
  description: z.string().nullish().describe('Library description (default: agent purposes)'),
  with_workflow: z.boolean().default(false).describe('Also generate workflow.py'),
  start_ui: z.boolean().default(false).describe('Start the Streamlit UI as a service'),
  timeout_ms: z.number().int().positive().nullish().describe('Timeout for the agent test run'),
});

export type BuildAppInput = z.infer<typeof buildAppSchema>;

export function handleBuildApp(builder: AppBuilder) {
  return async (input: BuildAppInput) => {
    return builder.build({
      prompt: input.prompt,
      name: input.name ?? undefined,
      description: input.description ?? undefined,
      withWorkflow: input.with_workflow,
      startUi: input.start_ui,
      timeoutMs: input.timeout_ms ?? undefined,
    });
  };
}

// ── save_app ────────────────────────────────────────────────────────────────

export const saveAppSchema = z.object({
  name: z.string().min(1).describe('App name (will be slugified for storage)'),
  description: z.string().describe('What this app does'),
  files: z
    .record(z.string(), z.string())
    .describe('File name → content, e.g. { "agent.py": "...", "app.py": "..." }'),
  tags: z.array(z.string()).nullish().describe('Tags for categorization'),
  dependencies: z.array(z.string()).nullish().describe('Packages the app needs'),
});

export type SaveAppInput = z.infer<typeof saveAppSchema>;

export function handleSaveApp(library: AppLibrary) {
  return async (input: SaveAppInput) => {
    return library.save({
      name: input.name,
      description: input.description,
      files: input.files,
      tags: input.tags ?? undefined,
      dependencies: input.dependencies ?? undefined,
    });
  };
}

// ── get_app ─────────────────────────────────────────────────────────────────

export const getAppSchema = z.object({
  name: z.string().min(1).describe('App name to retrieve'),
});

export type GetAppInput = z.infer<typeof getAppSchema>;

export function handleGetApp(library: AppLibrary) {
  return async (input: GetAppInput) => {
    return library.get(input.name);
  };
}

// ── list_apps ───────────────────────────────────────────────────────────────

export const listAppsSchema = z.object({
  tag: z.string().nullish().describe('Only apps carrying this tag'),
});

export type ListAppsInput = z.infer<typeof listAppsSchema>;

export function handleListApps(library: AppLibrary) {
  return async (input: ListAppsInput) => {
    const apps = await library.list({ tag: input.tag ?? undefined });
    return { apps };
  };
}

// ── search_apps ─────────────────────────────────────────────────────────────

export const searchAppsSchema = z.object({
  query: z.string().describe('Space-separated terms; all must match name or description'),
});

export type SearchAppsInput = z.infer<typeof searchAppsSchema>;

export function handleSearchApps(library: AppLibrary) {
  return async (input: SearchAppsInput) => {
    const apps = await library.search(input.query);
    return { apps };
  };
}

// ── delete_app ──────────────────────────────────────────────────────────────

export const deleteAppSchema = z.object({
  name: z.string().min(1).describe('App name to delete'),
});

export type DeleteAppInput = z.infer<typeof deleteAppSchema>;

export function handleDeleteApp(library: AppLibrary) {
  return async (input: DeleteAppInput) => {
    return library.delete(input.name);
  };
}
