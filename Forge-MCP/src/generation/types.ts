/**
 * Structured application specification produced from free-text requirements.
 */

import { z } from 'zod';

export const AgentDescriptorSchema = z.object({
  name: z.string().min(1),
  purpose: z.string().default(''),
  tools: z.array(z.string()).default([]),
});

export const AppSpecificationSchema = z.object({
  name: z.string().optional(),
  agents: z.array(AgentDescriptorSchema).default([]),
  workflow: z
    .object({
      steps: z.array(z.string()).default([]),
      dependencies: z.array(z.string()).default([]),
    })
    .default({}),
  ui: z
    .object({
      components: z.array(z.string()).default([]),
      layouts: z.array(z.string()).default([]),
    })
    .default({}),
  integrations: z.array(z.string()).default([]),
  /** Set when the specification is a fallback */
  error: z.string().optional(),
  /** Start of the unparseable response, for debugging */
  raw_response: z.string().optional(),
});

export type AgentDescriptor = z.infer<typeof AgentDescriptorSchema>;
export type AppSpecification = z.infer<typeof AppSpecificationSchema>;
