import { z } from 'zod';

import { seedSchema } from './plan.js';
import { browserNameSchema, jobVisibilitySchema } from './session.js';

// ── Harness configuration ─────────────────────────────────────
// The execution mode stays a raw string here; it is only checked when a
// session is about to start, so an unset mode fails the unit, not the import.

export const remoteConfigSchema = z.object({
  wsEndpoint: z.string().url(),
  apiUrl: z.string().url(),
  accessKey: z.string().min(1).optional(),
});

export type RemoteConfig = z.infer<typeof remoteConfigSchema>;

export const harnessConfigSchema = z.object({
  mode: z.string().optional(),
  browserName: browserNameSchema,
  browserVersion: z.string().min(1).optional(),
  headless: z.boolean(),
  waitTimeoutMs: z.number().int().nonnegative(),
  pollIntervalMs: z.number().int().positive(),
  concurrency: z.number().int().positive(),
  seed: seedSchema.optional(),
  visibility: jobVisibilitySchema,
  remote: remoteConfigSchema.optional(),
});

export type HarnessConfig = z.infer<typeof harnessConfigSchema>;
