import { z } from 'zod';

// ── Execution mode ────────────────────────────────────────────

export const executionModeSchema = z.enum(['LOCAL', 'REMOTE']);

export type ExecutionMode = z.infer<typeof executionModeSchema>;

// ── Remote job visibility ─────────────────────────────────────

export const jobVisibilitySchema = z.enum(['public', 'private', 'team', 'share']);

export type JobVisibility = z.infer<typeof jobVisibilitySchema>;

// ── Capability options ────────────────────────────────────────

export const browserNameSchema = z.enum(['chromium', 'chrome', 'firefox', 'webkit']);

export type BrowserName = z.infer<typeof browserNameSchema>;

export const capabilityOptionsSchema = z.object({
  browserName: browserNameSchema,
  browserVersion: z.string().min(1).optional(),
  headless: z.boolean(),
  args: z.array(z.string()),
  /** Provider-specific extensions, passed through to the remote envelope untouched. */
  extensions: z.record(z.unknown()),
});

export type CapabilityOptions = z.infer<typeof capabilityOptionsSchema>;

// ── SessionDescriptor ─────────────────────────────────────────

export const sessionDescriptorSchema = z.object({
  mode: executionModeSchema,
  capabilities: capabilityOptionsSchema,
  displayName: z.string().min(1),
  visibility: jobVisibilitySchema,
});

export type SessionDescriptor = Readonly<z.infer<typeof sessionDescriptorSchema>>;

// ── Remote capability envelope ────────────────────────────────

export const PROVIDER_OPTIONS_KEY = 'acceptkit:options';

export interface ProviderOptions {
  name: string;
  visibility: JobVisibility;
  [extension: string]: unknown;
}

export interface CapabilityEnvelope {
  browserName: BrowserName;
  browserVersion?: string;
  headless: boolean;
  args: readonly string[];
  [PROVIDER_OPTIONS_KEY]: ProviderOptions;
}
