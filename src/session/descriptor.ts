import type { HarnessConfig } from '../schema/config.js';
import { executionModeSchema, PROVIDER_OPTIONS_KEY } from '../schema/session.js';
import type {
  CapabilityEnvelope,
  CapabilityOptions,
  ExecutionMode,
  SessionDescriptor,
} from '../schema/session.js';
import { ConfigurationError } from '../errors.js';
import { ENV_KEYS } from '../config/defaults.js';

// ── Execution mode ───────────────────────────────────────────

/** LOCAL or REMOTE, case-insensitive. Anything else is fatal before a session exists. */
export function parseExecutionMode(raw: string | undefined): ExecutionMode {
  if (raw === undefined || raw.trim() === '') {
    throw new ConfigurationError(
      `No execution mode set: export ${ENV_KEYS.MODE}=LOCAL or ${ENV_KEYS.MODE}=REMOTE`,
    );
  }
  const result = executionModeSchema.safeParse(raw.trim().toUpperCase());
  if (!result.success) {
    throw new ConfigurationError(
      `Unrecognized execution mode "${raw}": expected LOCAL or REMOTE`,
    );
  }
  return result.data;
}

// ── Descriptor ───────────────────────────────────────────────

export interface DescriptorInput {
  displayName: string;
  args?: readonly string[];
  extensions?: Readonly<Record<string, unknown>>;
}

/**
 * Build the immutable descriptor for one test unit. Reads the execution
 * mode, so an unset or unknown mode throws here, before any driver call.
 */
export function createSessionDescriptor(
  config: HarnessConfig,
  input: DescriptorInput,
): SessionDescriptor {
  const mode = parseExecutionMode(config.mode);

  const args = [...(input.args ?? [])];
  const extensions: Record<string, unknown> = { ...input.extensions };
  Object.freeze(args);
  Object.freeze(extensions);

  const capabilities: CapabilityOptions = {
    browserName: config.browserName,
    headless: config.headless,
    args,
    extensions,
  };
  if (config.browserVersion !== undefined) {
    capabilities.browserVersion = config.browserVersion;
  }

  return Object.freeze({
    mode,
    capabilities: Object.freeze(capabilities),
    displayName: input.displayName,
    visibility: config.visibility,
  });
}

// ── Remote envelope ──────────────────────────────────────────

/** Wraps the capability options with the provider's job name and visibility. */
export function buildCapabilityEnvelope(descriptor: SessionDescriptor): CapabilityEnvelope {
  const { capabilities } = descriptor;
  const envelope: CapabilityEnvelope = {
    browserName: capabilities.browserName,
    headless: capabilities.headless,
    args: [...capabilities.args],
    [PROVIDER_OPTIONS_KEY]: {
      ...capabilities.extensions,
      name: descriptor.displayName,
      visibility: descriptor.visibility,
    },
  };
  if (capabilities.browserVersion !== undefined) {
    envelope.browserVersion = capabilities.browserVersion;
  }
  return envelope;
}
