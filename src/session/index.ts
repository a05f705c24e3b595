/**
 * Session lifecycle module.
 * Chooses local or remote execution, owns each session handle end to end,
 * and reports the final status to the remote provider.
 */

export { parseExecutionMode, createSessionDescriptor, buildCapabilityEnvelope } from './descriptor.js';
export type { DescriptorInput } from './descriptor.js';
export { SessionHandle } from './handle.js';
export type { SessionState } from './handle.js';
export { SessionManager } from './manager.js';
export type {
  LiveSession,
  OutcomeHook,
  SessionManagerOptions,
  TeardownProblem,
  TeardownReport,
  TeardownStep,
} from './manager.js';
