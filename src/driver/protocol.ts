/**
 * Driver capability protocol.
 *
 * The minimal surface the action facade needs from a browser driver. The
 * facade never talks to Playwright (or any other automation library)
 * directly; it only sees these five operations.
 */

import type { Locator } from '../schema/locator.js';
import type { CapabilityEnvelope, CapabilityOptions } from '../schema/session.js';

/**
 * Transient reference to a located element. Valid for one driver
 * round-trip only; callers re-resolve the Locator instead of keeping it.
 */
export interface ElementHandle {
  readonly description: string;
}

export type ElementActionKind = 'click' | 'type' | 'clear';

export interface ElementActionArgs {
  text?: string;
}

export type ElementProperty = 'displayed' | 'enabled' | 'selected' | 'text' | 'value';

export type ElementStateValue = boolean | string;

export interface DriverCapability {
  navigate(url: string): Promise<void>;
  /** Returns every current match in document order; an empty array means absent. */
  locate(locator: Locator): Promise<ElementHandle[]>;
  elementAction(
    handle: ElementHandle,
    kind: ElementActionKind,
    args?: ElementActionArgs,
  ): Promise<void>;
  elementState(handle: ElementHandle, property: ElementProperty): Promise<ElementStateValue>;
  closeSession(): Promise<void>;
}

// ── Driver-reported element failures ─────────────────────────

export type DriverFailureReason = 'not-interactable' | 'stale';

/**
 * Thrown by drivers for element-level problems the facade can classify.
 * Anything else a driver throws is opaque and propagates unchanged.
 */
export class DriverFailure extends Error {
  readonly reason: DriverFailureReason;

  constructor(reason: DriverFailureReason, message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'DriverFailure';
    this.reason = reason;
  }
}

// ── Remote provider ──────────────────────────────────────────

export interface RemoteSession {
  driver: DriverCapability;
  jobId: string;
}

export interface RemoteProvider {
  openSession(envelope: CapabilityEnvelope): Promise<RemoteSession>;
  reportOutcome(jobId: string, passed: boolean): Promise<void>;
  closeJob(jobId: string): Promise<void>;
}

export type LocalLauncher = (capabilities: CapabilityOptions) => Promise<DriverCapability>;
