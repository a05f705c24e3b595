import { randomUUID } from 'node:crypto';

import type { Outcome } from '../schema/outcome.js';
import type { SessionDescriptor } from '../schema/session.js';
import type { LocalLauncher, RemoteProvider, RemoteSession } from '../driver/protocol.js';
import { ConfigurationError, ProviderError, SessionConflict } from '../errors.js';
import * as log from '../utils/logger.js';
import { buildCapabilityEnvelope } from './descriptor.js';
import { SessionHandle } from './handle.js';

// ── Public types ─────────────────────────────────────────────

/** Invoked once per handle, from teardown, with the unit's final Outcome. */
export type OutcomeHook = (outcome: Outcome, handle: SessionHandle) => void;

export interface SessionManagerOptions {
  launchLocal: LocalLauncher;
  provider?: RemoteProvider | undefined;
  onOutcome?: OutcomeHook | undefined;
}

export type TeardownStep = 'onOutcome' | 'reportOutcome' | 'closeJob' | 'closeSession';

export interface TeardownProblem {
  step: TeardownStep;
  error: unknown;
}

export interface TeardownReport {
  sessionId: string;
  /** True when the remote provider accepted the final status. */
  reported: boolean;
  problems: TeardownProblem[];
}

export interface LiveSession {
  sessionId: string;
  ownerId: string;
}

// ── Manager ──────────────────────────────────────────────────

/**
 * Owns every browser session from start to teardown.
 *
 * LOCAL sessions come from `launchLocal`; REMOTE sessions are opened by the
 * provider with a capability envelope naming the job. Teardown reports the
 * outcome before the job and the driver are closed.
 */
export class SessionManager {
  private readonly launchLocal: LocalLauncher;
  private readonly provider: RemoteProvider | undefined;
  private readonly onOutcome: OutcomeHook | undefined;
  private readonly live = new Map<string, SessionHandle>();
  private readonly starting = new Set<string>();
  private readonly teardowns = new WeakMap<SessionHandle, Promise<TeardownReport>>();

  constructor(options: SessionManagerOptions) {
    this.launchLocal = options.launchLocal;
    this.provider = options.provider;
    this.onOutcome = options.onOutcome;
  }

  async start(descriptor: SessionDescriptor, ownerId: string): Promise<SessionHandle> {
    const existing = this.live.get(ownerId);
    if (existing) {
      throw new SessionConflict(ownerId, existing.id);
    }
    if (this.starting.has(ownerId)) {
      throw new SessionConflict(ownerId, 'pending');
    }

    this.starting.add(ownerId);
    try {
      const sessionId = randomUUID();
      const handle =
        descriptor.mode === 'LOCAL'
          ? new SessionHandle(
              sessionId,
              ownerId,
              descriptor,
              await this.launchLocal(descriptor.capabilities),
              undefined,
            )
          : await this.startRemote(sessionId, ownerId, descriptor);

      this.live.set(ownerId, handle);
      log.session(
        `${ownerId}: ${descriptor.mode} ${descriptor.capabilities.browserName} session ${sessionId}` +
          (handle.jobId !== undefined ? ` (job ${handle.jobId})` : ''),
      );
      return handle;
    } finally {
      this.starting.delete(ownerId);
    }
  }

  private async startRemote(
    sessionId: string,
    ownerId: string,
    descriptor: SessionDescriptor,
  ): Promise<SessionHandle> {
    if (!this.provider) {
      throw new ConfigurationError(
        'REMOTE execution requested but no remote provider is configured',
      );
    }

    let remote: RemoteSession;
    try {
      remote = await this.provider.openSession(buildCapabilityEnvelope(descriptor));
    } catch (err) {
      throw asProviderError('openSession', err);
    }
    return new SessionHandle(sessionId, ownerId, descriptor, remote.driver, remote.jobId);
  }

  /**
   * Tear the session down. Safe to call more than once: later calls return
   * the first call's report without touching the provider or driver again.
   */
  stop(handle: SessionHandle, outcome: Outcome): Promise<TeardownReport> {
    const existing = this.teardowns.get(handle);
    if (existing) return existing;

    const teardown = this.teardown(handle, outcome);
    this.teardowns.set(handle, teardown);
    return teardown;
  }

  private async teardown(handle: SessionHandle, outcome: Outcome): Promise<TeardownReport> {
    const report: TeardownReport = { sessionId: handle.id, reported: false, problems: [] };

    const attempt = async (step: TeardownStep, fn: () => Promise<void> | void): Promise<boolean> => {
      try {
        await fn();
        return true;
      } catch (err) {
        const error = step === 'reportOutcome' || step === 'closeJob' ? asProviderError(step, err) : err;
        report.problems.push({ step, error });
        log.teardown(handle.id, `${step} failed: ${error instanceof Error ? error.message : String(error)}`);
        return false;
      }
    };

    await handle.beginClose();

    const hook = this.onOutcome;
    if (hook) {
      await attempt('onOutcome', () => hook(outcome, handle));
    }

    const { jobId } = handle;
    const provider = this.provider;
    if (jobId !== undefined && provider) {
      report.reported = await attempt('reportOutcome', () =>
        provider.reportOutcome(jobId, outcome.status === 'PASS'),
      );
      await attempt('closeJob', () => provider.closeJob(jobId));
    }

    await attempt('closeSession', () => handle.driver.closeSession());

    handle.markClosed();
    if (this.live.get(handle.ownerId) === handle) {
      this.live.delete(handle.ownerId);
    }
    return report;
  }

  /** Every handle currently open, tagged with its owning test unit. */
  liveSessions(): LiveSession[] {
    return [...this.live.values()].map((h) => ({ sessionId: h.id, ownerId: h.ownerId }));
  }
}

function asProviderError(operation: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError(operation, message, err);
}
