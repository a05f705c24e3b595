import type { HarnessConfig } from '../schema/config.js';
import type { Outcome, OutcomeStatus } from '../schema/outcome.js';
import type { Actions, WaitOptions } from '../actions/facade.js';
import { createActions } from '../actions/facade.js';
import type { SessionHandle } from '../session/handle.js';
import type { SessionManager } from '../session/manager.js';
import { createSessionDescriptor } from '../session/descriptor.js';
import { isAcceptkitError, isAssertionError, toFailureDetail } from '../errors.js';

// ── Public types ─────────────────────────────────────────────

export interface TestContext {
  readonly unitId: string;
  readonly actions: Actions;
  readonly session: SessionHandle;
}

/** One independently runnable acceptance test. Owns one session while it runs. */
export interface TestUnit {
  readonly id: string;
  /** Used as the remote job name; defaults to the id. */
  readonly displayName?: string;
  run(context: TestContext): Promise<void>;
}

export interface HarnessContext {
  readonly config: HarnessConfig;
  readonly sessions: SessionManager;
}

// ── Outcome classification ───────────────────────────────────
// The application under test misbehaving is a FAIL; the harness, the
// provider or the configuration misbehaving is an ERROR.

export function classifyFailure(err: unknown): Exclude<OutcomeStatus, 'PASS'> {
  if (isAssertionError(err)) return 'FAIL';
  if (isAcceptkitError(err)) {
    return err.kind === 'ElementNotFound' || err.kind === 'ElementNotInteractable'
      ? 'FAIL'
      : 'ERROR';
  }
  return 'ERROR';
}

function buildOutcome(
  unitId: string,
  startedAt: number,
  status: OutcomeStatus,
  err?: unknown,
  sessionId?: string,
): Outcome {
  const outcome: Outcome = {
    unitId,
    status,
    durationMs: Math.max(0, Date.now() - startedAt),
  };
  if (status !== 'PASS') outcome.failure = toFailureDetail(err);
  if (sessionId !== undefined) outcome.sessionId = sessionId;
  return outcome;
}

// ── Runner ───────────────────────────────────────────────────

/**
 * Run one test unit in its own session. Never throws: every failure,
 * including one while starting the session, becomes the Outcome. The
 * session is torn down on every path once it exists.
 */
export async function runTestUnit(unit: TestUnit, harness: HarnessContext): Promise<Outcome> {
  const startedAt = Date.now();

  let session: SessionHandle;
  try {
    const descriptor = createSessionDescriptor(harness.config, {
      displayName: unit.displayName ?? unit.id,
    });
    session = await harness.sessions.start(descriptor, unit.id);
  } catch (err) {
    return buildOutcome(unit.id, startedAt, 'ERROR', err);
  }

  const wait: WaitOptions = {
    timeoutMs: harness.config.waitTimeoutMs,
    pollIntervalMs: harness.config.pollIntervalMs,
  };

  let outcome: Outcome;
  try {
    await unit.run({ unitId: unit.id, actions: createActions(session, wait), session });
    outcome = buildOutcome(unit.id, startedAt, 'PASS', undefined, session.id);
  } catch (err) {
    outcome = buildOutcome(unit.id, startedAt, classifyFailure(err), err, session.id);
  }

  await harness.sessions.stop(session, outcome);
  return outcome;
}
