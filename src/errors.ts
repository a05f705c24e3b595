import type { FailureDetail, FailureKind } from './schema/outcome.js';
import type { Locator } from './schema/locator.js';
import { describeLocator } from './schema/locator.js';

// ── Base error ────────────────────────────────────────────────

export interface ErrorContext {
  operation?: string;
  locator?: Locator;
  cause?: unknown;
}

/**
 * Root of the harness error taxonomy. `kind` is the discriminant callers
 * switch on; `operation` and `locator` say what was being attempted.
 */
export abstract class AcceptkitError extends Error {
  abstract readonly kind: FailureKind;
  readonly operation: string | undefined;
  readonly locator: Locator | undefined;

  protected constructor(message: string, context: ErrorContext = {}) {
    super(
      formatMessage(message, context),
      context.cause !== undefined ? { cause: context.cause } : undefined,
    );
    this.operation = context.operation;
    this.locator = context.locator;
  }
}

function formatMessage(message: string, context: ErrorContext): string {
  const parts: string[] = [];
  if (context.operation !== undefined) parts.push(context.operation);
  if (context.locator !== undefined) parts.push(describeLocator(context.locator));
  return parts.length > 0 ? `${message} (${parts.join(' ')})` : message;
}

// ── Element errors ────────────────────────────────────────────

export class ElementNotFound extends AcceptkitError {
  override readonly kind = 'ElementNotFound' as const;
  readonly waitedMs: number;

  constructor(locator: Locator, operation: string, waitedMs: number) {
    super(`No element matched after waiting ${String(waitedMs)}ms`, {
      operation,
      locator,
    });
    this.name = 'ElementNotFound';
    this.waitedMs = waitedMs;
  }
}

export class ElementNotInteractable extends AcceptkitError {
  override readonly kind = 'ElementNotInteractable' as const;

  constructor(locator: Locator, operation: string, cause?: unknown) {
    super('Element is present but cannot receive the action', {
      operation,
      locator,
      cause,
    });
    this.name = 'ElementNotInteractable';
  }
}

// ── Session errors ────────────────────────────────────────────

export class NavigationError extends AcceptkitError {
  override readonly kind = 'NavigationError' as const;
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(`Could not load ${url}`, { operation: 'visit', cause });
    this.name = 'NavigationError';
    this.url = url;
  }
}

export class SessionClosed extends AcceptkitError {
  override readonly kind = 'SessionClosed' as const;
  readonly sessionId: string;

  constructor(sessionId: string, operation: string, locator?: Locator) {
    super(
      `Session ${sessionId} is closed`,
      locator !== undefined ? { operation, locator } : { operation },
    );
    this.name = 'SessionClosed';
    this.sessionId = sessionId;
  }
}

export class SessionConflict extends AcceptkitError {
  override readonly kind = 'SessionConflict' as const;

  constructor(ownerId: string, sessionId: string) {
    super(`Test unit ${ownerId} already owns live session ${sessionId}`, {
      operation: 'start',
    });
    this.name = 'SessionConflict';
  }
}

export class ProviderError extends AcceptkitError {
  override readonly kind = 'ProviderError' as const;

  constructor(operation: string, message: string, cause?: unknown) {
    super(`Remote provider failed: ${message}`, { operation, cause });
    this.name = 'ProviderError';
  }
}

// ── Run-level errors ──────────────────────────────────────────

export class ConfigurationError extends AcceptkitError {
  override readonly kind = 'ConfigurationError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class RunAborted extends AcceptkitError {
  override readonly kind = 'RunAborted' as const;

  constructor(message: string, cause?: unknown) {
    super(`Run aborted: ${message}`, { cause });
    this.name = 'RunAborted';
  }
}

export class AssertionFailed extends AcceptkitError {
  override readonly kind = 'AssertionFailed' as const;

  constructor(message: string, operation: string, locator?: Locator) {
    super(message, locator !== undefined ? { operation, locator } : { operation });
    this.name = 'AssertionFailed';
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function isAcceptkitError(err: unknown): err is AcceptkitError {
  return err instanceof AcceptkitError;
}

/** Assertion errors from node:assert, chai or vitest's expect all carry this name. */
export function isAssertionError(err: unknown): boolean {
  if (err instanceof AssertionFailed) return true;
  return err instanceof Error && err.name === 'AssertionError';
}

export function toFailureDetail(err: unknown): FailureDetail {
  if (isAcceptkitError(err)) {
    const detail: FailureDetail = { kind: err.kind, message: err.message };
    if (err.operation !== undefined) detail.operation = err.operation;
    if (err.locator !== undefined) detail.locator = describeLocator(err.locator);
    return detail;
  }
  if (isAssertionError(err) && err instanceof Error) {
    return { kind: 'AssertionFailed', message: err.message };
  }
  return {
    kind: 'UnexpectedError',
    message: err instanceof Error ? err.message : String(err),
  };
}
