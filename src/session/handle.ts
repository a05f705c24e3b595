import type { Locator } from '../schema/locator.js';
import type { SessionDescriptor } from '../schema/session.js';
import type { DriverCapability } from '../driver/protocol.js';
import { SessionClosed } from '../errors.js';

export type SessionState = 'RUNNING' | 'CLOSING' | 'CLOSED';

/**
 * Live binding between one test unit and one browser session.
 *
 * Owned by exactly one test unit. Driver requests go through `request`,
 * which keeps at most one request in flight and rejects with
 * `SessionClosed` as soon as teardown has begun.
 */
export class SessionHandle {
  private currentState: SessionState = 'RUNNING';
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly id: string,
    readonly ownerId: string,
    readonly descriptor: SessionDescriptor,
    readonly driver: DriverCapability,
    readonly jobId: string | undefined,
  ) {}

  get state(): SessionState {
    return this.currentState;
  }

  get isRemote(): boolean {
    return this.jobId !== undefined;
  }

  assertRunning(operation: string, locator?: Locator): void {
    if (this.currentState !== 'RUNNING') {
      throw new SessionClosed(this.id, operation, locator);
    }
  }

  /** Queue one driver request behind any request already in flight. */
  request<T>(
    operation: string,
    fn: (driver: DriverCapability) => Promise<T>,
    locator?: Locator,
  ): Promise<T> {
    this.assertRunning(operation, locator);
    const run = this.tail.then(() => {
      this.assertRunning(operation, locator);
      return fn(this.driver);
    });
    // The queue only tracks completion; the caller gets the rejection from `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Stop accepting requests and wait for the one in flight, if any. */
  async beginClose(): Promise<void> {
    this.currentState = 'CLOSING';
    await this.tail;
  }

  markClosed(): void {
    this.currentState = 'CLOSED';
  }
}
