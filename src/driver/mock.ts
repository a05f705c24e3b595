import type { Locator } from '../schema/locator.js';
import { describeLocator, locatorsEqual } from '../schema/locator.js';
import type { CapabilityEnvelope } from '../schema/session.js';
import { DriverFailure } from './protocol.js';
import type {
  DriverCapability,
  ElementActionArgs,
  ElementActionKind,
  ElementHandle,
  ElementProperty,
  ElementStateValue,
  RemoteProvider,
  RemoteSession,
} from './protocol.js';

// ── Mock element model ───────────────────────────────────────

export interface MockElement {
  displayed: boolean;
  enabled: boolean;
  selected: boolean;
  text: string;
  value: string;
  /** Set to make the next action report a detached element. */
  detached: boolean;
  clicks: number;
  onClick?: () => void;
}

export function mockElement(init: Partial<MockElement> = {}): MockElement {
  return {
    displayed: true,
    enabled: true,
    selected: false,
    text: '',
    value: '',
    detached: false,
    clicks: 0,
    ...init,
  };
}

class MockElementHandle implements ElementHandle {
  constructor(
    readonly description: string,
    readonly element: MockElement,
  ) {}
}

type DriverOperation = 'navigate' | 'locate' | 'elementAction' | 'elementState' | 'closeSession';

export interface MockDriver extends DriverCapability {
  readonly id: string;
  /** Operation names in call order. */
  readonly calls: readonly DriverOperation[];
  readonly visited: readonly string[];
  readonly closeCount: number;
  /** Requests in flight right now; one per session is the facade's contract. */
  readonly maxInFlight: number;
  setElements(locator: Locator, elements: MockElement[]): void;
  removeElements(locator: Locator): void;
  /** The next call to `operation` throws `error` instead of running. */
  failNext(operation: DriverOperation, error: unknown): void;
}

export interface MockDriverOptions {
  id?: string;
  /** Shared, ordered record of side effects across drivers and providers. */
  journal?: string[];
  /** Delay every response by this many milliseconds. */
  latencyMs?: number;
}

// ── Mock driver ───────────────────────────────────────────────

/**
 * In-memory driver for tests. Holds a flat list of locator → elements
 * bindings and answers every capability call from it.
 */
export function createMockDriver(options: MockDriverOptions = {}): MockDriver {
  const id = options.id ?? 'mock-driver';
  const journal = options.journal;
  const latencyMs = options.latencyMs ?? 0;
  const bindings: Array<{ locator: Locator; elements: MockElement[] }> = [];
  const calls: DriverOperation[] = [];
  const visited: string[] = [];
  const pendingFailures = new Map<DriverOperation, unknown>();
  let closeCount = 0;
  let inFlight = 0;
  let maxInFlight = 0;

  async function enter(operation: DriverOperation): Promise<void> {
    calls.push(operation);
    inFlight++;
    maxInFlight = Math.max(maxInFlight, inFlight);
    try {
      if (latencyMs > 0) {
        await new Promise((r) => setTimeout(r, latencyMs));
      }
    } finally {
      inFlight--;
    }
    if (pendingFailures.has(operation)) {
      const error = pendingFailures.get(operation);
      pendingFailures.delete(operation);
      throw error;
    }
    if (closeCount > 0 && operation !== 'closeSession') {
      throw new Error(`Driver ${id} has been closed`);
    }
  }

  function asMockHandle(handle: ElementHandle): MockElementHandle {
    if (!(handle instanceof MockElementHandle)) {
      throw new Error(`Foreign element handle: ${handle.description}`);
    }
    return handle;
  }

  return {
    id,
    get calls() {
      return calls;
    },
    get visited() {
      return visited;
    },
    get closeCount() {
      return closeCount;
    },
    get maxInFlight() {
      return maxInFlight;
    },

    setElements(locator: Locator, elements: MockElement[]): void {
      const existing = bindings.find((b) => locatorsEqual(b.locator, locator));
      if (existing) {
        existing.elements = elements;
      } else {
        bindings.push({ locator, elements });
      }
    },

    removeElements(locator: Locator): void {
      const index = bindings.findIndex((b) => locatorsEqual(b.locator, locator));
      if (index !== -1) bindings.splice(index, 1);
    },

    failNext(operation: DriverOperation, error: unknown): void {
      pendingFailures.set(operation, error);
    },

    async navigate(url: string): Promise<void> {
      await enter('navigate');
      visited.push(url);
    },

    async locate(locator: Locator): Promise<ElementHandle[]> {
      await enter('locate');
      const binding = bindings.find((b) => locatorsEqual(b.locator, locator));
      if (!binding) return [];
      return binding.elements.map(
        (element, i) => new MockElementHandle(`${describeLocator(locator)}[${String(i)}]`, element),
      );
    },

    async elementAction(
      handle: ElementHandle,
      kind: ElementActionKind,
      args?: ElementActionArgs,
    ): Promise<void> {
      await enter('elementAction');
      const { element, description } = asMockHandle(handle);
      if (element.detached) {
        element.detached = false;
        throw new DriverFailure('stale', `${description} is detached`);
      }
      if (!element.displayed || !element.enabled) {
        throw new DriverFailure('not-interactable', `${description} cannot receive ${kind}`);
      }
      switch (kind) {
        case 'click':
          element.clicks++;
          element.onClick?.();
          break;
        case 'type':
          element.value += args?.text ?? '';
          break;
        case 'clear':
          element.value = '';
          break;
      }
    },

    async elementState(
      handle: ElementHandle,
      property: ElementProperty,
    ): Promise<ElementStateValue> {
      await enter('elementState');
      const { element } = asMockHandle(handle);
      return element[property];
    },

    async closeSession(): Promise<void> {
      await enter('closeSession');
      closeCount++;
      journal?.push(`driver.close:${id}`);
    },
  };
}

// ── Mock provider ─────────────────────────────────────────────

type ProviderOperation = 'openSession' | 'reportOutcome' | 'closeJob';

export interface MockProvider extends RemoteProvider {
  readonly journal: readonly string[];
  readonly envelopes: readonly CapabilityEnvelope[];
  readonly drivers: readonly MockDriver[];
  failNext(operation: ProviderOperation, error: unknown): void;
}

export interface MockProviderOptions {
  journal?: string[];
  /** Customize each remote driver, e.g. to seed elements. */
  setupDriver?: (driver: MockDriver) => void;
}

export function createMockProvider(options: MockProviderOptions = {}): MockProvider {
  const journal = options.journal ?? [];
  const envelopes: CapabilityEnvelope[] = [];
  const drivers: MockDriver[] = [];
  const pendingFailures = new Map<ProviderOperation, unknown>();
  let jobCounter = 0;

  function check(operation: ProviderOperation): void {
    if (pendingFailures.has(operation)) {
      const error = pendingFailures.get(operation);
      pendingFailures.delete(operation);
      throw error;
    }
  }

  return {
    journal,
    envelopes,
    drivers,

    failNext(operation: ProviderOperation, error: unknown): void {
      pendingFailures.set(operation, error);
    },

    async openSession(envelope: CapabilityEnvelope): Promise<RemoteSession> {
      check('openSession');
      jobCounter++;
      const jobId = `job-${String(jobCounter)}`;
      const driver = createMockDriver({ id: `remote-${jobId}`, journal });
      options.setupDriver?.(driver);
      envelopes.push(envelope);
      drivers.push(driver);
      journal.push(`provider.open:${jobId}`);
      return { driver, jobId };
    },

    async reportOutcome(jobId: string, passed: boolean): Promise<void> {
      check('reportOutcome');
      journal.push(`provider.report:${jobId}:${String(passed)}`);
    },

    async closeJob(jobId: string): Promise<void> {
      check('closeJob');
      journal.push(`provider.close:${jobId}`);
    },
  };
}
