import { describe, expect, it } from 'vitest';

import { MAX_SEED } from '../schema/plan.js';
import { aggregateResultSchema } from '../schema/outcome.js';
import { createMockDriver } from '../driver/mock.js';
import type { MockDriver } from '../driver/mock.js';
import { AssertionFailed, RunAborted } from '../errors.js';
import { testConfig } from '../test-utils.js';
import type { HarnessConfig } from '../schema/config.js';
import { runPlan } from './coordinator.js';
import { createHarness } from './harness.js';
import { shuffle } from './ordering.js';
import type { HarnessContext, TestUnit } from './testUnit.js';

function localHarness(config: Partial<HarnessConfig> = {}): {
  harness: HarnessContext;
  drivers: MockDriver[];
} {
  const drivers: MockDriver[] = [];
  const harness = createHarness(testConfig(config), {
    launchLocal: async () => {
      const driver = createMockDriver({ id: `local-${String(drivers.length + 1)}`, latencyMs: 2 });
      drivers.push(driver);
      return driver;
    },
  });
  return { harness, drivers };
}

function visitingUnit(id: string, onRun?: () => void): TestUnit {
  return {
    id,
    async run({ actions }) {
      await actions.visit(`https://shop.test/${id}`);
      onRun?.();
      await actions.visit(`https://shop.test/${id}/done`);
    },
  };
}

const IDS = ['login', 'search', 'cart', 'checkout', 'profile'];

describe('runPlan', () => {
  it('dispatches in the same order for the same seed', async () => {
    const units = IDS.map((id) => visitingUnit(id));

    const first = await runPlan({ unitIds: IDS, concurrencyLimit: 2, seed: 42 }, units, localHarness().harness);
    const second = await runPlan({ unitIds: IDS, concurrencyLimit: 2, seed: 42 }, units, localHarness().harness);

    expect(first.seed).toBe(42);
    expect(first.dispatchOrder).toEqual(shuffle(IDS, 42));
    expect(second.dispatchOrder).toEqual(first.dispatchOrder);
  });

  it('generates and reports a seed when none is given', async () => {
    const units = IDS.map((id) => visitingUnit(id));

    const result = await runPlan({ unitIds: IDS, concurrencyLimit: 3 }, units, localHarness().harness);

    expect(Number.isInteger(result.seed)).toBe(true);
    expect(result.seed).toBeGreaterThanOrEqual(0);
    expect(result.seed).toBeLessThanOrEqual(MAX_SEED);
    expect(result.dispatchOrder).toEqual(shuffle(IDS, result.seed));
  });

  it('keeps file order when randomization is off', async () => {
    const units = IDS.map((id) => visitingUnit(id));

    const result = await runPlan(
      { unitIds: IDS, concurrencyLimit: 1, seed: 42, randomize: false },
      units,
      localHarness().harness,
    );

    expect(result.dispatchOrder).toEqual(IDS);
  });

  it('never holds more sessions than the concurrency limit', async () => {
    const { harness, drivers } = localHarness();
    let maxLive = 0;
    const sample = (): void => {
      maxLive = Math.max(maxLive, harness.sessions.liveSessions().length);
    };
    const units = IDS.map((id) => visitingUnit(id, sample));

    const result = await runPlan({ unitIds: IDS, concurrencyLimit: 2, seed: 7 }, units, harness);

    expect(maxLive).toBe(2);
    expect(result.concurrencyLimit).toBe(2);
    expect(drivers).toHaveLength(5);
    expect(drivers.every((d) => d.closeCount === 1)).toBe(true);
    expect(harness.sessions.liveSessions()).toEqual([]);
  });

  it('gives every unit its own session', async () => {
    const units = IDS.map((id) => visitingUnit(id));

    const result = await runPlan({ unitIds: IDS, concurrencyLimit: 5, seed: 1 }, units, localHarness().harness);

    const sessionIds = result.outcomes.map((o) => o.sessionId);
    expect(new Set(sessionIds).size).toBe(IDS.length);
  });

  it('isolates a failing unit from the rest of the run', async () => {
    const units: TestUnit[] = [
      ...IDS.map((id) => visitingUnit(id)),
      {
        id: 'broken-cart',
        run: async () => {
          throw new AssertionFailed('cart badge shows 0', 'expect_text');
        },
      },
    ];
    const unitIds = units.map((u) => u.id);

    const result = await runPlan({ unitIds, concurrencyLimit: 2, seed: 3 }, units, localHarness().harness);

    expect(result.verdict).toBe('FAIL');
    expect(result.counts).toEqual({ total: 6, passed: 5, failed: 1, errored: 0 });
    expect(result.outcomes.find((o) => o.unitId === 'broken-cart')?.status).toBe('FAIL');
  });

  it('passes the run when every unit passes', async () => {
    const units = IDS.map((id) => visitingUnit(id));
    const dispatched: string[] = [];
    const finished: string[] = [];

    const result = await runPlan({ unitIds: IDS, concurrencyLimit: 2, seed: 11 }, units, localHarness().harness, {
      onDispatch: (unitId) => dispatched.push(unitId),
      onOutcome: (outcome) => finished.push(outcome.unitId),
    });

    expect(aggregateResultSchema.safeParse(result).success).toBe(true);
    expect(result.verdict).toBe('PASS');
    expect(result.counts).toEqual({ total: 5, passed: 5, failed: 0, errored: 0 });
    expect(dispatched).toEqual(result.dispatchOrder);
    expect([...finished].sort()).toEqual([...IDS].sort());
  });

  it('runs only the units the plan names', async () => {
    const units = IDS.map((id) => visitingUnit(id));

    const result = await runPlan({ unitIds: ['cart'], concurrencyLimit: 4, seed: 5 }, units, localHarness().harness);

    expect(result.dispatchOrder).toEqual(['cart']);
    expect(result.outcomes).toHaveLength(1);
  });

  describe('aborts before dispatch', () => {
    it('on an unknown unit id', async () => {
      const { harness, drivers } = localHarness();

      await expect(
        runPlan({ unitIds: ['login', 'ghost'], concurrencyLimit: 2 }, [visitingUnit('login')], harness),
      ).rejects.toThrow('Run aborted: unknown test unit(s): ghost');
      expect(drivers).toHaveLength(0);
    });

    it('on a non-positive concurrency limit', async () => {
      await expect(
        runPlan({ unitIds: ['login'], concurrencyLimit: 0 }, [visitingUnit('login')], localHarness().harness),
      ).rejects.toBeInstanceOf(RunAborted);
    });

    it('on duplicate unit ids', async () => {
      await expect(
        runPlan(
          { unitIds: ['login', 'login'], concurrencyLimit: 1 },
          [visitingUnit('login')],
          localHarness().harness,
        ),
      ).rejects.toThrow('unit ids must be unique');
    });

    it('on an unset execution mode', async () => {
      const { harness, drivers } = localHarness({ mode: undefined });

      await expect(
        runPlan({ unitIds: ['login'], concurrencyLimit: 1 }, [visitingUnit('login')], harness),
      ).rejects.toThrow(RunAborted);
      expect(drivers).toHaveLength(0);
    });
  });
});
