import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createBillingScheduler } from '../../../src/jobs/billing-scheduler.js';
import type { DisbursementReconciler } from '../../../src/jobs/disbursement-reconciler.js';
import type { BillingCycleResult } from '../../../src/packages/core/domain/billing.js';
import { logger } from '../../../src/utils/logger.js';

vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const SKIPPED: BillingCycleResult = { skipped: true, reason: 'Transfer API not configured' };

function createReconciler(runOnce: () => Promise<BillingCycleResult>): DisbursementReconciler {
  return {
    reconcilePending: vi.fn(),
    processNewBillables: vi.fn(),
    runOnce: vi.fn(runOnce),
  };
}

describe('createBillingScheduler', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('tick', () => {
    it('should return the cycle result', async () => {
      const scheduler = createBillingScheduler({
        reconciler: createReconciler(async () => SKIPPED),
        intervalMs: 60_000,
      });

      await expect(scheduler.tick()).resolves.toEqual(SKIPPED);
    });

    it('should skip a tick while a cycle is in flight', async () => {
      let release: (result: BillingCycleResult) => void = () => {};
      const reconciler = createReconciler(
        () => new Promise<BillingCycleResult>((resolve) => { release = resolve; })
      );
      const scheduler = createBillingScheduler({ reconciler, intervalMs: 60_000 });

      const first = scheduler.tick();
      const second = await scheduler.tick();
      release(SKIPPED);

      expect(second).toBeNull();
      await expect(first).resolves.toEqual(SKIPPED);
      expect(reconciler.runOnce).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        { event: 'billing.tick.overlap' },
        'Previous billing cycle still running, skipping tick'
      );
    });

    it('should allow the next tick after a cycle throws', async () => {
      const runOnce = vi.fn<() => Promise<BillingCycleResult>>()
        .mockRejectedValueOnce(new Error('database is locked'))
        .mockResolvedValueOnce(SKIPPED);
      const scheduler = createBillingScheduler({
        reconciler: createReconciler(runOnce),
        intervalMs: 60_000,
      });

      await expect(scheduler.tick()).rejects.toThrow('database is locked');
      await expect(scheduler.tick()).resolves.toEqual(SKIPPED);
    });
  });

  describe('start / stop', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should run immediately and then on every interval', async () => {
      const reconciler = createReconciler(async () => SKIPPED);
      const scheduler = createBillingScheduler({ reconciler, intervalMs: 60_000 });

      scheduler.start();
      expect(scheduler.isRunning()).toBe(true);
      expect(reconciler.runOnce).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(120_000);
      expect(reconciler.runOnce).toHaveBeenCalledTimes(3);

      scheduler.stop();
      expect(scheduler.isRunning()).toBe(false);

      await vi.advanceTimersByTimeAsync(120_000);
      expect(reconciler.runOnce).toHaveBeenCalledTimes(3);
    });

    it('should log a failed cycle and keep the schedule', async () => {
      const runOnce = vi.fn<() => Promise<BillingCycleResult>>()
        .mockRejectedValueOnce(new Error('database is locked'))
        .mockResolvedValue(SKIPPED);
      const reconciler = createReconciler(runOnce);
      const scheduler = createBillingScheduler({ reconciler, intervalMs: 60_000 });

      scheduler.start();
      await vi.advanceTimersByTimeAsync(60_000);
      scheduler.stop();

      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ event: 'billing.cycle.error' }),
        'Billing cycle aborted'
      );
      expect(runOnce).toHaveBeenCalledTimes(2);
    });
  });
});
