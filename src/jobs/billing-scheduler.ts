/**
 * Billing Scheduler
 *
 * Calls the disbursement reconciler on a fixed interval. Holds no billing
 * logic. A tick that fires while the previous cycle is still running is
 * skipped, so two cycles never write to the ledger at once.
 *
 * @module jobs/billing-scheduler
 */

import { logger } from '../utils/logger.js';
import type { DisbursementReconciler } from './disbursement-reconciler.js';
import type { BillingCycleResult } from '../packages/core/domain/billing.js';

export interface BillingSchedulerConfig {
  reconciler: DisbursementReconciler;
  intervalMs: number;
}

export interface BillingScheduler {
  start(): void;
  stop(): void;
  /** Run one cycle now; resolves to null if a cycle is already in flight */
  tick(): Promise<BillingCycleResult | null>;
  isRunning(): boolean;
}

export function createBillingScheduler(config: BillingSchedulerConfig): BillingScheduler {
  const { reconciler, intervalMs } = config;

  let timer: NodeJS.Timeout | null = null;
  let inFlight = false;

  async function tick(): Promise<BillingCycleResult | null> {
    if (inFlight) {
      logger.warn({ event: 'billing.tick.overlap' }, 'Previous billing cycle still running, skipping tick');
      return null;
    }

    inFlight = true;
    const startedAt = Date.now();
    try {
      const result = await reconciler.runOnce();
      logger.info({
        event: 'billing.cycle.complete',
        durationMs: Date.now() - startedAt,
        skipped: result.skipped,
      }, 'Billing cycle finished');
      return result;
    } finally {
      inFlight = false;
    }
  }

  function runTick(): void {
    tick().catch((err: unknown) => {
      logger.error({ err, event: 'billing.cycle.error' }, 'Billing cycle aborted');
    });
  }

  function start(): void {
    if (timer) return;

    runTick();
    timer = setInterval(runTick, intervalMs);

    logger.info({
      event: 'billing.scheduler.started',
      intervalMs,
    }, `Billing scheduler started - running every ${Math.round(intervalMs / 60000)} minutes`);
  }

  function stop(): void {
    if (!timer) return;

    clearInterval(timer);
    timer = null;
    logger.info({ event: 'billing.scheduler.stopped' }, 'Billing scheduler stopped');
  }

  return {
    start,
    stop,
    tick,
    isRunning: () => timer !== null,
  };
}
