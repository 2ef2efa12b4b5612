/**
 * Disbursement Reconciler
 *
 * Bills fulfillment costs to the organizations that incurred them.
 *
 * Two passes, always in this order:
 * 1. reconcilePending(): resend disbursements left pending by a crash or a
 *    transient transfer API failure
 * 2. processNewBillables(): group unbilled items per organization, commit a
 *    pending disbursement with its items flagged, then call the transfer API
 *
 * The pending row and the billed flags are committed before the transfer
 * call. A crash after that commit leaves a pending row for pass 1; the
 * resend reuses the stored memo, which carries the idempotency key.
 *
 * Permanent transfer failures mark the disbursement failed and leave its
 * items billed; a human settles the transfer by hand.
 *
 * @module jobs/disbursement-reconciler
 */

import { logger } from '../utils/logger.js';
import {
  generateIdempotencyKey,
} from '../packages/adapters/billing/DisbursementStateMachine.js';
import { classifyGatewayError } from '../packages/adapters/billing/gateway-errors.js';
import type { ILedgerStore } from '../packages/core/ports/ILedgerStore.js';
import type {
  ITransferGateway,
  TransferOutcome,
} from '../packages/core/ports/ITransferGateway.js';
import type { IBillingNotifier } from '../packages/core/ports/IBillingNotifier.js';
import type {
  BillingCycleResult,
  Disbursement,
  NewBillablesResult,
  Organization,
  PendingReconciliationResult,
  UnbilledItemSnapshot,
} from '../packages/core/domain/billing.js';

// =============================================================================
// Types
// =============================================================================

export interface DisbursementReconcilerDeps {
  store: ILedgerStore;
  /** Absent when transfer API credentials are not configured */
  gateway?: ITransferGateway;
  notifier: IBillingNotifier;
  /** Account every disbursement is paid into */
  fulfillmentAccountSlug: string;
  memoPrefix?: string;
}

export interface OrganizationGroup {
  organizationId: string;
  itemIds: string[];
  totalCents: number;
}

export interface DisbursementReconciler {
  reconcilePending(): Promise<PendingReconciliationResult>;
  processNewBillables(): Promise<NewBillablesResult>;
  runOnce(): Promise<BillingCycleResult>;
}

// =============================================================================
// Constants
// =============================================================================

const DEFAULT_MEMO_PREFIX = 'Fulfillment';

const MISSING_SLUG_ERROR = 'Organization has no transfer account slug configured';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Group snapshotted items by organization, in organization id order.
 */
export function groupByOrganization(items: UnbilledItemSnapshot[]): OrganizationGroup[] {
  const groups = new Map<string, OrganizationGroup>();

  for (const item of items) {
    let group = groups.get(item.organizationId);
    if (!group) {
      group = { organizationId: item.organizationId, itemIds: [], totalCents: 0 };
      groups.set(item.organizationId, group);
    }
    group.itemIds.push(item.id);
    group.totalCents += item.costCents;
  }

  return [...groups.values()].sort((a, b) =>
    a.organizationId < b.organizationId ? -1 : a.organizationId > b.organizationId ? 1 : 0
  );
}

/**
 * Transfer memo. The idempotency key is embedded so a resend can be matched
 * to the first attempt on the provider side.
 */
export function buildMemo(prefix: string, itemCount: number, idempotencyKey: string): string {
  return `${prefix} // ${itemCount} ${itemCount === 1 ? 'Item' : 'Items'} // ref:${idempotencyKey}`;
}

function hasAccountSlug(org: Organization): org is Organization & { accountSlug: string } {
  return org.accountSlug !== null && org.accountSlug.trim().length > 0;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatDollars(amountCents: number): string {
  return `$${(amountCents / 100).toFixed(2)}`;
}

// =============================================================================
// Reconciler
// =============================================================================

export function createDisbursementReconciler(deps: DisbursementReconcilerDeps): DisbursementReconciler {
  const { store, gateway, notifier, fulfillmentAccountSlug } = deps;
  const memoPrefix = deps.memoPrefix ?? DEFAULT_MEMO_PREFIX;

  function requireGateway(): ITransferGateway {
    if (!gateway) {
      throw new Error('Transfer gateway not configured');
    }
    return gateway;
  }

  /**
   * Notifications are best effort; the disbursement is already committed.
   */
  async function safeNotify(kind: 'success' | 'failure', send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (err) {
      logger.error({ err, kind }, 'Billing notification failed');
    }
  }

  async function attemptTransfer(
    transferGateway: ITransferGateway,
    disbursement: Disbursement,
    sourceAccount: string,
  ): Promise<TransferOutcome> {
    store.recordAttempt(disbursement.id);

    try {
      return await transferGateway.createTransfer({
        sourceAccount,
        destinationAccount: fulfillmentAccountSlug,
        amountCents: disbursement.amountCents,
        memo: disbursement.memo,
      });
    } catch (err) {
      return classifyGatewayError(err);
    }
  }

  /**
   * Persist completion, then notify. Returns false if the row could not be
   * moved to completed; it then stays pending and is resent next run.
   */
  async function settleSuccess(
    disbursement: Disbursement,
    organizationName: string,
    transferId: string | null,
  ): Promise<boolean> {
    const result = store.markCompleted(disbursement.id, transferId);
    if (!result.success) {
      logger.error({
        event: 'disbursement.complete_failed',
        disbursementId: disbursement.id,
        transferId,
        reason: result.reason,
      }, 'Transfer succeeded but disbursement could not be marked completed');
      return false;
    }

    await safeNotify('success', () => notifier.notifySuccess({
      organization: organizationName,
      itemCount: disbursement.itemCount,
      amountCents: disbursement.amountCents,
      transferId,
      idempotencyKey: disbursement.idempotencyKey,
    }));
    return true;
  }

  async function settleFailure(
    disbursement: Disbursement,
    organizationName: string,
    error: string,
  ): Promise<boolean> {
    const result = store.markFailed(disbursement.id, error);
    if (!result.success) {
      logger.error({
        event: 'disbursement.fail_failed',
        disbursementId: disbursement.id,
        reason: result.reason,
      }, 'Disbursement could not be marked failed');
      return false;
    }

    await safeNotify('failure', () => notifier.notifyFailure({
      organization: organizationName,
      itemCount: disbursement.itemCount,
      amountCents: disbursement.amountCents,
      error,
      idempotencyKey: disbursement.idempotencyKey,
    }));
    return true;
  }

  // ---------------------------------------------------------------------------
  // Pass 1: pending recovery
  // ---------------------------------------------------------------------------

  async function reconcilePending(): Promise<PendingReconciliationResult> {
    // Checked before touching the ledger
    const transferGateway = requireGateway();

    const result: PendingReconciliationResult = {
      checked: 0,
      completed: 0,
      failed: 0,
      stillPending: 0,
      errors: [],
    };

    // A store failure here aborts the run
    const pending = store.listDisbursementsByStatus('pending');

    if (pending.length === 0) {
      logger.info({ event: 'reconciliation.clean' }, 'No pending disbursements found');
      return result;
    }

    logger.info({
      event: 'reconciliation.start',
      pendingCount: pending.length,
    }, `Reconciling ${pending.length} pending disbursements`);

    for (const disbursement of pending) {
      result.checked++;
      let label = disbursement.organizationId;

      try {
        const org = store.getOrganization(disbursement.organizationId);

        if (!org) {
          const error = `Organization ${disbursement.organizationId} no longer exists`;
          if (await settleFailure(disbursement, label, error)) {
            result.failed++;
          } else {
            result.stillPending++;
          }
          result.errors.push({ organization: label, error, retryable: false });
          continue;
        }

        label = org.name;

        if (!hasAccountSlug(org)) {
          if (await settleFailure(disbursement, label, MISSING_SLUG_ERROR)) {
            result.failed++;
          } else {
            result.stillPending++;
          }
          result.errors.push({ organization: label, error: MISSING_SLUG_ERROR, retryable: false });
          continue;
        }

        const outcome = await attemptTransfer(transferGateway, disbursement, org.accountSlug);

        switch (outcome.outcome) {
          case 'success':
            if (await settleSuccess(disbursement, label, outcome.transferId)) {
              result.completed++;
            } else {
              result.stillPending++;
            }
            break;

          case 'permanent':
            if (await settleFailure(disbursement, label, outcome.error)) {
              result.failed++;
            } else {
              result.stillPending++;
            }
            result.errors.push({ organization: label, error: outcome.error, retryable: false });
            break;

          case 'transient':
            store.recordTransientError(disbursement.id, outcome.error);
            result.stillPending++;
            logger.warn({
              event: 'reconciliation.retry_later',
              disbursementId: disbursement.id,
              statusCode: outcome.statusCode,
              error: outcome.error,
            }, `Transient failure for ${label}; left pending`);
            break;
        }
      } catch (err) {
        logger.error({ err, disbursementId: disbursement.id }, 'Reconciliation check failed');
        result.stillPending++;
        result.errors.push({ organization: label, error: errorMessage(err), retryable: true });
      }
    }

    logger.info({
      event: 'reconciliation.complete',
      checked: result.checked,
      completed: result.completed,
      failed: result.failed,
      stillPending: result.stillPending,
    }, `Reconciliation complete: ${result.checked} checked`);

    return result;
  }

  // ---------------------------------------------------------------------------
  // Pass 2: new billables
  // ---------------------------------------------------------------------------

  async function processGroup(
    transferGateway: ITransferGateway,
    group: OrganizationGroup,
    result: NewBillablesResult,
  ): Promise<void> {
    const org = store.getOrganization(group.organizationId);
    if (!org) {
      result.errors.push({
        organization: group.organizationId,
        error: `Organization ${group.organizationId} not found`,
        retryable: false,
      });
      return;
    }

    if (!hasAccountSlug(org)) {
      logger.warn({
        event: 'billing.skip.no_slug',
        organizationId: org.id,
        itemCount: group.itemIds.length,
      }, `Skipping ${org.name}: no transfer account slug`);
      result.errors.push({ organization: org.name, error: MISSING_SLUG_ERROR, retryable: false });
      return;
    }

    // Zero-cost items wait until the organization owes something
    if (group.totalCents <= 0) {
      logger.debug({
        event: 'billing.skip.zero_total',
        organizationId: org.id,
        itemCount: group.itemIds.length,
      }, `Skipping ${org.name}: nothing owed`);
      return;
    }

    const idempotencyKey = generateIdempotencyKey();
    const memo = buildMemo(memoPrefix, group.itemIds.length, idempotencyKey);

    let disbursement: Disbursement;
    try {
      disbursement = store.createPendingDisbursement({
        idempotencyKey,
        organizationId: org.id,
        amountCents: group.totalCents,
        memo,
        itemIds: group.itemIds,
      });
    } catch (err) {
      // Nothing was committed: no transfer, items stay unbilled for next pass
      logger.error({ err, organizationId: org.id }, 'Failed to commit pending disbursement');
      result.errors.push({ organization: org.name, error: errorMessage(err), retryable: true });
      return;
    }

    logger.info(
      { event: 'billing.transfer', organizationId: org.id, disbursementId: disbursement.id },
      `Creating disbursement for ${org.name}: ${group.itemIds.length} items, ${formatDollars(group.totalCents)}`
    );

    const outcome = await attemptTransfer(transferGateway, disbursement, org.accountSlug);

    switch (outcome.outcome) {
      case 'success':
        if (await settleSuccess(disbursement, org.name, outcome.transferId)) {
          result.organizationsProcessed++;
          result.itemsBilled += disbursement.itemCount;
          result.totalAmountCents += disbursement.amountCents;
        } else {
          result.errors.push({
            organization: org.name,
            error: `Transfer ${outcome.transferId ?? '(no id)'} succeeded but disbursement ${disbursement.id} is still pending`,
            retryable: true,
          });
        }
        break;

      case 'permanent':
        await settleFailure(disbursement, org.name, outcome.error);
        result.errors.push({ organization: org.name, error: outcome.error, retryable: false });
        break;

      case 'transient':
        store.recordTransientError(disbursement.id, outcome.error);
        logger.warn({
          event: 'billing.retry_later',
          disbursementId: disbursement.id,
          statusCode: outcome.statusCode,
          error: outcome.error,
        }, `Transient failure for ${org.name}; disbursement left pending`);
        result.errors.push({ organization: org.name, error: outcome.error, retryable: true });
        break;
    }
  }

  async function processNewBillables(): Promise<NewBillablesResult> {
    // No pending row may be committed without a gateway to send it
    const transferGateway = requireGateway();

    const result: NewBillablesResult = {
      organizationsProcessed: 0,
      itemsBilled: 0,
      totalAmountCents: 0,
      errors: [],
    };

    // Snapshot is authoritative for this pass; a store failure aborts the run
    const snapshot = store.listUnbilledItems();
    const groups = groupByOrganization(snapshot);

    logger.info({
      event: 'billing.pass.start',
      organizations: groups.length,
      items: snapshot.length,
    }, `Found ${groups.length} organizations with unbilled items`);

    for (const group of groups) {
      try {
        await processGroup(transferGateway, group, result);
      } catch (err) {
        logger.error({ err, organizationId: group.organizationId }, 'Unexpected error processing billing');
        result.errors.push({
          organization: group.organizationId,
          error: errorMessage(err),
          retryable: true,
        });
      }
    }

    logger.info({
      event: 'billing.pass.complete',
      organizationsProcessed: result.organizationsProcessed,
      itemsBilled: result.itemsBilled,
      totalAmountCents: result.totalAmountCents,
      errorCount: result.errors.length,
    }, `Billing complete: ${result.organizationsProcessed} organizations, ${formatDollars(result.totalAmountCents)}`);

    return result;
  }

  // ---------------------------------------------------------------------------
  // Cycle
  // ---------------------------------------------------------------------------

  async function runOnce(): Promise<BillingCycleResult> {
    if (!gateway) {
      logger.warn({ event: 'billing.skipped' }, 'Transfer API not configured - skipping billing disbursements');
      return { skipped: true, reason: 'Transfer API not configured' };
    }

    const recovery = await reconcilePending();
    const billing = await processNewBillables();
    return { skipped: false, recovery, billing };
  }

  return { reconcilePending, processNewBillables, runOnce };
}

