/**
 * Manual recovery helpers for disbursements
 *
 * Not used by the automated passes. An operator uses these to check
 * whether a pending or failed disbursement actually moved money before
 * settling it by hand.
 *
 * @module services/billing/disbursement-lookup
 */

import type { ILedgerStore } from '../../packages/core/ports/ILedgerStore.js';
import type {
  ITransferGateway,
  TransferSummary,
} from '../../packages/core/ports/ITransferGateway.js';
import type { Disbursement, DisbursementStatus } from '../../packages/core/domain/billing.js';

export type TransferLookupResult =
  | { found: true; disbursementId: string; transfer: TransferSummary }
  | { found: false; disbursementId: string; reason: string };

export interface DisbursementStatusSummary {
  status: DisbursementStatus;
  count: number;
  amountCents: number;
}

const ALL_STATUSES: DisbursementStatus[] = ['pending', 'completed', 'failed'];

/**
 * Resolve a disbursement from its row id, its idempotency key, or the
 * `ref:<key>` reference quoted in notifications.
 */
export function resolveDisbursement(store: ILedgerStore, idOrReference: string): Disbursement | null {
  const key = idOrReference.trim().replace(/^ref:/, '');
  return store.getDisbursement(key) ?? store.getDisbursementByIdempotencyKey(key);
}

/**
 * Look for a provider transfer that matches a disbursement by idempotency
 * key (in the memo) and amount, on the paying organization's account.
 */
export async function findTransferForDisbursement(
  deps: { store: ILedgerStore; gateway: ITransferGateway },
  idOrReference: string,
): Promise<TransferLookupResult> {
  const disbursement = resolveDisbursement(deps.store, idOrReference);
  if (!disbursement) {
    return { found: false, disbursementId: idOrReference, reason: 'Disbursement not found' };
  }
  const disbursementId = disbursement.id;

  const org = deps.store.getOrganization(disbursement.organizationId);
  if (!org?.accountSlug) {
    return { found: false, disbursementId, reason: 'Organization has no transfer account slug' };
  }

  const transfer = await deps.gateway.findTransferByReference(
    org.accountSlug,
    disbursement.idempotencyKey,
    disbursement.amountCents,
  );

  return transfer
    ? { found: true, disbursementId, transfer }
    : { found: false, disbursementId, reason: 'No matching transfer on provider' };
}

/**
 * Per-status disbursement counts and totals
 */
export function summarizeDisbursements(store: ILedgerStore): DisbursementStatusSummary[] {
  return ALL_STATUSES.map((status) => {
    const rows = store.listDisbursementsByStatus(status);
    return {
      status,
      count: rows.length,
      amountCents: rows.reduce((sum, row) => sum + row.amountCents, 0),
    };
  });
}
