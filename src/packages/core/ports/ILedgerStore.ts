/**
 * ILedgerStore - Billing Ledger Port
 *
 * Durable source of truth for what has been charged. Every mutating
 * call is its own committed transaction; the reconciler relies on
 * createPendingDisbursement() committing before it calls the gateway.
 *
 * @module packages/core/ports/ILedgerStore
 */

import type {
  BillableItem,
  Disbursement,
  DisbursementStatus,
  Organization,
  UnbilledItemSnapshot,
} from '../domain/billing.js';

export interface PendingDisbursementInput {
  idempotencyKey: string;
  organizationId: string;
  amountCents: number;
  memo: string;
  itemIds: string[];
}

export interface StoreTransitionResult {
  success: boolean;
  reason?: string;
}

export interface ILedgerStore {
  /** Snapshot of every unbilled item, ordered by organization id then item id */
  listUnbilledItems(): UnbilledItemSnapshot[];

  getOrganization(organizationId: string): Organization | null;

  /**
   * Insert a pending disbursement and flag exactly `itemIds` billed in one
   * transaction. Throws without writing anything if the commit fails.
   */
  createPendingDisbursement(input: PendingDisbursementInput): Disbursement;

  recordAttempt(disbursementId: string): void;
  recordTransientError(disbursementId: string, error: string): void;
  markCompleted(disbursementId: string, externalTransferId: string | null): StoreTransitionResult;
  markFailed(disbursementId: string, error: string): StoreTransitionResult;

  getDisbursement(disbursementId: string): Disbursement | null;
  getDisbursementByIdempotencyKey(idempotencyKey: string): Disbursement | null;
  listDisbursementsByStatus(status: DisbursementStatus): Disbursement[];
  listItemsForDisbursement(disbursementId: string): BillableItem[];
}
