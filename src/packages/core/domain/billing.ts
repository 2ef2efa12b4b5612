/**
 * Fulfillment Billing Domain Types
 *
 * Shapes shared by the ledger store, the transfer gateway and the
 * disbursement reconciler. All money is integer cents.
 *
 * @module packages/core/domain/billing
 */

// =============================================================================
// Ledger Records
// =============================================================================

export type DisbursementStatus = 'pending' | 'completed' | 'failed';

export interface Organization {
  id: string;
  name: string;
  /** Transfer API account slug; null or empty means the org cannot be billed */
  accountSlug: string | null;
}

export interface BillableItem {
  id: string;
  organizationId: string;
  costCents: number;
  billed: boolean;
  /** Disbursement that covers this item, once flagged billed */
  disbursementId: string | null;
  createdAt: string;
}

/** Captured view of an unbilled item at the start of a billing pass */
export interface UnbilledItemSnapshot {
  id: string;
  organizationId: string;
  costCents: number;
}

export interface Disbursement {
  id: string;
  idempotencyKey: string;
  organizationId: string;
  amountCents: number;
  itemCount: number;
  memo: string;
  status: DisbursementStatus;
  externalTransferId: string | null;
  errorMessage: string | null;
  lastError: string | null;
  attemptCount: number;
  createdAt: string;
  lastAttemptedAt: string | null;
  completedAt: string | null;
  failedAt: string | null;
}

// =============================================================================
// Run Results
// =============================================================================

export interface BillingRunError {
  /** Organization display name (or id when the org could not be resolved) */
  organization: string;
  error: string;
  retryable: boolean;
}

export interface NewBillablesResult {
  organizationsProcessed: number;
  itemsBilled: number;
  totalAmountCents: number;
  errors: BillingRunError[];
}

export interface PendingReconciliationResult {
  checked: number;
  completed: number;
  failed: number;
  stillPending: number;
  errors: BillingRunError[];
}

export type BillingCycleResult =
  | { skipped: true; reason: string }
  | {
      skipped: false;
      recovery: PendingReconciliationResult;
      billing: NewBillablesResult;
    };
