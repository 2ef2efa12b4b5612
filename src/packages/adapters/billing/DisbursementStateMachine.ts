/**
 * DisbursementStateMachine — Disbursement Lifecycle
 *
 * Formal state transitions with SQL WHERE guards to prevent invalid moves.
 * Each transition uses UPDATE ... WHERE status = ? for race protection.
 *
 * States: pending → completed | failed
 *
 * A pending row is written together with the billed flag on its items,
 * before the transfer API is called. Pending is also the retry state:
 * rows left pending by a crash or a transient failure are re-sent with
 * the idempotency key they were created with.
 *
 * @module packages/adapters/billing/DisbursementStateMachine
 */

import { randomUUID } from 'crypto';
import type Database from 'better-sqlite3';
import { logger } from '../../../utils/logger.js';
import type {
  Disbursement,
  DisbursementStatus,
} from '../../core/domain/billing.js';

// =============================================================================
// Types
// =============================================================================

export interface TransitionResult {
  success: boolean;
  disbursementId: string;
  fromState: DisbursementStatus;
  toState: DisbursementStatus;
  reason?: string;
}

export interface CreatePendingParams {
  idempotencyKey: string;
  organizationId: string;
  amountCents: number;
  memo: string;
  /** Snapshotted unbilled items this disbursement covers */
  itemIds: string[];
}

interface DisbursementRow {
  id: string;
  idempotency_key: string;
  organization_id: string;
  amount_cents: number;
  item_count: number;
  memo: string;
  status: DisbursementStatus;
  external_transfer_id: string | null;
  error_message: string | null;
  last_error: string | null;
  attempt_count: number;
  created_at: string;
  last_attempted_at: string | null;
  completed_at: string | null;
  failed_at: string | null;
}

/**
 * Raised inside the create transaction when a snapshotted item is no
 * longer unbilled. The transaction rolls back; nothing is written.
 */
export class SnapshotConflictError extends Error {
  constructor(
    public readonly organizationId: string,
    public readonly expected: number,
    public readonly flagged: number,
  ) {
    super(
      `Snapshot conflict for organization ${organizationId}: ` +
      `expected to flag ${expected} items, flagged ${flagged}`,
    );
    this.name = 'SnapshotConflictError';
  }
}

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<DisbursementStatus, DisbursementStatus[]> = {
  pending: ['completed', 'failed'],
  completed: [],
  failed: [],
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Fresh idempotency key for a new disbursement row.
 * Generated once per row and never regenerated on retry.
 */
export function generateIdempotencyKey(): string {
  return `disb_${randomUUID()}`;
}

function toDisbursement(row: DisbursementRow): Disbursement {
  return {
    id: row.id,
    idempotencyKey: row.idempotency_key,
    organizationId: row.organization_id,
    amountCents: row.amount_cents,
    itemCount: row.item_count,
    memo: row.memo,
    status: row.status,
    externalTransferId: row.external_transfer_id,
    errorMessage: row.error_message,
    lastError: row.last_error,
    attemptCount: row.attempt_count,
    createdAt: row.created_at,
    lastAttemptedAt: row.last_attempted_at,
    completedAt: row.completed_at,
    failedAt: row.failed_at,
  };
}

// =============================================================================
// DisbursementStateMachine
// =============================================================================

export class DisbursementStateMachine {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Create a pending disbursement and flag its items billed, atomically.
   *
   * Throws (and writes nothing) if any item is already billed or missing.
   */
  createPending(params: CreatePendingParams): Disbursement {
    const { idempotencyKey, organizationId, amountCents, memo, itemIds } = params;

    if (itemIds.length === 0) {
      throw new Error(`Cannot create disbursement for ${organizationId} without items`);
    }

    const disbursementId = randomUUID();

    const create = this.db.transaction(() => {
      this.db.prepare(`
        INSERT INTO disbursements
          (id, idempotency_key, organization_id, amount_cents, item_count, memo, status)
        VALUES (?, ?, ?, ?, ?, ?, 'pending')
      `).run(disbursementId, idempotencyKey, organizationId, amountCents, itemIds.length, memo);

      const flag = this.db.prepare(`
        UPDATE billable_items
        SET billed = 1, disbursement_id = ?
        WHERE id = ? AND organization_id = ? AND billed = 0
      `);

      let flagged = 0;
      for (const itemId of itemIds) {
        flagged += flag.run(disbursementId, itemId, organizationId).changes;
      }

      if (flagged !== itemIds.length) {
        throw new SnapshotConflictError(organizationId, itemIds.length, flagged);
      }
    });

    create();

    logger.info({
      event: 'disbursement.created',
      disbursementId,
      organizationId,
      amountCents,
      itemCount: itemIds.length,
      idempotencyKey,
    }, 'Pending disbursement committed');

    const created = this.getDisbursement(disbursementId);
    if (!created) {
      throw new Error(`Disbursement ${disbursementId} missing after commit`);
    }
    return created;
  }

  /**
   * Record that a transfer call is about to be made for a pending row.
   */
  recordAttempt(disbursementId: string): void {
    this.db.prepare(`
      UPDATE disbursements
      SET attempt_count = attempt_count + 1,
          last_attempted_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
      WHERE id = ? AND status = 'pending'
    `).run(disbursementId);
  }

  /**
   * Keep the row pending but remember why the last attempt did not go through.
   */
  recordTransientError(disbursementId: string, errorMessage: string): void {
    this.db.prepare(`
      UPDATE disbursements SET last_error = ?
      WHERE id = ? AND status = 'pending'
    `).run(errorMessage, disbursementId);
  }

  /**
   * Transition disbursement to completed state.
   * The transfer id is null when the provider accepted without returning one.
   */
  complete(disbursementId: string, externalTransferId: string | null): TransitionResult {
    return this.transition(disbursementId, 'completed', () => {
      this.db.prepare(`
        UPDATE disbursements
        SET status = 'completed', external_transfer_id = ?, last_error = NULL,
            completed_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
        WHERE id = ? AND status = 'pending'
      `).run(externalTransferId, disbursementId);
    });
  }

  /**
   * Transition disbursement to failed state.
   * Items stay billed; the failure is settled by hand.
   */
  fail(disbursementId: string, errorMessage: string): TransitionResult {
    return this.transition(disbursementId, 'failed', () => {
      this.db.prepare(`
        UPDATE disbursements
        SET status = 'failed', error_message = ?,
            failed_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now')
        WHERE id = ? AND status = 'pending'
      `).run(errorMessage, disbursementId);
    });
  }

  getDisbursement(disbursementId: string): Disbursement | null {
    const row = this.db.prepare(
      `SELECT * FROM disbursements WHERE id = ?`
    ).get(disbursementId) as DisbursementRow | undefined;
    return row ? toDisbursement(row) : null;
  }

  getByIdempotencyKey(idempotencyKey: string): Disbursement | null {
    const row = this.db.prepare(
      `SELECT * FROM disbursements WHERE idempotency_key = ?`
    ).get(idempotencyKey) as DisbursementRow | undefined;
    return row ? toDisbursement(row) : null;
  }

  listByStatus(status: DisbursementStatus): Disbursement[] {
    const rows = this.db.prepare(`
      SELECT * FROM disbursements
      WHERE status = ?
      ORDER BY created_at ASC, rowid ASC
    `).all(status) as DisbursementRow[];
    return rows.map(toDisbursement);
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private transition(
    disbursementId: string,
    toState: DisbursementStatus,
    action: () => void,
  ): TransitionResult {
    const expectedFrom: DisbursementStatus = 'pending';

    try {
      return this.db.transaction((): TransitionResult => {
        const row = this.db.prepare(
          `SELECT status FROM disbursements WHERE id = ? AND status = ?`
        ).get(disbursementId, expectedFrom) as { status: DisbursementStatus } | undefined;

        if (!row) {
          const existing = this.getDisbursement(disbursementId);
          if (!existing) {
            return { success: false, disbursementId, fromState: expectedFrom, toState, reason: 'Disbursement not found' };
          }
          return {
            success: false, disbursementId,
            fromState: existing.status, toState,
            reason: `Invalid transition: ${existing.status} → ${toState}`,
          };
        }

        if (!VALID_TRANSITIONS[expectedFrom].includes(toState)) {
          return {
            success: false, disbursementId,
            fromState: expectedFrom, toState,
            reason: `Transition ${expectedFrom} → ${toState} not allowed`,
          };
        }

        action();

        logger.info({
          event: 'disbursement.transition',
          disbursementId,
          from: expectedFrom,
          to: toState,
        }, `Disbursement ${disbursementId}: ${expectedFrom} → ${toState}`);

        return { success: true, disbursementId, fromState: expectedFrom, toState };
      })();
    } catch (err) {
      logger.error({ err, disbursementId }, 'Disbursement transition failed');
      return {
        success: false, disbursementId,
        fromState: expectedFrom, toState,
        reason: `Error: ${err instanceof Error ? err.message : String(err)}`,
      };
    }
  }
}
