/**
 * SqliteLedgerStore - better-sqlite3 implementation of ILedgerStore
 *
 * Item and organization reads live here; disbursement writes go through
 * DisbursementStateMachine so every status change keeps its SQL guard.
 *
 * @module packages/adapters/storage/SqliteLedgerStore
 */

import type Database from 'better-sqlite3';
import {
  DisbursementStateMachine,
} from '../billing/DisbursementStateMachine.js';
import type {
  ILedgerStore,
  PendingDisbursementInput,
  StoreTransitionResult,
} from '../../core/ports/ILedgerStore.js';
import type {
  BillableItem,
  Disbursement,
  DisbursementStatus,
  Organization,
  UnbilledItemSnapshot,
} from '../../core/domain/billing.js';

// =============================================================================
// Row Types
// =============================================================================

interface OrganizationRow {
  id: string;
  name: string;
  account_slug: string | null;
}

interface BillableItemRow {
  id: string;
  organization_id: string;
  cost_cents: number;
  billed: number;
  disbursement_id: string | null;
  created_at: string;
}

// =============================================================================
// SqliteLedgerStore
// =============================================================================

export class SqliteLedgerStore implements ILedgerStore {
  private readonly db: Database.Database;
  private readonly stateMachine: DisbursementStateMachine;

  constructor(db: Database.Database) {
    this.db = db;
    this.stateMachine = new DisbursementStateMachine(db);
  }

  listUnbilledItems(): UnbilledItemSnapshot[] {
    const rows = this.db.prepare(`
      SELECT id, organization_id, cost_cents
      FROM billable_items
      WHERE billed = 0
      ORDER BY organization_id ASC, id ASC
    `).all() as Array<Pick<BillableItemRow, 'id' | 'organization_id' | 'cost_cents'>>;

    return rows.map((row) => ({
      id: row.id,
      organizationId: row.organization_id,
      costCents: row.cost_cents,
    }));
  }

  getOrganization(organizationId: string): Organization | null {
    const row = this.db.prepare(
      `SELECT id, name, account_slug FROM organizations WHERE id = ?`
    ).get(organizationId) as OrganizationRow | undefined;

    if (!row) return null;
    return { id: row.id, name: row.name, accountSlug: row.account_slug };
  }

  createPendingDisbursement(input: PendingDisbursementInput): Disbursement {
    return this.stateMachine.createPending(input);
  }

  recordAttempt(disbursementId: string): void {
    this.stateMachine.recordAttempt(disbursementId);
  }

  recordTransientError(disbursementId: string, error: string): void {
    this.stateMachine.recordTransientError(disbursementId, error);
  }

  markCompleted(disbursementId: string, externalTransferId: string | null): StoreTransitionResult {
    const { success, reason } = this.stateMachine.complete(disbursementId, externalTransferId);
    return { success, reason };
  }

  markFailed(disbursementId: string, error: string): StoreTransitionResult {
    const { success, reason } = this.stateMachine.fail(disbursementId, error);
    return { success, reason };
  }

  getDisbursement(disbursementId: string): Disbursement | null {
    return this.stateMachine.getDisbursement(disbursementId);
  }

  getDisbursementByIdempotencyKey(idempotencyKey: string): Disbursement | null {
    return this.stateMachine.getByIdempotencyKey(idempotencyKey);
  }

  listDisbursementsByStatus(status: DisbursementStatus): Disbursement[] {
    return this.stateMachine.listByStatus(status);
  }

  listItemsForDisbursement(disbursementId: string): BillableItem[] {
    const rows = this.db.prepare(`
      SELECT id, organization_id, cost_cents, billed, disbursement_id, created_at
      FROM billable_items
      WHERE disbursement_id = ?
      ORDER BY id ASC
    `).all(disbursementId) as BillableItemRow[];

    return rows.map((row) => ({
      id: row.id,
      organizationId: row.organization_id,
      costCents: row.cost_cents,
      billed: row.billed === 1,
      disbursementId: row.disbursement_id,
      createdAt: row.created_at,
    }));
  }
}
