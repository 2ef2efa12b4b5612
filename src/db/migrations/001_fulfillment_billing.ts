/**
 * Migration 001: Fulfillment Billing
 *
 * Creates the billing ledger tables:
 * - organizations: Billing entities and their transfer account slug
 * - billable_items: Unit costs awaiting a disbursement
 * - disbursements: One row per transfer attempt (audit trail, never deleted)
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const FULFILLMENT_BILLING_SQL = `
-- =============================================================================
-- organizations — Billing entities
-- =============================================================================
CREATE TABLE IF NOT EXISTS organizations (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  account_slug TEXT,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

-- =============================================================================
-- disbursements — Transfer attempt lifecycle
-- =============================================================================
CREATE TABLE IF NOT EXISTS disbursements (
  id TEXT PRIMARY KEY,
  idempotency_key TEXT NOT NULL UNIQUE,
  organization_id TEXT NOT NULL REFERENCES organizations(id),
  amount_cents INTEGER NOT NULL CHECK (amount_cents > 0),
  item_count INTEGER NOT NULL CHECK (item_count > 0),
  memo TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN (
    'pending', 'completed', 'failed'
  )),
  external_transfer_id TEXT,
  error_message TEXT,
  last_error TEXT,
  attempt_count INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  last_attempted_at TEXT,
  completed_at TEXT,
  failed_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_disbursements_org
  ON disbursements(organization_id, created_at DESC);

CREATE INDEX IF NOT EXISTS idx_disbursements_status
  ON disbursements(status)
  WHERE status = 'pending';

-- =============================================================================
-- billable_items — Work awaiting billing
-- =============================================================================
CREATE TABLE IF NOT EXISTS billable_items (
  id TEXT PRIMARY KEY,
  organization_id TEXT NOT NULL REFERENCES organizations(id),
  cost_cents INTEGER NOT NULL CHECK (cost_cents >= 0),
  billed INTEGER NOT NULL DEFAULT 0 CHECK (billed IN (0, 1)),
  disbursement_id TEXT REFERENCES disbursements(id),
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE INDEX IF NOT EXISTS idx_billable_items_unbilled
  ON billable_items(organization_id)
  WHERE billed = 0;
`;

export const ROLLBACK_SQL = `
DROP TABLE IF EXISTS billable_items;
DROP TABLE IF EXISTS disbursements;
DROP TABLE IF EXISTS organizations;
`;

export function up(db: Database.Database): void {
  logger.info('Running migration 001_fulfillment_billing: Creating billing tables');
  db.exec(FULFILLMENT_BILLING_SQL);
  logger.info('Migration 001_fulfillment_billing completed');
}

export function down(db: Database.Database): void {
  logger.info('Rolling back migration 001_fulfillment_billing');
  db.exec(ROLLBACK_SQL);
  logger.info('Migration 001_fulfillment_billing reverted');
}
