/**
 * Database Connection Module
 *
 * Handles database lifecycle: initialization, connection management, and shutdown.
 *
 * @module db/connection
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';
import { up as applyFulfillmentBilling } from './migrations/001_fulfillment_billing.js';

let db: Database.Database | null = null;

/**
 * Apply pragmas and schema to an open connection.
 * Shared by initDatabase() and the test harness.
 */
export function prepareDatabase(database: Database.Database): Database.Database {
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');
  applyFulfillmentBilling(database);
  return database;
}

/**
 * Initialize the database connection
 */
export function initDatabase(dbPath: string): Database.Database {
  if (db) {
    return db;
  }

  // For file-based SQLite, ensure data directory exists
  if (dbPath !== ':memory:') {
    const dbDir = dirname(dbPath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
      logger.info({ path: dbDir }, 'Created database directory');
    }
  }

  db = new Database(dbPath);
  logger.info({ path: dbPath }, 'Database connection established');

  prepareDatabase(db);
  logger.info('Database schema initialized');

  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}

// Re-export Database type for consumers
export type { Database };
