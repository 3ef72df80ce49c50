/**
 * Database Module
 *
 * Provides type-safe database access for the content pipeline.
 * Uses Drizzle ORM with PostgreSQL.
 */

// Export database client and connection utilities
export {
  db,
  pool,
  schema,
  checkDatabaseHealth,
  closeDatabaseConnection,
  initializeDatabase,
  type Database,
} from './client.js';

// Export schema and types
export {
  settings,
  uploadLedger,
  type Setting,
  type NewSetting,
  type UploadLedgerRow,
  type NewUploadLedgerRow,
} from './schema.js';

// Export query builders
export {
  // Settings
  getAllSettings,
  setSetting,
  // Upload ledger
  getLedgerRow,
  upsertLedgerRow,
  getRecentLedgerRows,
} from './queries.js';
