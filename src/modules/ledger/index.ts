/**
 * Ledger Module
 *
 * Tracks which calendar dates already had a successful publish, so the
 * scheduler never uploads twice on the same day.
 */

export type { LedgerRecord, PublishEntry, UploadLedger } from './types.js';
export { PostgresUploadLedger, toLedgerRecord } from './ledger.js';
