/**
 * Upload Ledger Types
 */

import type { Weekday } from '../../utils/calendar.js';

/**
 * One successful publish, keyed by local calendar date
 */
export interface LedgerRecord {
  /** Local calendar date, YYYY-MM-DD */
  date: string;
  published: boolean;
  /** Identifier returned by the publisher (video id) */
  identifier: string;
  title: string;
  weekday: Weekday;
  url: string | null;
  timestamp: Date;
}

/**
 * Values written by recordPublish
 */
export type PublishEntry = Omit<LedgerRecord, 'published' | 'url'> & { url?: string | null };

/**
 * Durable record of which dates already had a successful publish.
 *
 * recordPublish overwrites any existing record for the same date.
 */
export interface UploadLedger {
  hasPublishedOn(date: string): Promise<boolean>;
  recordPublish(entry: PublishEntry): Promise<void>;
  /** Most recent first, at most `limit` records */
  recentRecords(limit: number): Promise<LedgerRecord[]>;
}
