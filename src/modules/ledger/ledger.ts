/**
 * Postgres-backed upload ledger
 */

import {
  getLedgerRow,
  upsertLedgerRow,
  getRecentLedgerRows,
  type UploadLedgerRow,
} from '../database/index.js';
import { isWeekday, weekdayOf } from '../../utils/calendar.js';
import type { LedgerRecord, PublishEntry, UploadLedger } from './types.js';

/**
 * Map a stored row to a ledger record. An unknown weekday string (edited by
 * hand) is recomputed from the publish time.
 */
export function toLedgerRecord(row: UploadLedgerRow): LedgerRecord {
  return {
    date: row.publishDate,
    published: row.published,
    identifier: row.videoId,
    title: row.title,
    weekday: isWeekday(row.weekday) ? row.weekday : weekdayOf(row.publishedAt),
    url: row.url,
    timestamp: row.publishedAt,
  };
}

export class PostgresUploadLedger implements UploadLedger {
  async hasPublishedOn(date: string): Promise<boolean> {
    const row = await getLedgerRow(date);
    return row?.published === true;
  }

  async recordPublish(entry: PublishEntry): Promise<void> {
    await upsertLedgerRow({
      publishDate: entry.date,
      published: true,
      videoId: entry.identifier,
      title: entry.title,
      weekday: entry.weekday,
      url: entry.url ?? null,
      publishedAt: entry.timestamp,
    });
    console.log(`[Ledger] Marked upload complete for ${entry.date}: ${entry.title} (ID: ${entry.identifier})`);
  }

  async recentRecords(limit: number): Promise<LedgerRecord[]> {
    const rows = await getRecentLedgerRows(limit);
    return rows.map(toLedgerRecord);
  }
}
