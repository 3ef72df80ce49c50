import { eq, desc } from 'drizzle-orm';
import { db } from './client.js';
import {
  settings,
  uploadLedger,
  type Setting,
  type UploadLedgerRow,
  type NewUploadLedgerRow,
} from './schema.js';

// =============================================================================
// SETTINGS QUERIES
// =============================================================================

/**
 * Get all settings
 */
export async function getAllSettings(): Promise<Setting[]> {
  return await db.select().from(settings);
}

/**
 * Set a setting value (upsert)
 */
export async function setSetting(
  key: string,
  value: unknown,
  description?: string
): Promise<Setting> {
  const [result] = await db
    .insert(settings)
    .values({ key, value, description })
    .onConflictDoUpdate({
      target: settings.key,
      set: {
        value,
        description,
        updatedAt: new Date(),
      },
    })
    .returning();
  return result;
}

// =============================================================================
// UPLOAD LEDGER QUERIES
// =============================================================================

/**
 * Get the ledger row for a calendar date (YYYY-MM-DD)
 */
export async function getLedgerRow(publishDate: string): Promise<UploadLedgerRow | undefined> {
  const [result] = await db
    .select()
    .from(uploadLedger)
    .where(eq(uploadLedger.publishDate, publishDate))
    .limit(1);
  return result;
}

/**
 * Insert or overwrite the ledger row for a calendar date
 */
export async function upsertLedgerRow(row: NewUploadLedgerRow): Promise<UploadLedgerRow> {
  const [result] = await db
    .insert(uploadLedger)
    .values(row)
    .onConflictDoUpdate({
      target: uploadLedger.publishDate,
      set: {
        published: row.published ?? true,
        videoId: row.videoId,
        title: row.title,
        weekday: row.weekday,
        url: row.url ?? null,
        publishedAt: row.publishedAt,
      },
    })
    .returning();
  return result;
}

/**
 * Most recent ledger rows, newest date first
 */
export async function getRecentLedgerRows(limit: number = 30): Promise<UploadLedgerRow[]> {
  return await db
    .select()
    .from(uploadLedger)
    .orderBy(desc(uploadLedger.publishDate))
    .limit(limit);
}
