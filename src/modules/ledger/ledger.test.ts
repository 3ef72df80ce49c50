import { describe, it, expect, vi, beforeEach } from 'vitest';
import { getLedgerRow, getRecentLedgerRows, upsertLedgerRow, type UploadLedgerRow } from '../database/index.js';
import { PostgresUploadLedger, toLedgerRecord } from './ledger.js';

vi.mock('../database/index.js', () => ({
  getLedgerRow: vi.fn(),
  upsertLedgerRow: vi.fn(),
  getRecentLedgerRows: vi.fn(),
}));

function row(overrides: Partial<UploadLedgerRow> = {}): UploadLedgerRow {
  return {
    publishDate: '2025-01-06',
    published: true,
    videoId: 'vid-123',
    title: 'Paper Boat Journey',
    weekday: 'Monday',
    url: 'https://www.youtube.com/watch?v=vid-123',
    publishedAt: new Date(2025, 0, 6, 9, 4),
    ...overrides,
  };
}

describe('PostgresUploadLedger', () => {
  let ledger: PostgresUploadLedger;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.mocked(getLedgerRow).mockReset();
    vi.mocked(upsertLedgerRow).mockReset();
    vi.mocked(getRecentLedgerRows).mockReset();
    ledger = new PostgresUploadLedger();
  });

  describe('hasPublishedOn', () => {
    it('should be true for a published row', async () => {
      vi.mocked(getLedgerRow).mockResolvedValue(row());

      await expect(ledger.hasPublishedOn('2025-01-06')).resolves.toBe(true);
      expect(getLedgerRow).toHaveBeenCalledWith('2025-01-06');
    });

    it('should be false for a row that is not marked published', async () => {
      vi.mocked(getLedgerRow).mockResolvedValue(row({ published: false }));

      await expect(ledger.hasPublishedOn('2025-01-06')).resolves.toBe(false);
    });

    it('should be false when the date has no row', async () => {
      vi.mocked(getLedgerRow).mockResolvedValue(undefined);

      await expect(ledger.hasPublishedOn('2025-01-07')).resolves.toBe(false);
    });

    it('should pass database errors through', async () => {
      vi.mocked(getLedgerRow).mockRejectedValue(new Error('connection refused'));

      await expect(ledger.hasPublishedOn('2025-01-06')).rejects.toThrow('connection refused');
    });
  });

  describe('recordPublish', () => {
    it('should upsert a published row for the date', async () => {
      vi.mocked(upsertLedgerRow).mockResolvedValue(row());
      const timestamp = new Date(2025, 0, 6, 9, 4);

      await ledger.recordPublish({
        date: '2025-01-06',
        identifier: 'vid-123',
        title: 'Paper Boat Journey',
        weekday: 'Monday',
        url: 'https://www.youtube.com/watch?v=vid-123',
        timestamp,
      });

      expect(upsertLedgerRow).toHaveBeenCalledWith({
        publishDate: '2025-01-06',
        published: true,
        videoId: 'vid-123',
        title: 'Paper Boat Journey',
        weekday: 'Monday',
        url: 'https://www.youtube.com/watch?v=vid-123',
        publishedAt: timestamp,
      });
      expect(console.log).toHaveBeenCalledWith(
        '[Ledger] Marked upload complete for 2025-01-06: Paper Boat Journey (ID: vid-123)'
      );
    });

    it('should store a missing url as null', async () => {
      vi.mocked(upsertLedgerRow).mockResolvedValue(row({ url: null }));

      await ledger.recordPublish({
        date: '2025-01-06',
        identifier: 'vid-123',
        title: 'Paper Boat Journey',
        weekday: 'Monday',
        timestamp: new Date(2025, 0, 6, 9, 4),
      });

      expect(vi.mocked(upsertLedgerRow).mock.calls[0][0].url).toBeNull();
    });

    it('should write the second publish of a date over the first', async () => {
      vi.mocked(upsertLedgerRow).mockResolvedValue(row());

      await ledger.recordPublish({
        date: '2025-01-06',
        identifier: 'vid-first',
        title: 'First Upload',
        weekday: 'Monday',
        timestamp: new Date(2025, 0, 6, 7, 30),
      });
      await ledger.recordPublish({
        date: '2025-01-06',
        identifier: 'vid-second',
        title: 'Second Upload',
        weekday: 'Monday',
        timestamp: new Date(2025, 0, 6, 9, 0),
      });

      expect(vi.mocked(upsertLedgerRow).mock.calls.map(([values]) => [values.publishDate, values.videoId])).toEqual([
        ['2025-01-06', 'vid-first'],
        ['2025-01-06', 'vid-second'],
      ]);
    });

    it('should fail when the write fails', async () => {
      vi.mocked(upsertLedgerRow).mockRejectedValue(new Error('Cannot use a pool after calling end on the pool'));

      await expect(
        ledger.recordPublish({
          date: '2025-01-06',
          identifier: 'vid-123',
          title: 'Paper Boat Journey',
          weekday: 'Monday',
          timestamp: new Date(2025, 0, 6, 9, 4),
        })
      ).rejects.toThrow('Cannot use a pool after calling end on the pool');
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe('recentRecords', () => {
    it('should pass the limit through and keep the row order', async () => {
      vi.mocked(getRecentLedgerRows).mockResolvedValue([
        row({ publishDate: '2025-01-07', videoId: 'vid-tue', weekday: 'Tuesday', publishedAt: new Date(2025, 0, 7, 9) }),
        row(),
      ]);

      const records = await ledger.recentRecords(2);

      expect(getRecentLedgerRows).toHaveBeenCalledWith(2);
      expect(records.map((record) => [record.date, record.identifier])).toEqual([
        ['2025-01-07', 'vid-tue'],
        ['2025-01-06', 'vid-123'],
      ]);
    });
  });
});

describe('toLedgerRecord', () => {
  it('should map column names to record fields', () => {
    const publishedAt = new Date(2025, 0, 6, 9, 4);

    expect(toLedgerRecord(row({ publishedAt }))).toEqual({
      date: '2025-01-06',
      published: true,
      identifier: 'vid-123',
      title: 'Paper Boat Journey',
      weekday: 'Monday',
      url: 'https://www.youtube.com/watch?v=vid-123',
      timestamp: publishedAt,
    });
  });

  it('should recompute a weekday that is not valid from the publish time', () => {
    // 8 January 2025 is a Wednesday
    const record = toLedgerRecord(row({ weekday: 'monday ', publishedAt: new Date(2025, 0, 8, 12, 0) }));

    expect(record.weekday).toBe('Wednesday');
  });
});
