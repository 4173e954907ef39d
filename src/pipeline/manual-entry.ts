import type { LedgerStore } from '../ledger/csv-store.js';
import { assertValidRecord, type ValidatedRecord } from '../ledger/record-schema.js';
import { logger } from '../utils/logger.js';

export interface ManualEntryOptions {
  /** Append even when the date/game/pick type is already in the ledger */
  allowDuplicate?: boolean;
}

export type ManualEntryResult =
  | { status: 'written'; record: ValidatedRecord }
  | { status: 'duplicate'; record: ValidatedRecord };

/**
 * Log one hand-entered record, bypassing prediction/outcome matching.
 * Throws ValidationError for a malformed candidate and PersistenceError when the
 * ledger cannot be written.
 */
export async function logManualRecord(
  candidate: unknown,
  store: LedgerStore,
  options: ManualEntryOptions = {},
): Promise<ManualEntryResult> {
  const record = assertValidRecord(candidate);
  const log = logger.child({ date: record.date, gameId: record.gameId, pickType: record.pickType });

  await store.ensureStorage();

  if (options.allowDuplicate) {
    if (await store.exists(record.date, record.gameId, record.pickType)) {
      log.warn('Record already in ledger, appending duplicate as requested');
    }
    await store.append(record);
  } else if (!(await store.appendIfAbsent(record))) {
    log.warn('Record already in ledger, not appended');
    return { status: 'duplicate', record };
  }

  log.info({ band: record.confidenceBand }, 'Logged manual record');
  return { status: 'written', record };
}
