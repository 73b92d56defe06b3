import type { DailyRecapRecord } from '../../entities/daily-recap.js';

/**
 * Append-only table of submitted records. Rows carry no identifier; order is
 * append order. There is no update or delete.
 */
export interface RecapRepositoryPort {
  append(record: DailyRecapRecord): Promise<void>;
  /** Every stored record, oldest first, normalised to the canonical fields. */
  readAll(): Promise<DailyRecapRecord[]>;
}

export type RecapStoreMode = 'remote_preferred' | 'local_fallback' | 'local_only';

export interface RecapAppendResult {
  mode: RecapStoreMode;
  /** Set when this append had to fall back to the local store. */
  warning?: string;
}

/** Record store that can switch backends and reports which one is in use. */
export interface RecapStorePort {
  getMode(): RecapStoreMode;
  append(record: DailyRecapRecord): Promise<RecapAppendResult>;
  readAll(): Promise<DailyRecapRecord[]>;
}
