import type { DailyRecapInput, DailyRecapRecord } from '../../entities/daily-recap.js';
import type { OverviewMetrics } from '../../engine/metrics-engine.js';
import type { ExportCapabilities, ExportKind } from '../outbound/recap-exporter.port.js';
import type { RecapStoreMode } from '../outbound/recap-repository.port.js';

export interface RecapPreview {
  record: DailyRecapRecord;
  violations: string[];
  overview: OverviewMetrics;
  overviewText: string;
  recapText: string;
}

export type SubmitRecapResult =
  | { accepted: true; store: RecapStoreMode; warning?: string }
  | { accepted: false; violations: string[] };

export interface RecapExportFile {
  fileName: string;
  contentType: string;
  body: Buffer;
}

export interface RecapUseCasePort {
  preview(input: DailyRecapInput): RecapPreview;
  /** Validate, then append only when there are no violations. */
  submit(input: DailyRecapInput): Promise<SubmitRecapResult>;
  listRecent(limit: number): Promise<{ data: DailyRecapRecord[]; total: number }>;
  /** Returns null when the export kind is not available in this runtime. */
  exportRecord(kind: ExportKind, input: DailyRecapInput): Promise<RecapExportFile | null>;
  capabilities(): ExportCapabilities;
  storeMode(): RecapStoreMode;
}
