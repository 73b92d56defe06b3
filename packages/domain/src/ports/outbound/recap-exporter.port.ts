import type { DailyRecapRecord } from '../../entities/daily-recap.js';

export type ExportKind = 'csv' | 'xlsx' | 'pdf';

export const EXPORT_KINDS: readonly ExportKind[] = ['csv', 'xlsx', 'pdf'];

export type CapabilityStatus = 'available' | 'unavailable';

export type ExportCapabilities = Readonly<Record<ExportKind, CapabilityStatus>>;

export interface RecapExporterPort {
  readonly kind: ExportKind;
  readonly fileExtension: string;
  readonly contentType: string;
  /** Serialise a single record. */
  export(record: DailyRecapRecord): Promise<Buffer>;
}

export function isExportKind(value: string): value is ExportKind {
  return EXPORT_KINDS.some((kind) => kind === value);
}
