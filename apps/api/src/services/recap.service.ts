import {
  buildRecord,
  computeOverview,
  renderFullRecap,
  renderOverview,
  validate,
} from '@ops-recap/domain';
import type {
  DailyRecapInput,
  DailyRecapRecord,
  ExportCapabilities,
  ExportKind,
  RecapExportFile,
  RecapExporterPort,
  RecapPreview,
  RecapStoreMode,
  RecapStorePort,
  RecapUseCasePort,
  SubmitRecapResult,
} from '@ops-recap/domain';

export interface RecapServiceDeps {
  store: RecapStorePort;
  exporters: ReadonlyMap<ExportKind, RecapExporterPort>;
  capabilities: ExportCapabilities;
  now?: () => Date;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** English weekday for an ISO calendar date, read in UTC; '' when the date is not ISO. */
export function weekdayOf(isoDate: string): string {
  if (!ISO_DATE.test(isoDate)) return '';
  const date = new Date(`${isoDate}T00:00:00.000Z`);
  if (Number.isNaN(date.getTime())) return '';
  return date.toLocaleDateString('en-US', { weekday: 'long', timeZone: 'UTC' });
}

/**
 * Form-shell workflow: build the record from operator input, then
 * validate → save, or render / export. Save and export are independent;
 * a record with violations can still be previewed and exported.
 */
export class RecapService implements RecapUseCasePort {
  private readonly now: () => Date;

  constructor(private readonly deps: RecapServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Complete record: date defaults to today (UTC), day to the date's weekday. */
  toRecord(input: DailyRecapInput): DailyRecapRecord {
    const date = input.date == null || input.date === '' ? this.now().toISOString().slice(0, 10) : input.date;
    const day = input.day == null || input.day === '' ? weekdayOf(String(date)) : input.day;
    return buildRecord({ ...input, date, day });
  }

  preview(input: DailyRecapInput): RecapPreview {
    const record = this.toRecord(input);
    const overview = computeOverview(record);
    return {
      record,
      violations: validate(record),
      overview,
      overviewText: renderOverview(record, overview),
      recapText: renderFullRecap(record),
    };
  }

  async submit(input: DailyRecapInput): Promise<SubmitRecapResult> {
    const record = this.toRecord(input);
    const violations = validate(record);
    if (violations.length > 0) {
      return { accepted: false, violations };
    }

    const result = await this.deps.store.append(record);
    return result.warning
      ? { accepted: true, store: result.mode, warning: result.warning }
      : { accepted: true, store: result.mode };
  }

  async listRecent(limit: number): Promise<{ data: DailyRecapRecord[]; total: number }> {
    const all = await this.deps.store.readAll();
    return { data: limit > 0 ? all.slice(-limit) : [], total: all.length };
  }

  async exportRecord(kind: ExportKind, input: DailyRecapInput): Promise<RecapExportFile | null> {
    const exporter = this.deps.exporters.get(kind);
    if (!exporter) return null;

    const record = this.toRecord(input);
    const body = await exporter.export(record);
    return {
      fileName: exportFileName(record, exporter.fileExtension),
      contentType: exporter.contentType,
      body,
    };
  }

  capabilities(): ExportCapabilities {
    return this.deps.capabilities;
  }

  storeMode(): RecapStoreMode {
    return this.deps.store.getMode();
  }
}

export function exportFileName(record: DailyRecapRecord, extension: string): string {
  const stamp = String(record.date).replace(/[^A-Za-z0-9_-]/g, '_');
  return `daily_recap_${stamp}.${extension}`;
}
