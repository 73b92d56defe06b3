import { stringify } from 'csv-stringify/sync';
import type { DailyRecapRecord, RecapExporterPort } from '@ops-recap/domain';
import { RECAP_COLUMNS, recordToRow } from '@ops-recap/domain';

/** Header row plus one data row, UTF-8. */
export class CsvRecapExporter implements RecapExporterPort {
  readonly kind = 'csv';
  readonly fileExtension = 'csv';
  readonly contentType = 'text/csv; charset=utf-8';

  async export(record: DailyRecapRecord): Promise<Buffer> {
    return Buffer.from(stringify([[...RECAP_COLUMNS], recordToRow(record)]), 'utf-8');
  }
}
