import type { DailyRecapRecord, RecapExporterPort } from '@ops-recap/domain';
import { RECAP_COLUMNS, recordToRow } from '@ops-recap/domain';

export const XLSX_SHEET_NAME = 'Daily Recap';

/**
 * One-sheet workbook: bold header row and one data row.
 * exceljs is an optional dependency and is only loaded when an export runs.
 */
export class XlsxRecapExporter implements RecapExporterPort {
  readonly kind = 'xlsx';
  readonly fileExtension = 'xlsx';
  readonly contentType = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

  async export(record: DailyRecapRecord): Promise<Buffer> {
    const ExcelJS: typeof import('exceljs') = require('exceljs');

    const workbook = new ExcelJS.Workbook();
    workbook.created = new Date();
    const ws = workbook.addWorksheet(XLSX_SHEET_NAME);

    ws.columns = RECAP_COLUMNS.map((column) => ({ width: Math.max(10, column.length + 2) }));

    const headerRow = ws.addRow([...RECAP_COLUMNS]);
    headerRow.font = { bold: true };
    ws.addRow(recordToRow(record));

    const data = await workbook.xlsx.writeBuffer();
    return Buffer.from(data);
  }
}
