// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, poolClient } from './postgres/pool.js';
export type { DbPool, SqlClient } from './postgres/pool.js';
export { PgRecapRepository, applyRecapSchema } from './postgres/recap.repository.js';

// ─── Local File Adapter ───────────────────────────────────────────────────────
export { CsvRecapRepository } from './csv/csv-recap.repository.js';

// ─── Record Store ─────────────────────────────────────────────────────────────
export { FallbackRecapStore } from './store/fallback-recap.store.js';

// ─── Exporters ────────────────────────────────────────────────────────────────
export { CsvRecapExporter } from './exports/csv.exporter.js';
export { XlsxRecapExporter, XLSX_SHEET_NAME } from './exports/xlsx.exporter.js';
export {
  PdfRecapExporter,
  PDF_WRAP_COLUMNS,
  PDF_TITLE_COLUMNS,
  pdfTitleLines,
  wrapLines,
  toWinAnsi,
} from './exports/pdf.exporter.js';
export {
  detectExportCapabilities,
  createRecapExporters,
  resolveModule,
  EXPORT_LIBRARIES,
} from './exports/capabilities.js';
export type { ModuleProbe } from './exports/capabilities.js';
