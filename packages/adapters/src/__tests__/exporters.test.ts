/**
 * Export Adapter Tests
 *
 * CSV output is checked byte for byte; the workbook and the PDF are read
 * back with the same libraries that wrote them.
 */

import { describe, it, expect } from '@jest/globals';
import * as ExcelJS from 'exceljs';
import { PDFDocument } from 'pdf-lib';
import { parse } from 'csv-parse/sync';
import { RECAP_COLUMNS, buildRecord } from '@ops-recap/domain';

import { CsvRecapExporter } from '../exports/csv.exporter.js';
import { XlsxRecapExporter, XLSX_SHEET_NAME } from '../exports/xlsx.exporter.js';
import {
  PDF_TITLE_COLUMNS,
  PdfRecapExporter,
  pdfTitleLines,
  toWinAnsi,
  wrapLines,
} from '../exports/pdf.exporter.js';
import { createRecapExporters, detectExportCapabilities } from '../exports/capabilities.js';

const record = buildRecord({
  date: '2026-10-19',
  day: 'Monday',
  totalRoutes: 42,
  totalPackages: 9100,
  rescueDrivers: 'Ana, Bo',
  stationFeedback: 'Dock "B" slow',
});

function toArrayBuffer(body: Buffer): ArrayBuffer {
  const out = new ArrayBuffer(body.length);
  new Uint8Array(out).set(body);
  return out;
}

describe('CsvRecapExporter', () => {
  it('writes the canonical header and one data row', async () => {
    const body = await new CsvRecapExporter().export(record);
    const lines = body.toString('utf-8').split('\n');

    expect(lines[0]).toBe(RECAP_COLUMNS.join(','));
    expect(lines[1]?.startsWith('2026-10-19,Monday,42,,,,9100,,,"Ana, Bo",')).toBe(true);
    expect(lines[2]).toBe('');
  });

  it('parses back to the entered values', async () => {
    const body = await new CsvRecapExporter().export(record);
    const rows: unknown = parse(body.toString('utf-8'));
    expect(Array.isArray(rows) && rows.length).toBe(2);
    expect(Array.isArray(rows) ? rows[1][28] : null).toBe('Dock "B" slow');
  });
});

describe('XlsxRecapExporter', () => {
  it('writes one sheet with a header row and one data row', async () => {
    const body = await new XlsxRecapExporter().export(record);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(toArrayBuffer(body));
    const ws = workbook.getWorksheet(XLSX_SHEET_NAME);

    expect(workbook.worksheets).toHaveLength(1);
    expect(ws?.rowCount).toBe(2);
    expect(ws?.getRow(1).getCell(1).value).toBe('Date');
    expect(ws?.getRow(1).getCell(30).value).toBe('Route Failures');
    expect(ws?.getRow(1).getCell(1).font?.bold).toBe(true);
    expect(ws?.getRow(2).getCell(3).value).toBe(42);
    expect(ws?.getRow(2).getCell(10).value).toBe('Ana, Bo');
  });
});

describe('PdfRecapExporter', () => {
  it('produces a one-page document titled with day and date', async () => {
    const body = await new PdfRecapExporter().export(record);
    const doc = await PDFDocument.load(body);

    expect(body.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(doc.getPageCount()).toBe(1);
    expect(doc.getTitle()).toBe('Daily Operations Recap – Monday 2026-10-19');
  });

  it('continues on new pages when the recap is long', async () => {
    const long = buildRecord({ ...record, stationFeedback: 'congested '.repeat(900) });
    const doc = await PDFDocument.load(await new PdfRecapExporter().export(long));
    expect(doc.getPageCount()).toBeGreaterThan(1);
  });

  it('wraps a long title to the page width', () => {
    const day = Array.from({ length: 20 }, () => 'Sunday').join(' ');
    const lines = pdfTitleLines(buildRecord({ ...record, day }));

    expect(lines.length).toBeGreaterThan(1);
    expect(lines.every((line) => line.length <= PDF_TITLE_COLUMNS)).toBe(true);
    expect(lines.join(' ')).toBe(`Daily Operations Recap – ${day} 2026-10-19`);
  });

  it('continues a title too long for one page on the next', async () => {
    const doc = await PDFDocument.load(
      await new PdfRecapExporter().export(buildRecord({ ...record, day: 'x'.repeat(5000) })),
    );
    expect(doc.getPageCount()).toBeGreaterThan(1);
  });

  it('does not fail on characters the standard fonts cannot draw', async () => {
    const body = await new PdfRecapExporter().export(buildRecord({ ...record, coachingReasons: 'late 🚚 again' }));
    expect(body.length).toBeGreaterThan(0);
  });
});

describe('wrapLines', () => {
  it('wraps on word boundaries', () => {
    expect(wrapLines('aaa bbb ccc', 7)).toEqual(['aaa bbb', 'ccc']);
  });

  it('splits words longer than the width', () => {
    expect(wrapLines('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('keeps blank lines', () => {
    expect(wrapLines('a\n\nb', 10)).toEqual(['a', '', 'b']);
  });
});

describe('toWinAnsi', () => {
  it('keeps Latin-1 and dashes, replaces the rest', () => {
    expect(toWinAnsi('📦 dock – café\tx\r\n')).toBe('? dock – café  x\n');
  });
});

describe('detectExportCapabilities', () => {
  it('always offers CSV and probes the libraries for the rest', () => {
    const probed: string[] = [];
    const caps = detectExportCapabilities((name) => {
      probed.push(name);
      return name === 'pdf-lib';
    });

    expect(caps).toEqual({ csv: 'available', xlsx: 'unavailable', pdf: 'available' });
    expect(probed).toEqual(['exceljs', 'pdf-lib']);
  });

  it('finds the installed export libraries', () => {
    expect(detectExportCapabilities()).toEqual({ csv: 'available', xlsx: 'available', pdf: 'available' });
  });
});

describe('createRecapExporters', () => {
  it('builds exporters for available kinds only', () => {
    const exporters = createRecapExporters({ csv: 'available', xlsx: 'unavailable', pdf: 'available' });
    expect([...exporters.keys()]).toEqual(['csv', 'pdf']);
    expect(exporters.get('pdf')?.contentType).toBe('application/pdf');
  });
});
