import type { DailyRecapRecord, RecapExporterPort } from '@ops-recap/domain';
import { recapTitle, renderFullRecap } from '@ops-recap/domain';

export const PDF_WRAP_COLUMNS = 90;
// Courier is 0.6em wide: 64 columns at the title size fill the text width
export const PDF_TITLE_COLUMNS = 64;

// US Letter, points
const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = 50;
const TITLE_SIZE = 13;
const BODY_SIZE = 9;
const LINE_HEIGHT = 12;

// Characters outside ASCII/Latin-1 that the standard fonts' WinAnsi encoding still has.
const WIN_ANSI_EXTRAS = new Set(['–', '—', '‘', '’', '‚', '“', '”', '„', '•', '…', '€', '™', '†', '‡', '‰']);

/**
 * Printable recap: title line, then the full recap wrapped at a fixed
 * column width, continuing on a new page when the current one is full.
 * pdf-lib is an optional dependency and is only loaded when an export runs.
 */
export class PdfRecapExporter implements RecapExporterPort {
  readonly kind = 'pdf';
  readonly fileExtension = 'pdf';
  readonly contentType = 'application/pdf';

  async export(record: DailyRecapRecord): Promise<Buffer> {
    const pdfLib: typeof import('pdf-lib') = require('pdf-lib');
    const { PDFDocument, StandardFonts } = pdfLib;

    const title = toWinAnsi(recapTitle(record));
    const doc = await PDFDocument.create();
    doc.setTitle(title);
    doc.setCreator('ops-recap');

    const titleFont = await doc.embedFont(StandardFonts.CourierBold);
    const bodyFont = await doc.embedFont(StandardFonts.Courier);

    let page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    let y = PAGE_HEIGHT - MARGIN;

    const drawLine = (line: string, size: number, font: typeof bodyFont, lineHeight: number) => {
      if (y < MARGIN) {
        page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
        y = PAGE_HEIGHT - MARGIN;
      }
      if (line.length > 0) page.drawText(line, { x: MARGIN, y, size, font });
      y -= lineHeight;
    };

    for (const line of pdfTitleLines(record)) {
      drawLine(line, TITLE_SIZE, titleFont, TITLE_SIZE + 3);
    }
    y -= LINE_HEIGHT;

    // the recap's own first line repeats the title
    const body = renderFullRecap(record).split('\n').slice(1).join('\n');
    for (const line of wrapLines(toWinAnsi(body), PDF_WRAP_COLUMNS)) {
      drawLine(line, BODY_SIZE, bodyFont, LINE_HEIGHT);
    }

    return Buffer.from(await doc.save());
  }
}

/** Title as drawn: encodable characters only, wrapped to the page width. */
export function pdfTitleLines(record: DailyRecapRecord): string[] {
  return wrapLines(toWinAnsi(recapTitle(record)), PDF_TITLE_COLUMNS);
}

/**
 * Greedy word wrap. Words longer than `width` are split; existing line
 * breaks are kept.
 */
export function wrapLines(text: string, width: number): string[] {
  const out: string[] = [];
  for (const rawLine of text.split('\n')) {
    const words = rawLine.split(' ');
    let current = '';
    for (let word of words) {
      while (word.length > width) {
        if (current.length > 0) {
          out.push(current);
          current = '';
        }
        out.push(word.slice(0, width));
        word = word.slice(width);
      }
      if (current.length === 0) {
        current = word;
      } else if (current.length + 1 + word.length <= width) {
        current = `${current} ${word}`;
      } else {
        out.push(current);
        current = word;
      }
    }
    out.push(current);
  }
  return out;
}

/** Replace characters the standard PDF fonts cannot encode. Tabs become two spaces. */
export function toWinAnsi(text: string): string {
  let out = '';
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === '\r') continue;
    if (ch === '\n') out += ch;
    else if (ch === '\t') out += '  ';
    else if ((code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff) || WIN_ANSI_EXTRAS.has(ch)) out += ch;
    else out += '?';
  }
  return out;
}
