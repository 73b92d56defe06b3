import { appendFile, mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { DailyRecapRecord, RecapRepositoryPort } from '@ops-recap/domain';
import { RECAP_COLUMNS, recordFromColumns, recordToRow } from '@ops-recap/domain';

/**
 * Local tabular file store. The first line is the canonical header; each
 * append adds one line. Appends are queued so concurrent requests never
 * interleave writes to the file.
 */
export class CsvRecapRepository implements RecapRepositoryPort {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  append(record: DailyRecapRecord): Promise<void> {
    const next = this.queue.then(() => this.writeRecord(record));
    // keep the queue alive after a failed write; the caller still sees the error
    this.queue = next.catch((err: unknown) => {
      console.error('[csv-store] append failed', err instanceof Error ? err.message : err);
    });
    return next;
  }

  async readAll(): Promise<DailyRecapRecord[]> {
    await this.queue;
    const content = await this.readContent();
    if (content === null || content.trim().length === 0) return [];
    return parseRows(content).map(recordFromColumns);
  }

  private async writeRecord(record: DailyRecapRecord): Promise<void> {
    const content = await this.readContent();
    const row = stringify([recordToRow(record)]);

    if (content === null || content.trim().length === 0) {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, stringify([[...RECAP_COLUMNS]]) + row, 'utf-8');
      return;
    }

    if (hasCanonicalHeader(content)) {
      // a file saved without a trailing newline would glue the row onto the last one
      await appendFile(this.filePath, content.endsWith('\n') ? row : `\n${row}`, 'utf-8');
      return;
    }

    // Written under an older column set: rewrite normalised, then add the row.
    const existing = parseRows(content).map((r) => recordToRow(recordFromColumns(r)));
    await writeFile(this.filePath, stringify([[...RECAP_COLUMNS], ...existing]) + row, 'utf-8');
  }

  private async readContent(): Promise<string | null> {
    try {
      return await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }
}

function parseRows(content: string): Record<string, unknown>[] {
  const parsed: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    relax_column_count: true,
    bom: true,
  });
  if (!Array.isArray(parsed)) return [];
  return parsed.filter(isRow);
}

function hasCanonicalHeader(content: string): boolean {
  const header: unknown = parse(content, { to_line: 1, bom: true });
  if (!Array.isArray(header) || !Array.isArray(header[0])) return false;
  const columns: unknown[] = header[0];
  return (
    columns.length === RECAP_COLUMNS.length &&
    columns.every((column, idx) => column === RECAP_COLUMNS[idx])
  );
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// fs errors can come from another realm (Jest), so check the shape, not the class
function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
