import { readFileSync } from 'fs';
import { resolve } from 'path';
import type { DailyRecapRecord, RecapRepositoryPort } from '@ops-recap/domain';
import { recordFromColumns, recordToColumns } from '@ops-recap/domain';
import { poolClient, type SqlClient } from './pool.js';

export class PgRecapRepository implements RecapRepositoryPort {
  constructor(private readonly db: SqlClient = poolClient()) {}

  async append(record: DailyRecapRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO ops_recap.daily_recaps (recap_date, payload)
       VALUES ($1, $2::jsonb)`,
      [String(record.date), JSON.stringify(recordToColumns(record))],
    );
  }

  async readAll(): Promise<DailyRecapRecord[]> {
    const { rows } = await this.db.query(
      `SELECT payload FROM ops_recap.daily_recaps ORDER BY id ASC`,
    );
    return rows.map(mapRecapRow);
  }
}

function mapRecapRow(row: Record<string, unknown>): DailyRecapRecord {
  const payload = row['payload'];
  if (typeof payload === 'string') return recordFromColumns(parsePayload(payload));
  if (payload && typeof payload === 'object') return recordFromColumns({ ...payload });
  return recordFromColumns({});
}

function parsePayload(text: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(text);
  return parsed && typeof parsed === 'object' ? { ...parsed } : {};
}

/**
 * Run db/postgres/schema.sql against the database. Every statement is
 * IF NOT EXISTS, so this is safe on each startup.
 */
export async function applyRecapSchema(db: SqlClient = poolClient()): Promise<number> {
  let schemaContent: string;
  try {
    schemaContent = readFileSync(resolve(__dirname, '../../../../db/postgres/schema.sql'), 'utf-8');
  } catch {
    // dist layout
    schemaContent = readFileSync(resolve(process.cwd(), 'db/postgres/schema.sql'), 'utf-8');
  }

  const statements = schemaContent
    .split(';')
    .map((s) => s.replace(/--.*$/gm, '').trim())
    .filter((s) => s.length > 0);

  for (const stmt of statements) {
    await db.query(stmt);
  }
  return statements.length;
}
