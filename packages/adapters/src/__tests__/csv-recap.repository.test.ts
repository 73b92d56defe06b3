/**
 * Local CSV Store Tests
 *
 * Each test works in its own temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { RECAP_COLUMNS, RECAP_FIELD_KEYS, buildRecord } from '@ops-recap/domain';

import { CsvRecapRepository } from '../csv/csv-recap.repository.js';

let dir: string;
let filePath: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'ops-recap-'));
  filePath = join(dir, 'nested', 'daily_recap.csv');
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('CsvRecapRepository', () => {
  it('reads an empty table when the file does not exist', async () => {
    const repo = new CsvRecapRepository(filePath);
    await expect(repo.readAll()).resolves.toEqual([]);
  });

  it('writes the canonical header once, then one line per append', async () => {
    const repo = new CsvRecapRepository(filePath);
    await repo.append(buildRecord({ date: '2026-10-19', totalRoutes: 40 }));
    await repo.append(buildRecord({ date: '2026-10-20', totalRoutes: 41 }));

    const lines = (await readFile(filePath, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(RECAP_COLUMNS.join(','));
  });

  it('round-trips N records in append order with canonical fields', async () => {
    const repo = new CsvRecapRepository(filePath);
    for (const n of [1, 2, 3]) {
      await repo.append(buildRecord({ date: `2026-10-0${n}`, totalPackages: n * 100 }));
    }

    const all = await repo.readAll();
    expect(all.map((r) => r.date)).toEqual(['2026-10-01', '2026-10-02', '2026-10-03']);
    expect(all.map((r) => r.totalPackages)).toEqual(['100', '200', '300']);
    for (const record of all) {
      expect(Object.keys(record)).toEqual([...RECAP_FIELD_KEYS]);
    }
  });

  it('keeps free text with commas, quotes and line breaks intact', async () => {
    const repo = new CsvRecapRepository(filePath);
    const feedback = 'Dock 3, "late" trucks\nsecond line';
    await repo.append(buildRecord({ stationFeedback: feedback, rescueDrivers: 'Ana, Bo' }));

    const [record] = await repo.readAll();
    expect(record?.stationFeedback).toBe(feedback);
    expect(record?.rescueDrivers).toBe('Ana, Bo');
  });

  it('serialises concurrent appends', async () => {
    const repo = new CsvRecapRepository(filePath);
    await Promise.all(
      Array.from({ length: 10 }, (_, i) => repo.append(buildRecord({ totalRoutes: i }))),
    );

    const all = await repo.readAll();
    expect(all).toHaveLength(10);
    expect(all.map((r) => r.totalRoutes)).toEqual(['0', '1', '2', '3', '4', '5', '6', '7', '8', '9']);
  });

  it('normalises a file written with an older column set', async () => {
    const legacyPath = join(dir, 'legacy.csv');
    await writeFile(legacyPath, 'Date,Total Routes,Retired Column\n2026-09-30,38,x\n', 'utf-8');
    const repo = new CsvRecapRepository(legacyPath);

    const before = await repo.readAll();
    expect(before).toHaveLength(1);
    expect(before[0]?.totalRoutes).toBe('38');
    expect(before[0]?.day).toBe('');

    await repo.append(buildRecord({ date: '2026-10-01', day: 'Thursday' }));

    const lines = (await readFile(legacyPath, 'utf-8')).trimEnd().split('\n');
    expect(lines[0]).toBe(RECAP_COLUMNS.join(','));
    const after = await repo.readAll();
    expect(after.map((r) => r.date)).toEqual(['2026-09-30', '2026-10-01']);
    expect(after[1]?.day).toBe('Thursday');
  });

  it('starts a new line when the file lacks a trailing newline', async () => {
    const editedPath = join(dir, 'edited.csv');
    const lastRow = RECAP_FIELD_KEYS.map((key) =>
      key === 'date' ? '2026-10-18' : key === 'routeFailures' ? '1' : '',
    ).join(',');
    await writeFile(editedPath, `${RECAP_COLUMNS.join(',')}\n${lastRow}`, 'utf-8');
    const repo = new CsvRecapRepository(editedPath);

    await repo.append(buildRecord({ date: '2026-10-19', day: 'Monday' }));

    const rows = await repo.readAll();
    expect(rows.map((r) => r.date)).toEqual(['2026-10-18', '2026-10-19']);
    expect(rows[0]?.routeFailures).toBe('1');
    expect(rows[1]?.day).toBe('Monday');
  });
});
