import {
  RECAP_FIELDS,
  RECAP_SECTION_TITLES,
  type DailyRecapRecord,
  type RecapField,
  type RecapSection,
} from '../entities/daily-recap.js';
import { computeOverview, type OverviewMetrics } from './metrics-engine.js';

const countFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export function formatPct(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatCount(value: number): string {
  return countFormat.format(value);
}

/** "{day} {date}", skipping whichever is blank. */
export function recapHeading(record: DailyRecapRecord): string {
  return [record.day, record.date]
    .map((part) => String(part))
    .filter((part) => part.trim().length > 0)
    .join(' ');
}

export function recapTitle(record: DailyRecapRecord): string {
  return `Daily Operations Recap – ${recapHeading(record)}`;
}

// ─── Overview ─────────────────────────────────────────────────────────────────

export function renderOverview(
  record: DailyRecapRecord,
  metrics: OverviewMetrics = computeOverview(record),
): string {
  const r = metrics.returnCategoryPct;
  const v = metrics.violationCategoryPct;

  return [
    `Daily Overview – ${recapHeading(record)}`,
    `Delivery rate: ${formatPct(metrics.deliveryRatePct)} ` +
      `(${formatCount(metrics.delivered)} of ${formatCount(metrics.totalPackages)} delivered)` +
      ` · Return rate: ${formatPct(metrics.returnRatePct)} (${formatCount(metrics.returned)} returned)`,
    `Returns – UTA ${formatPct(r.uta)} · BC ${formatPct(r.bc)} · OODT ${formatPct(r.oodt)} · Other ${formatPct(r.other)}`,
    `Violations (${formatCount(metrics.violations)}) – Seatbelt ${formatPct(v.seatbelt)}` +
      ` · Speeding ${formatPct(v.speeding)} · Hard Braking ${formatPct(v.hardBraking)}`,
  ].join('\n');
}

// ─── Full recap ───────────────────────────────────────────────────────────────

interface RecapSectionBlock {
  readonly section: RecapSection;
  readonly fields: RecapField[];
}

/** Fields grouped by section in canonical order. Date/day go in the title instead. */
export function recapSections(): RecapSectionBlock[] {
  const blocks: RecapSectionBlock[] = [];
  for (const field of RECAP_FIELDS) {
    if (field.section === 'general') continue;
    const last = blocks[blocks.length - 1];
    if (last && last.section === field.section) {
      last.fields.push(field);
    } else {
      blocks.push({ section: field.section, fields: [field] });
    }
  }
  return blocks;
}

/**
 * Field-by-field projection of a record under its section headings.
 * Values are inserted as entered: no escaping, no truncation.
 */
export function renderFullRecap(record: DailyRecapRecord): string {
  const lines: string[] = [recapTitle(record)];
  for (const block of recapSections()) {
    lines.push('', RECAP_SECTION_TITLES[block.section]);
    for (const field of block.fields) {
      lines.push(`- ${field.label}: ${String(record[field.key])}`);
    }
  }
  return lines.join('\n');
}
