import type { DailyRecapRecord } from '../entities/daily-recap.js';
import { toInt } from './numeric-coercion.js';
import { percentage } from './ratio.js';

export interface ReturnCategoryPct {
  readonly uta: number;
  readonly bc: number;
  readonly oodt: number;
  readonly other: number;
}

export interface ViolationCategoryPct {
  readonly seatbelt: number;
  readonly speeding: number;
  readonly hardBraking: number;
}

export interface OverviewMetrics {
  readonly totalPackages: number;
  readonly delivered: number;
  readonly returned: number;
  readonly violations: number;
  readonly deliveryRatePct: number;
  readonly returnRatePct: number;
  readonly returnCategoryPct: ReturnCategoryPct;
  readonly violationCategoryPct: ViolationCategoryPct;
}

/**
 * Derive the overview percentages for one record.
 *
 * Category shares divide by `max(total, 1)` rather than leaning on the
 * zero-denominator rule in `percentage`. Values are not clamped: a category
 * count above its total shows up as more than 100%.
 */
export function computeOverview(record: DailyRecapRecord): OverviewMetrics {
  const totalPackages = toInt(record.totalPackages);
  const delivered = toInt(record.packagesDelivered);
  const returned = toInt(record.packagesReturned);
  const violations = toInt(record.violations);

  const returnBase = Math.max(returned, 1);
  const violationBase = Math.max(violations, 1);

  return {
    totalPackages,
    delivered,
    returned,
    violations,
    deliveryRatePct: percentage(delivered, totalPackages),
    returnRatePct: percentage(returned, totalPackages),
    returnCategoryPct: {
      uta: percentage(record.returnedUta, returnBase),
      bc: percentage(record.returnedBc, returnBase),
      oodt: percentage(record.returnedOodt, returnBase),
      other: percentage(record.returnedOther, returnBase),
    },
    violationCategoryPct: {
      seatbelt: percentage(record.seatbelt, violationBase),
      speeding: percentage(record.speeding, violationBase),
      hardBraking: percentage(record.hardBraking, violationBase),
    },
  };
}
