import { COUNTER_FIELDS, type DailyRecapRecord } from '../entities/daily-recap.js';
import { parseCount, toInt } from './numeric-coercion.js';

/**
 * Cross-field consistency checks run before a record is persisted.
 * Every rule is evaluated; an empty list means the record is accepted.
 */
export function validate(record: DailyRecapRecord): string[] {
  return [...checkCounterInput(record), ...checkDeliveredVsTotal(record), ...checkReturnCategories(record)];
}

/** Counters that were entered but are not whole non-negative numbers. Blank means zero. */
export function checkCounterInput(record: DailyRecapRecord): string[] {
  const messages: string[] = [];
  for (const field of COUNTER_FIELDS) {
    const parsed = parseCount(record[field.key]);
    if (parsed.kind === 'unparseable') {
      messages.push(`${field.column} is not a whole number: "${parsed.raw}".`);
    } else if (parsed.kind === 'value' && parsed.value < 0) {
      messages.push(`${field.column} cannot be negative (${parsed.value}).`);
    }
  }
  return messages;
}

export function checkDeliveredVsTotal(record: DailyRecapRecord): string[] {
  const delivered = toInt(record.packagesDelivered);
  const returned = toInt(record.packagesReturned);
  const total = toInt(record.totalPackages);
  if (delivered + returned <= total) return [];
  return [
    `Packages Delivered (${delivered}) + Packages Returned (${returned}) = ${delivered + returned} ` +
      `exceeds Total Packages (${total}).`,
  ];
}

export function checkReturnCategories(record: DailyRecapRecord): string[] {
  const returned = toInt(record.packagesReturned);
  const sum =
    toInt(record.returnedUta) +
    toInt(record.returnedBc) +
    toInt(record.returnedOodt) +
    toInt(record.returnedOther);
  if (sum === returned) return [];
  return [`Return categories (UTA + BC + OODT + Other) sum to ${sum} but Packages Returned is ${returned}.`];
}
