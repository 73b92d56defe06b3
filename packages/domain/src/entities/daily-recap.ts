// ─── Field schema ─────────────────────────────────────────────────────────────
// Canonical, ordered field list. Storage columns, export headers and the full
// recap all derive from this table; order here is the persisted column order.

export type RecapFieldKind = 'date' | 'counter' | 'text';

export type RecapSection =
  | 'general'
  | 'volume'
  | 'driver'
  | 'safety'
  | 'labor'
  | 'fleet'
  | 'escalations';

export const RECAP_SECTION_TITLES: Readonly<Record<RecapSection, string>> = {
  general: 'General',
  volume: 'Volume & Routes',
  driver: 'Driver Performance',
  safety: 'Safety & Compliance',
  labor: 'Labor & Cost Metrics',
  fleet: 'Fleet & Vehicle Health',
  escalations: 'Escalations & Issues',
};

export const RECAP_FIELDS = [
  { key: 'date', column: 'Date', label: 'Date', kind: 'date', section: 'general' },
  { key: 'day', column: 'Day', label: 'Day', kind: 'date', section: 'general' },

  { key: 'totalRoutes', column: 'Total Routes', label: 'Total Routes', kind: 'counter', section: 'volume' },
  { key: 'amzlLateCancels', column: 'AMZL Late Cancels', label: 'AMZL Late Cancels', kind: 'counter', section: 'volume' },
  { key: 'additionalRoutes', column: 'Additional Routes Picked Up', label: 'Additional Routes Picked Up', kind: 'counter', section: 'volume' },
  { key: 'totalTrainings', column: 'Total Trainings', label: 'Total Trainings (names/dayX)', kind: 'text', section: 'volume' },
  { key: 'totalPackages', column: 'Total Packages', label: 'Total Packages', kind: 'counter', section: 'volume' },

  { key: 'packagesDelivered', column: 'Packages Delivered', label: 'Packages Delivered', kind: 'counter', section: 'driver' },
  { key: 'rescuesCompleted', column: 'Rescues Completed', label: 'Rescues Completed', kind: 'counter', section: 'driver' },
  { key: 'rescueDrivers', column: 'Rescue Drivers', label: 'Rescue Drivers', kind: 'text', section: 'driver' },
  { key: 'packagesReturned', column: 'Packages Returned', label: 'Packages Returned (Total)', kind: 'counter', section: 'driver' },
  { key: 'returnedUta', column: 'UTA', label: 'Returned – UTA', kind: 'counter', section: 'driver' },
  { key: 'returnedBc', column: 'BC', label: 'Returned – BC', kind: 'counter', section: 'driver' },
  { key: 'returnedOodt', column: 'OODT', label: 'Returned – OODT', kind: 'counter', section: 'driver' },
  { key: 'returnedOther', column: 'Other', label: 'Returned – Other', kind: 'counter', section: 'driver' },

  { key: 'violations', column: 'Violations', label: 'Violations (Total)', kind: 'counter', section: 'safety' },
  { key: 'seatbelt', column: 'Seatbelt', label: 'Seatbelt', kind: 'counter', section: 'safety' },
  { key: 'speeding', column: 'Speeding', label: 'Speeding', kind: 'counter', section: 'safety' },
  { key: 'hardBraking', column: 'Hard Braking', label: 'Hard Braking', kind: 'counter', section: 'safety' },
  { key: 'injuries', column: 'Injuries', label: 'Injuries', kind: 'counter', section: 'safety' },
  { key: 'driversNeedingCoaching', column: 'Drivers Needing Coaching', label: 'Drivers Needing Coaching', kind: 'text', section: 'safety' },
  { key: 'coachingReasons', column: 'Coaching Reasons', label: 'Coaching Reasons', kind: 'text', section: 'safety' },

  { key: 'dasExceeding4Days', column: 'DAs Exceeding 4 Days', label: 'DAs Exceeding 4 Days', kind: 'text', section: 'labor' },
  { key: 'adpVsPaidHours', column: 'ADP vs Paid Hours', label: 'ADP vs. Paid Hours Discrepancies (>10h)', kind: 'text', section: 'labor' },

  { key: 'groundedVehicles', column: 'Grounded Vehicles', label: 'Grounded Vehicles', kind: 'text', section: 'fleet' },
  { key: 'groundedReasons', column: 'Grounded Reasons', label: 'Grounded Reasons', kind: 'text', section: 'fleet' },
  { key: 'damages', column: 'Damages', label: 'Damages', kind: 'counter', section: 'fleet' },

  { key: 'customerComplaints', column: 'Customer Complaints', label: 'Customer Complaints', kind: 'counter', section: 'escalations' },
  { key: 'stationFeedback', column: 'Amazon Station Feedback', label: 'Amazon Station Feedback', kind: 'text', section: 'escalations' },
  { key: 'routeFailures', column: 'Route Failures', label: 'Route Failures', kind: 'counter', section: 'escalations' },
] as const satisfies readonly RecapFieldDefinition[];

export interface RecapFieldDefinition {
  readonly key: string;
  readonly column: string;
  readonly label: string;
  readonly kind: RecapFieldKind;
  readonly section: RecapSection;
}

export type RecapField = (typeof RECAP_FIELDS)[number];

export type RecapFieldKey = RecapField['key'];

export type CounterField = Extract<RecapField, { kind: 'counter' }>;

export type CounterFieldKey = CounterField['key'];

/** Raw entered value: numbers from numeric inputs, strings from text inputs or files. */
export type RecapValue = string | number;

/** One day's operations data. Every canonical field is present. */
export type DailyRecapRecord = Readonly<Record<RecapFieldKey, RecapValue>>;

export type DailyRecapInput = Partial<Record<RecapFieldKey, RecapValue | null | undefined>>;

export const RECAP_FIELD_KEYS: readonly RecapFieldKey[] = RECAP_FIELDS.map((f) => f.key);

export const RECAP_COLUMNS: readonly string[] = RECAP_FIELDS.map((f) => f.column);

export const COUNTER_FIELDS: readonly CounterField[] = RECAP_FIELDS.filter(
  (f): f is CounterField => f.kind === 'counter',
);

export function isRecapFieldKey(value: string): value is RecapFieldKey {
  return RECAP_FIELD_KEYS.some((key) => key === value);
}

const EMPTY_RECORD: DailyRecapRecord = {
  date: '',
  day: '',
  totalRoutes: '',
  amzlLateCancels: '',
  additionalRoutes: '',
  totalTrainings: '',
  totalPackages: '',
  packagesDelivered: '',
  rescuesCompleted: '',
  rescueDrivers: '',
  packagesReturned: '',
  returnedUta: '',
  returnedBc: '',
  returnedOodt: '',
  returnedOther: '',
  violations: '',
  seatbelt: '',
  speeding: '',
  hardBraking: '',
  injuries: '',
  driversNeedingCoaching: '',
  coachingReasons: '',
  dasExceeding4Days: '',
  adpVsPaidHours: '',
  groundedVehicles: '',
  groundedReasons: '',
  damages: '',
  customerComplaints: '',
  stationFeedback: '',
  routeFailures: '',
};

/** Build a record with every field present, in canonical order, unset fields as ''. */
export function buildRecord(input: DailyRecapInput = {}): DailyRecapRecord {
  const record: Record<RecapFieldKey, RecapValue> = { ...EMPTY_RECORD };
  for (const key of RECAP_FIELD_KEYS) {
    record[key] = input[key] ?? '';
  }
  return record;
}

/**
 * Map a row keyed by column header (CSV file, spreadsheet row) to a record.
 * Columns outside the schema are ignored; missing ones become ''.
 */
export function recordFromColumns(row: Readonly<Record<string, unknown>>): DailyRecapRecord {
  const input: DailyRecapInput = {};
  for (const field of RECAP_FIELDS) {
    const value = row[field.column];
    if (typeof value === 'string' || typeof value === 'number') input[field.key] = value;
  }
  return buildRecord(input);
}

/** Values in canonical column order, for tabular writers. */
export function recordToRow(record: DailyRecapRecord): RecapValue[] {
  return RECAP_FIELD_KEYS.map((key) => record[key]);
}

/** Record keyed by column header, as stored in tabular backends. */
export function recordToColumns(record: DailyRecapRecord): Record<string, RecapValue> {
  const row: Record<string, RecapValue> = {};
  for (const field of RECAP_FIELDS) row[field.column] = record[field.key];
  return row;
}
