// ============================================================================
// Schema Validator — raw rows → TimeSeriesStore + validation report
// ============================================================================
import type {
  RawCell, RawRow, RawTable, RejectionReason, RequiredFieldSpec, RowRejection, SampleValue, TelemetryRecord, ValidationReport,
} from '@missionreplay/shared';
import { SchemaError } from '../errors.js';
import { SubsystemRegistry } from '../subsystems/registry.js';
import { TimeSeriesStore } from '../store/time-series.js';
import { parseNumericCell, toSampleValue } from '../telemetry/values.js';

export const DEFAULT_REQUIRED_FIELDS: RequiredFieldSpec = {
  timestamp: 'Timestamp',
  latitude: 'POS_Latitude_deg',
  longitude: 'POS_Longitude_deg',
  altitude: 'POS_Altitude_ft',
};

export const EMPTY_DATASET_WARNING = 'EmptyDatasetWarning: no rows survived validation; the mission has zero length';

export interface ValidationOptions {
  requiredFields?: RequiredFieldSpec;
  maxRejectionsReported?: number;
}

export interface ValidationResult {
  store: TimeSeriesStore;
  registry: SubsystemRegistry;
  report: ValidationReport;
}

// ISO 8601 date or date-time with an optional offset. No zone designator means UTC.
const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;
const OFFSET = /^([+-])(\d{2}):?(\d{2})$/;

function offsetMinutes(zone: string): number | null {
  if (zone.toUpperCase() === 'Z') return 0;
  const m = OFFSET.exec(zone);
  if (!m) return null;
  const hours = Number(m[2]);
  const minutes = Number(m[3]);
  if (hours > 23 || minutes > 59) return null;
  return (m[1] === '-' ? -1 : 1) * (hours * 60 + minutes);
}

/**
 * Epoch ms for a timestamp cell, or null. Text must be ISO 8601; a number
 * cell is already epoch ms. The host time zone never takes part.
 */
export function parseTimestamp(cell: RawCell): number | null {
  if (cell === null || cell === undefined) return null;
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null;
  const m = ISO_TIMESTAMP.exec(cell.trim());
  if (!m) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac = '', zone = 'Z'] = m;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  const offset = offsetMinutes(zone);
  if (offset === null) return null;

  const millis = Number(frac.slice(1, 4).padEnd(3, '0'));
  const utc = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  // Date.UTC rolls 2024-02-30 over into March.
  if (new Date(utc).getUTCDate() !== day) return null;
  return utc - offset * 60_000;
}

function cellText(cell: RawCell): string {
  return cell === null || cell === undefined ? '' : String(cell);
}

interface Candidate {
  row: number;
  record: TelemetryRecord;
  redacted: string[];
  coerced: number;
}

type RowOutcome =
  | { ok: true; candidate: Candidate }
  | { ok: false; rejection: RowRejection };

const COORDINATE_LIMITS: Record<'latitude' | 'longitude', number> = { latitude: 90, longitude: 180 };

function reject(row: number, reason: RejectionReason, column: string, cell: RawCell): RowOutcome {
  return { ok: false, rejection: { row, reason, column, value: cellText(cell) } };
}

function validateRow(
  raw: Record<string, RawCell>,
  row: number,
  req: RequiredFieldSpec,
  optional: string[],
): RowOutcome {
  const timestamp = parseTimestamp(raw[req.timestamp]);
  if (timestamp === null) return reject(row, 'invalid_timestamp', req.timestamp, raw[req.timestamp]);

  const coords = { latitude: 0, longitude: 0, altitude: 0 };
  for (const key of ['latitude', 'longitude', 'altitude'] as const) {
    const column = req[key];
    const parsed = parseNumericCell(raw[column]);
    if (parsed.status !== 'number') return reject(row, 'invalid_coordinate', column, raw[column]);
    if (key !== 'altitude' && Math.abs(parsed.value) > COORDINATE_LIMITS[key]) {
      return reject(row, 'out_of_range', column, raw[column]);
    }
    coords[key] = parsed.value;
  }

  const fields: Record<string, SampleValue> = {};
  const redacted: string[] = [];
  let coerced = 0;
  for (const column of optional) {
    const parsed = parseNumericCell(raw[column]);
    if (parsed.status === 'invalid') coerced++;
    if (parsed.status !== 'number') redacted.push(column);
    fields[column] = toSampleValue(parsed);
  }

  return {
    ok: true,
    candidate: {
      row,
      redacted,
      coerced,
      record: {
        timestamp,
        latitudeDeg: coords.latitude,
        longitudeDeg: coords.longitude,
        altitudeFt: coords.altitude,
        fields,
      },
    },
  };
}

/**
 * Validates a whole table in one pass. Column-level problems throw
 * SchemaError before anything is built; row-level problems are recorded in
 * the report and never abort.
 */
export function validateTable(table: RawTable, options: ValidationOptions = {}): ValidationResult {
  const req = options.requiredFields ?? DEFAULT_REQUIRED_FIELDS;
  const maxRejections = options.maxRejectionsReported ?? 100;

  const seen = new Set<string>();
  for (const column of table.columns) {
    if (seen.has(column)) throw new SchemaError('duplicate_column', column);
    seen.add(column);
  }
  for (const column of [req.timestamp, req.latitude, req.longitude, req.altitude]) {
    if (!seen.has(column)) throw new SchemaError('missing_required_field', column);
  }

  const requiredSet = new Set(Object.values(req));
  const optional = table.columns.filter(c => !requiredSet.has(c));

  const rejections: RowRejection[] = [];
  let rejectedRows = 0;
  const noteRejection = (r: RowRejection) => {
    rejectedRows++;
    if (rejections.length < maxRejections) rejections.push(r);
  };

  const accepted: Candidate[] = [];
  const byTimestamp = new Set<number>();
  let duplicateTimestamps = 0;

  table.rows.forEach((raw, i) => {
    const outcome = validateRow(raw, i + 1, req, optional);
    if (!outcome.ok) {
      noteRejection(outcome.rejection);
      return;
    }
    const { candidate } = outcome;
    if (byTimestamp.has(candidate.record.timestamp)) {
      duplicateTimestamps++;
      noteRejection({
        row: candidate.row,
        reason: 'duplicate_timestamp',
        column: req.timestamp,
        value: cellText(raw[req.timestamp]),
      });
      return;
    }
    byTimestamp.add(candidate.record.timestamp);
    accepted.push(candidate);
  });

  // Array.prototype.sort is stable, and timestamps are unique by now.
  accepted.sort((a, b) => a.record.timestamp - b.record.timestamp);

  const redactedFields = new Set<string>();
  let redactedCellCount = 0;
  let coercedCellCount = 0;
  for (const c of accepted) {
    redactedCellCount += c.redacted.length;
    coercedCellCount += c.coerced;
    for (const f of c.redacted) redactedFields.add(f);
  }

  const store = new TimeSeriesStore(accepted.map(c => c.record), optional, req);
  const registry = new SubsystemRegistry(optional);

  const warnings: string[] = [];
  if (rejectedRows > 0) warnings.push(`Rejected ${rejectedRows} of ${table.rows.length} rows`);
  if (duplicateTimestamps > 0) warnings.push(`Dropped ${duplicateTimestamps} rows with duplicate timestamps (first occurrence kept)`);
  if (coercedCellCount > 0) warnings.push(`Replaced ${coercedCellCount} non-numeric cells with the redacted marker`);
  if (store.length === 0) warnings.push(EMPTY_DATASET_WARNING);

  const report: ValidationReport = {
    status: store.length === 0 ? 'empty' : 'success',
    totalRows: table.rows.length,
    acceptedRows: store.length,
    rejectedRows,
    redactedCellCount,
    coercedCellCount,
    duplicateTimestamps,
    detectedSubsystems: registry.groups().map(d => d.id),
    detectedPayloads: registry.payloads().map(d => d.id),
    detectedLinks: registry.links().map(d => d.linkId),
    redactedFields: [...redactedFields].sort(),
    rejections,
    warnings,
    timeRange: store.timeRange(),
  };

  return { store, registry, report };
}

/** Rows without a header: the columns are every key seen, in first-seen order. */
export function validateRows(rows: RawRow[], options: ValidationOptions = {}): ValidationResult {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) { seen.add(key); columns.push(key); }
    }
  }
  return validateTable({ columns, rows }, options);
}
