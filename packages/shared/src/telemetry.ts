// ============================================================================
// Mission Replay Telemetry Types
// ============================================================================

/** A subsystem sample: either a real measurement or the "no data" marker. */
export type SampleValue =
  | { kind: 'measured'; value: number }
  | { kind: 'redacted' };

export interface TelemetryRecord {
  timestamp: number; // epoch ms
  latitudeDeg: number;
  longitudeDeg: number;
  altitudeFt: number;
  fields: Readonly<Record<string, SampleValue>>;
}

export interface SeriesPoint {
  timestamp: number;
  value: SampleValue;
}

export interface TimeRange {
  start: number;
  end: number;
}

export type RawCell = string | number | null | undefined;
export type RawRow = Record<string, RawCell>;

export interface RawTable {
  columns: string[];
  rows: RawRow[];
}

/** Column names of the four fields every record must carry. */
export interface RequiredFieldSpec {
  timestamp: string;
  latitude: string;
  longitude: string;
  altitude: string;
}

export type RejectionReason =
  | 'invalid_timestamp'
  | 'invalid_coordinate'
  | 'out_of_range'
  | 'duplicate_timestamp';

export interface RowRejection {
  row: number; // 1-based data row, header excluded
  reason: RejectionReason;
  column?: string;
  value?: string;
}

export interface ValidationReport {
  status: 'success' | 'empty';
  totalRows: number;
  acceptedRows: number;
  rejectedRows: number;
  redactedCellCount: number;
  coercedCellCount: number;
  duplicateTimestamps: number;
  detectedSubsystems: string[];
  detectedPayloads: string[];
  detectedLinks: string[];
  redactedFields: string[];
  rejections: RowRejection[];
  warnings: string[];
  timeRange: TimeRange | null;
}

export interface NumericSummary {
  field: string;
  min: number | null;
  max: number | null;
  mean: number | null;
  measured: number;
  redacted: number;
}

export interface TrackPoint {
  timestamp: number;
  latitudeDeg: number;
  longitudeDeg: number;
  altitudeFt: number;
}
