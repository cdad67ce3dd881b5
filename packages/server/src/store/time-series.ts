// ============================================================================
// Time Series Store — one mission's validated telemetry, time-ordered
// ============================================================================
import type {
  NumericSummary, RawRow, RequiredFieldSpec, SampleValue, SeriesPoint, TelemetryRecord, TimeRange,
} from '@missionreplay/shared';
import { InvalidParameterError, UnknownFieldError } from '../errors.js';
import { measured, toWire } from '../telemetry/values.js';

type CoreAccessor = (r: TelemetryRecord) => number;

/**
 * Immutable, strictly increasing sequence of records. Built once by the
 * validator and shared read-only by the analyzer and the playback engine.
 */
export class TimeSeriesStore {
  readonly fields: readonly string[];
  readonly requiredFields: Readonly<RequiredFieldSpec>;
  private readonly records: readonly TelemetryRecord[];
  private readonly timestamps: Float64Array;
  private readonly core: ReadonlyMap<string, CoreAccessor>;

  constructor(records: TelemetryRecord[], fields: string[], requiredFields: RequiredFieldSpec) {
    for (let i = 1; i < records.length; i++) {
      if (records[i].timestamp <= records[i - 1].timestamp) {
        throw new InvalidParameterError('records', `Timestamps must be strictly increasing (index ${i})`);
      }
    }
    this.records = Object.freeze(records.map(r => Object.freeze({ ...r, fields: Object.freeze({ ...r.fields }) })));
    this.fields = Object.freeze([...fields].sort());
    this.requiredFields = Object.freeze({ ...requiredFields });
    this.timestamps = Float64Array.from(records, r => r.timestamp);
    this.core = new Map<string, CoreAccessor>([
      [requiredFields.latitude, r => r.latitudeDeg],
      [requiredFields.longitude, r => r.longitudeDeg],
      [requiredFields.altitude, r => r.altitudeFt],
    ]);
  }

  static empty(fields: string[], requiredFields: RequiredFieldSpec): TimeSeriesStore {
    return new TimeSeriesStore([], fields, requiredFields);
  }

  get length(): number {
    return this.records.length;
  }

  recordAt(index: number): TelemetryRecord {
    if (!Number.isInteger(index) || index < 0 || index >= this.records.length) {
      throw new InvalidParameterError('index', `Record index ${index} is outside 0..${this.records.length - 1}`);
    }
    return this.records[index];
  }

  timeAt(index: number): number {
    return this.recordAt(index).timestamp;
  }

  timeRange(): TimeRange | null {
    if (this.records.length === 0) return null;
    return { start: this.timestamps[0], end: this.timestamps[this.timestamps.length - 1] };
  }

  /**
   * Index of the latest record at or before `t`. Clamps to 0 before the first
   * record and to the last index after the final one; -1 only when empty.
   */
  nearestIndexForTime(t: number): number {
    const n = this.timestamps.length;
    if (n === 0) return -1;
    if (Number.isNaN(t) || t <= this.timestamps[0]) return 0;
    if (t >= this.timestamps[n - 1]) return n - 1;

    let lo = 0;
    let hi = n - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.timestamps[mid] <= t) lo = mid;
      else hi = mid - 1;
    }
    return lo;
  }

  hasField(field: string): boolean {
    return this.core.has(field) || this.fields.includes(field);
  }

  private accessor(field: string): (r: TelemetryRecord) => SampleValue {
    const core = this.core.get(field);
    if (core) return r => measured(core(r));
    if (!this.fields.includes(field)) throw new UnknownFieldError('field', field);
    return r => r.fields[field];
  }

  /** Lazy and restartable; redacted samples pass through for the caller to handle. */
  valueSeries(field: string): Iterable<SeriesPoint> {
    const read = this.accessor(field);
    const records = this.records;
    return {
      *[Symbol.iterator]() {
        for (const r of records) yield { timestamp: r.timestamp, value: read(r) };
      },
    };
  }

  sampleAt(field: string, t: number): SeriesPoint | null {
    const read = this.accessor(field);
    const idx = this.nearestIndexForTime(t);
    if (idx < 0) return null;
    const r = this.records[idx];
    return { timestamp: r.timestamp, value: read(r) };
  }

  /** Every n-th sample for charting; the final sample is always kept. */
  downsample(field: string, every: number): SeriesPoint[] {
    if (!Number.isInteger(every) || every < 1) {
      throw new InvalidParameterError('every', 'Downsampling step must be a positive integer');
    }
    const read = this.accessor(field);
    const out: SeriesPoint[] = [];
    for (let i = 0; i < this.records.length; i += every) {
      out.push({ timestamp: this.records[i].timestamp, value: read(this.records[i]) });
    }
    const last = this.records.length - 1;
    if (last >= 0 && last % every !== 0) {
      out.push({ timestamp: this.records[last].timestamp, value: read(this.records[last]) });
    }
    return out;
  }

  numericSummary(field: string): NumericSummary {
    let min: number | null = null;
    let max: number | null = null;
    let sum = 0;
    let count = 0;
    let redacted = 0;

    for (const { value } of this.valueSeries(field)) {
      if (value.kind === 'redacted') { redacted++; continue; }
      min = min === null ? value.value : Math.min(min, value.value);
      max = max === null ? value.value : Math.max(max, value.value);
      sum += value.value;
      count++;
    }

    return { field, min, max, mean: count > 0 ? sum / count : null, measured: count, redacted };
  }

  /** Rows in the input file contract: ISO timestamps, -999.0 for redacted cells. */
  toRows(): RawRow[] {
    const req = this.requiredFields;
    return this.records.map(r => {
      const row: RawRow = {
        [req.timestamp]: new Date(r.timestamp).toISOString(),
        [req.latitude]: r.latitudeDeg,
        [req.longitude]: r.longitudeDeg,
        [req.altitude]: r.altitudeFt,
      };
      for (const f of this.fields) row[f] = toWire(r.fields[f]);
      return row;
    });
  }

  columns(): string[] {
    const req = this.requiredFields;
    return [req.timestamp, req.latitude, req.longitude, req.altitude, ...this.fields];
  }
}
