// ============================================================================
// Outage Analyzer — threshold-based outage intervals per comm link
// ============================================================================
import type {
  LinkGroup, LinkStatus, OutageInterval, OutageSummary, TrackPoint, TrackSegment,
} from '@missionreplay/shared';
import { InvalidParameterError } from '../errors.js';
import type { SubsystemRegistry } from '../subsystems/registry.js';
import type { TimeSeriesStore } from '../store/time-series.js';
import { outagesToCsv, outagesToJson, summarizeIntervals } from './summary.js';

export function assertThreshold(thresholdDb: number): void {
  if (typeof thresholdDb !== 'number' || !Number.isFinite(thresholdDb) || thresholdDb < 0) {
    throw new InvalidParameterError('thresholdDb', `Outage threshold must be a finite number >= 0 (got ${thresholdDb})`);
  }
}

/** Most recently used link/threshold results kept per analyzer. */
export const OUTAGE_CACHE_LIMIT = 16;

/**
 * Reads the store and registry, never writes them. Results are frozen and
 * kept in a small LRU keyed by link and threshold; the least recently used
 * entry is dropped once the limit is reached.
 */
export class OutageAnalyzer {
  private cache = new Map<string, readonly OutageInterval[]>();

  constructor(
    private readonly store: TimeSeriesStore,
    private readonly registry: SubsystemRegistry,
  ) {}

  links(): LinkGroup[] {
    return this.registry.links();
  }

  resolveLink(linkId: string): LinkGroup {
    return this.registry.link(linkId);
  }

  computeOutages(linkId: string, thresholdDb: number): readonly OutageInterval[] {
    assertThreshold(thresholdDb);
    const link = this.registry.link(linkId);
    const key = `${link.linkId}@${thresholdDb}`;
    const cached = this.cache.get(key);
    if (cached) {
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached;
    }

    const intervals: OutageInterval[] = [];
    let open: { start: number; last: number; count: number } | null = null;
    let samples = 0;

    for (const { timestamp, value } of this.store.valueSeries(link.marginField)) {
      samples++;
      // Redacted margin counts as outage: no data is not evidence of a healthy link.
      const down = value.kind === 'redacted' || value.value < thresholdDb;
      if (down) {
        if (open) { open.last = timestamp; open.count++; }
        else open = { start: timestamp, last: timestamp, count: 1 };
      } else if (open) {
        intervals.push(Object.freeze({
          linkId: link.linkId, startTime: open.start, endTime: open.last, lastSampleTime: open.last, sampleCount: open.count,
        }));
        open = null;
      }
    }

    if (open) {
      // Still down at the final sample: the outage outlives the mission, unless
      // the mission is a single sample and there is no "after" to speak of.
      intervals.push(Object.freeze({
        linkId: link.linkId,
        startTime: open.start,
        endTime: samples > 1 ? null : open.last,
        lastSampleTime: open.last,
        sampleCount: open.count,
      }));
    }

    const result = Object.freeze(intervals);
    this.cache.set(key, result);
    if (this.cache.size > OUTAGE_CACHE_LIMIT) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    return result;
  }

  get cachedResultCount(): number {
    return this.cache.size;
  }

  /** Sample-and-hold status of the link at `t`, from the computed intervals. */
  linkStatusAt(linkId: string, thresholdDb: number, t: number): LinkStatus | null {
    const intervals = this.computeOutages(linkId, thresholdDb);
    const link = this.registry.link(linkId);
    const point = this.store.sampleAt(link.marginField, t);
    if (!point) return null;

    // Last interval starting at or before the held sample.
    let lo = 0;
    let hi = intervals.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (intervals[mid].startTime <= point.timestamp) { found = mid; lo = mid + 1; }
      else hi = mid - 1;
    }
    const inOutage = found >= 0 && point.timestamp <= intervals[found].lastSampleTime;

    return {
      linkId: link.linkId,
      thresholdDb,
      marginDb: point.value.kind === 'measured' ? point.value.value : null,
      inOutage,
    };
  }

  summarize(linkId: string, thresholdDb: number): OutageSummary {
    const intervals = this.computeOutages(linkId, thresholdDb);
    return summarizeIntervals(this.registry.link(linkId).linkId, thresholdDb, intervals, this.store.timeRange());
  }

  summarizeAll(thresholdDb: number): OutageSummary[] {
    return this.links().map(l => this.summarize(l.linkId, thresholdDb));
  }

  private allIntervals(thresholdDb: number): OutageInterval[] {
    return this.links().flatMap(l => [...this.computeOutages(l.linkId, thresholdDb)]);
  }

  exportCsv(thresholdDb: number): string {
    return outagesToCsv(this.allIntervals(thresholdDb), this.store.timeRange());
  }

  exportJson(thresholdDb: number): string {
    return outagesToJson(thresholdDb, this.summarizeAll(thresholdDb), this.allIntervals(thresholdDb));
  }

  /** Flight path split into contiguous ok/outage runs for map color coding. */
  trackSegments(linkId: string, thresholdDb: number): TrackSegment[] {
    const intervals = this.computeOutages(linkId, thresholdDb);
    const segments: TrackSegment[] = [];
    let next = 0;

    for (let i = 0; i < this.store.length; i++) {
      const r = this.store.recordAt(i);
      while (next < intervals.length && intervals[next].lastSampleTime < r.timestamp) next++;
      const down = next < intervals.length && intervals[next].startTime <= r.timestamp;
      const status = down ? 'outage' : 'ok';
      const point: TrackPoint = {
        timestamp: r.timestamp, latitudeDeg: r.latitudeDeg, longitudeDeg: r.longitudeDeg, altitudeFt: r.altitudeFt,
      };
      const current = segments[segments.length - 1];
      if (current && current.status === status) current.points.push(point);
      else segments.push({ status, points: [point] });
    }

    return segments;
  }
}
