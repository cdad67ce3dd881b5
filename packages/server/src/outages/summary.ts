// ============================================================================
// Outage statistics and report exports
// ============================================================================
import type { OutageInterval, OutageSummary, TimeRange } from '@missionreplay/shared';

export function intervalDurationMs(interval: OutageInterval, missionEnd: number): number {
  return (interval.endTime ?? missionEnd) - interval.startTime;
}

export function summarizeIntervals(
  linkId: string,
  thresholdDb: number,
  intervals: readonly OutageInterval[],
  range: TimeRange | null,
): OutageSummary {
  const missionEnd = range?.end ?? 0;
  let total = 0;
  let longest: OutageInterval | null = null;
  let longestMs = 0;

  for (const interval of intervals) {
    const ms = intervalDurationMs(interval, missionEnd);
    total += ms;
    if (!longest || ms > longestMs) { longest = interval; longestMs = ms; }
  }

  const span = range ? range.end - range.start : 0;
  return {
    linkId,
    thresholdDb,
    count: intervals.length,
    totalDurationMs: total,
    longestDurationMs: longestMs,
    longest,
    ongoing: intervals.some(i => i.endTime === null),
    availability: span > 0 ? Math.max(0, 1 - total / span) : (intervals.length > 0 ? 0 : 1),
  };
}

const CSV_HEADER = 'link_id,start_time,end_time,ongoing,duration_s,samples';

export function outagesToCsv(intervals: readonly OutageInterval[], range: TimeRange | null): string {
  const missionEnd = range?.end ?? 0;
  const lines = intervals.map(i => [
    i.linkId,
    new Date(i.startTime).toISOString(),
    i.endTime === null ? '' : new Date(i.endTime).toISOString(),
    i.endTime === null ? 'true' : 'false',
    (intervalDurationMs(i, missionEnd) / 1000).toString(),
    i.sampleCount.toString(),
  ].join(','));
  return [CSV_HEADER, ...lines].join('\n') + '\n';
}

export function outagesToJson(
  thresholdDb: number,
  summaries: OutageSummary[],
  intervals: readonly OutageInterval[],
): string {
  return JSON.stringify({ thresholdDb, summaries, intervals }, null, 2);
}
