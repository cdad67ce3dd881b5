// ============================================================================
// Mission Replay Link Outage Types
// ============================================================================

import type { TrackPoint } from './telemetry.js';

export interface OutageInterval {
  linkId: string;
  startTime: number;
  endTime: number | null; // null: still in outage when the mission ends
  lastSampleTime: number;
  sampleCount: number;
}

export interface LinkStatus {
  linkId: string;
  thresholdDb: number;
  marginDb: number | null; // null when the held sample is redacted
  inOutage: boolean;
}

export interface OutageSummary {
  linkId: string;
  thresholdDb: number;
  count: number;
  totalDurationMs: number;
  longestDurationMs: number;
  longest: OutageInterval | null;
  ongoing: boolean;
  availability: number; // 0-1 share of mission time outside outages
}

export interface TrackSegment {
  status: 'ok' | 'outage';
  points: TrackPoint[];
}
