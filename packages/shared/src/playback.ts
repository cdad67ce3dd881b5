// ============================================================================
// Mission Replay Playback Types
// ============================================================================

import type { TelemetryRecord } from './telemetry.js';
import type { LinkStatus } from './outages.js';

export type PlaybackStatus = 'stopped' | 'playing' | 'paused';

export interface PlaybackState {
  currentTime: number;
  status: PlaybackStatus;
  speedMultiplier: number;
  cursorIndex: number; // -1 for an empty mission
}

export interface PlaybackSnapshot {
  state: PlaybackState;
  record: TelemetryRecord | null;
  linkStatus: LinkStatus | null;
}
