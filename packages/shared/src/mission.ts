// ============================================================================
// Mission Replay Session & Wire Types
// ============================================================================

import type { SubsystemDescriptor } from './subsystems.js';
import type { TimeRange, ValidationReport } from './telemetry.js';
import type { PlaybackSnapshot } from './playback.js';

export interface MissionSummary {
  id: string;
  name: string;
  loadedAt: number;
  recordCount: number;
  timeRange: TimeRange | null;
  fields: string[];
  descriptors: SubsystemDescriptor[];
}

export interface ErrorBody {
  code: string;
  message: string;
  field?: string;
}

export type LoadResult =
  | { ok: true; mission: MissionSummary; report: ValidationReport }
  | { ok: false; error: ErrorBody };

export type ServerMessage =
  | { type: 'playback'; snapshot: PlaybackSnapshot }
  | { type: 'mission_loaded'; mission: MissionSummary };
