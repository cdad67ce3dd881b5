// ============================================================================
// Playback transitions — pure functions of (state, input, timeline)
// ============================================================================
import type { PlaybackState } from '@missionreplay/shared';
import { InvalidParameterError } from '../errors.js';

export interface SpeedBounds {
  min: number;
  max: number;
}

export const DEFAULT_SPEED_BOUNDS: Readonly<SpeedBounds> = Object.freeze({ min: 1, max: 500 });

/** What the transitions need to know about the mission: its extent and the index lookup. */
export interface Timeline {
  readonly length: number;
  timeRange(): { start: number; end: number } | null;
  nearestIndexForTime(t: number): number;
  timeAt(index: number): number;
}

export function initialState(timeline: Timeline, speedMultiplier = 1): PlaybackState {
  const range = timeline.timeRange();
  return {
    currentTime: range ? range.start : 0,
    status: 'stopped',
    speedMultiplier,
    cursorIndex: range ? 0 : -1,
  };
}

export function play(state: PlaybackState, timeline: Timeline): PlaybackState {
  const range = timeline.timeRange();
  if (!range || state.status === 'playing') return state;
  // Playing again after running off the end starts over.
  if (state.status === 'stopped' && state.currentTime >= range.end && range.end > range.start) {
    return { ...state, status: 'playing', currentTime: range.start, cursorIndex: 0 };
  }
  return { ...state, status: 'playing' };
}

export function pause(state: PlaybackState): PlaybackState {
  return state.status === 'playing' ? { ...state, status: 'paused' } : state;
}

export function stop(state: PlaybackState, timeline: Timeline): PlaybackState {
  const range = timeline.timeRange();
  return {
    ...state,
    status: 'stopped',
    currentTime: range ? range.start : 0,
    cursorIndex: range ? 0 : -1,
  };
}

export function seek(state: PlaybackState, t: number, timeline: Timeline): PlaybackState {
  if (typeof t !== 'number' || !Number.isFinite(t)) {
    throw new InvalidParameterError('time', `Seek time must be a finite number (got ${t})`);
  }
  const range = timeline.timeRange();
  if (!range) return state;
  const currentTime = Math.min(range.end, Math.max(range.start, t));
  return { ...state, currentTime, cursorIndex: timeline.nearestIndexForTime(currentTime) };
}

export function setSpeed(state: PlaybackState, multiplier: number, bounds: SpeedBounds = DEFAULT_SPEED_BOUNDS): PlaybackState {
  if (typeof multiplier !== 'number' || !Number.isFinite(multiplier) || multiplier <= 0) {
    throw new InvalidParameterError('multiplier', `Speed multiplier must be a finite number > 0 (got ${multiplier})`);
  }
  const speedMultiplier = Math.min(bounds.max, Math.max(bounds.min, multiplier));
  return { ...state, speedMultiplier };
}

// Forward scan from the current cursor; time only moves forward while playing.
function cursorAfter(from: number, t: number, timeline: Timeline): number {
  if (from < 0) return timeline.nearestIndexForTime(t);
  let idx = from;
  for (let hops = 0; hops < 32; hops++) {
    if (idx + 1 >= timeline.length || timeline.timeAt(idx + 1) > t) return idx;
    idx++;
  }
  return timeline.nearestIndexForTime(t);
}

/**
 * Moves simulated time forward by `deltaSeconds × speed`. Running past the
 * last record clamps to it and stops; nothing loops.
 */
export function advance(state: PlaybackState, deltaSeconds: number, timeline: Timeline): PlaybackState {
  if (typeof deltaSeconds !== 'number' || !Number.isFinite(deltaSeconds) || deltaSeconds < 0) {
    throw new InvalidParameterError('deltaSeconds', `Elapsed time must be a finite number >= 0 (got ${deltaSeconds})`);
  }
  const range = timeline.timeRange();
  if (state.status !== 'playing' || !range) return state;

  const target = state.currentTime + deltaSeconds * 1000 * state.speedMultiplier;
  if (target >= range.end) {
    return { ...state, status: 'stopped', currentTime: range.end, cursorIndex: timeline.length - 1 };
  }
  return { ...state, currentTime: target, cursorIndex: cursorAfter(state.cursorIndex, target, timeline) };
}
