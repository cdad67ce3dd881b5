// ============================================================================
// Playback Engine — time-indexed cursor over one mission
// ============================================================================
import { EventEmitter } from 'events';
import type { LinkStatus, PlaybackSnapshot, PlaybackState } from '@missionreplay/shared';
import type { OutageAnalyzer } from '../outages/analyzer.js';
import type { TimeSeriesStore } from '../store/time-series.js';
import * as transitions from './transitions.js';
import { DEFAULT_SPEED_BOUNDS, type SpeedBounds } from './transitions.js';

export interface PlaybackEngineOptions {
  speedBounds?: SpeedBounds;
}

interface LinkSelection {
  linkId: string;
  thresholdDb: number;
}

/**
 * Owns the PlaybackState of one mission. Calls must be sequenced by the caller;
 * the engine itself never sleeps or schedules anything. Whatever drives
 * `advance()` (a timer, a render loop, a test) supplies the elapsed time.
 *
 * Emits `state` with a PlaybackSnapshot after every change.
 */
export class PlaybackEngine extends EventEmitter {
  private state: PlaybackState;
  private selection: LinkSelection | null = null;
  private readonly bounds: SpeedBounds;

  constructor(
    private readonly store: TimeSeriesStore,
    private readonly analyzer: OutageAnalyzer,
    options: PlaybackEngineOptions = {},
  ) {
    super();
    this.bounds = options.speedBounds ?? DEFAULT_SPEED_BOUNDS;
    this.state = transitions.initialState(store, this.bounds.min);
  }

  getState(): PlaybackState {
    return { ...this.state };
  }

  play(): PlaybackSnapshot {
    return this.apply(transitions.play(this.state, this.store));
  }

  pause(): PlaybackSnapshot {
    return this.apply(transitions.pause(this.state));
  }

  stop(): PlaybackSnapshot {
    return this.apply(transitions.stop(this.state, this.store));
  }

  seek(t: number): PlaybackSnapshot {
    return this.apply(transitions.seek(this.state, t, this.store));
  }

  setSpeed(multiplier: number): PlaybackSnapshot {
    return this.apply(transitions.setSpeed(this.state, multiplier, this.bounds));
  }

  advance(deltaSeconds: number): PlaybackSnapshot {
    return this.apply(transitions.advance(this.state, deltaSeconds, this.store));
  }

  /** Chooses the link whose status rides along with every snapshot; null clears it. */
  selectLink(linkId: string | null, thresholdDb: number): PlaybackSnapshot {
    if (linkId === null) {
      this.selection = null;
    } else {
      // Throws for an unknown link or bad threshold before anything changes.
      const link = this.analyzer.resolveLink(linkId);
      this.analyzer.computeOutages(link.linkId, thresholdDb);
      this.selection = { linkId: link.linkId, thresholdDb };
    }
    return this.emitSnapshot();
  }

  getSelection(): LinkSelection | null {
    return this.selection ? { ...this.selection } : null;
  }

  snapshot(): PlaybackSnapshot {
    const { cursorIndex, currentTime } = this.state;
    const record = cursorIndex >= 0 ? this.store.recordAt(cursorIndex) : null;
    let linkStatus: LinkStatus | null = null;
    if (this.selection) {
      linkStatus = this.analyzer.linkStatusAt(this.selection.linkId, this.selection.thresholdDb, currentTime);
    }
    return { state: { ...this.state }, record, linkStatus };
  }

  private apply(next: PlaybackState): PlaybackSnapshot {
    if (next === this.state) return this.snapshot();
    this.state = next;
    return this.emitSnapshot();
  }

  private emitSnapshot(): PlaybackSnapshot {
    const snap = this.snapshot();
    this.emit('state', snap);
    return snap;
  }
}
