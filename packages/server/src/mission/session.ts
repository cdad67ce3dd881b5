// ============================================================================
// Mission Session — owns the currently loaded mission
// ============================================================================
import { EventEmitter } from 'events';
import { readFile } from 'fs/promises';
import * as path from 'path';
import type {
  LoadResult, MissionSummary, PlaybackSnapshot, RequiredFieldSpec, ValidationReport,
} from '@missionreplay/shared';
import { readCsv } from '../csv/reader.js';
import { MissionError, NoMissionError } from '../errors.js';
import { OutageAnalyzer } from '../outages/analyzer.js';
import { PlaybackEngine } from '../playback/engine.js';
import { DEFAULT_SPEED_BOUNDS, type SpeedBounds } from '../playback/transitions.js';
import type { TimeSeriesStore } from '../store/time-series.js';
import type { SubsystemRegistry } from '../subsystems/registry.js';
import { validateTable, type ValidationResult } from '../validation/validator.js';

export interface LoadedMission {
  summary: MissionSummary;
  report: ValidationReport;
  store: TimeSeriesStore;
  registry: SubsystemRegistry;
  analyzer: OutageAnalyzer;
  engine: PlaybackEngine;
}

export interface SessionOptions {
  requiredFields?: RequiredFieldSpec;
  maxRejectionsReported?: number;
  speedBounds?: SpeedBounds;
  /** Threshold used for the link selected automatically after a load. */
  defaultThresholdDb?: number;
}

/**
 * The single owner of "the loaded mission". A load validates to completion
 * before anything is published, then swaps store, analyzer and engine in one
 * assignment. A failed load leaves the previous mission in place.
 *
 * Events: `loaded` (MissionSummary), `playback` (PlaybackSnapshot).
 */
export class MissionSession extends EventEmitter {
  private mission: LoadedMission | null = null;
  private readonly options: SessionOptions;
  private readonly forward = (snap: PlaybackSnapshot) => this.emit('playback', snap);

  constructor(options: SessionOptions = {}) {
    super();
    this.options = options;
  }

  current(): LoadedMission | null {
    return this.mission;
  }

  requireMission(): LoadedMission {
    if (!this.mission) throw new NoMissionError();
    return this.mission;
  }

  async loadFile(filePath: string): Promise<LoadResult> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf-8');
    } catch (err) {
      const missing = typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
      const code = missing ? 'file_not_found' : 'read_failed';
      const message = missing
        ? `File not found: ${filePath}`
        : `Failed to read file: ${err instanceof Error ? err.message : String(err)}`;
      console.error(`🛰️ Mission load failed: ${message}`);
      return { ok: false, error: { code, message } };
    }
    return this.loadText(text, path.basename(filePath));
  }

  loadText(text: string, name: string): LoadResult {
    let validated: ValidationResult;
    try {
      validated = validateTable(readCsv(text), {
        requiredFields: this.options.requiredFields,
        maxRejectionsReported: this.options.maxRejectionsReported,
      });
    } catch (err) {
      if (!(err instanceof MissionError)) throw err;
      console.error(`🛰️ Mission load failed for ${name}: ${err.message}`);
      return { ok: false, error: err.toBody() };
    }

    const { store, registry, report } = validated;
    const analyzer = new OutageAnalyzer(store, registry);
    const engine = new PlaybackEngine(store, analyzer, {
      speedBounds: this.options.speedBounds ?? DEFAULT_SPEED_BOUNDS,
    });
    const firstLink = registry.links()[0];
    if (firstLink) engine.selectLink(firstLink.linkId, this.options.defaultThresholdDb ?? 3);

    const summary: MissionSummary = {
      id: `mission-${Date.now()}-${Math.random().toString(36).slice(2, 6)}`,
      name,
      loadedAt: Date.now(),
      recordCount: store.length,
      timeRange: store.timeRange(),
      fields: [...store.fields],
      descriptors: [...registry.descriptors],
    };

    const previous = this.mission;
    this.mission = { summary, report, store, registry, analyzer, engine };
    previous?.engine.off('state', this.forward);
    engine.on('state', this.forward);

    console.log(`🛰️ Mission loaded: ${name}: ${report.acceptedRows}/${report.totalRows} rows, ` +
      `${report.detectedSubsystems.length} subsystems, ${report.detectedLinks.length} links`);
    for (const w of report.warnings) console.log(`🛰️   ${w}`);

    this.emit('loaded', summary);
    return { ok: true, mission: summary, report };
  }

  /** Advances playback by real elapsed seconds; null when nothing is loaded. */
  tick(deltaSeconds: number): PlaybackSnapshot | null {
    if (!this.mission) return null;
    return this.mission.engine.advance(deltaSeconds);
  }
}
