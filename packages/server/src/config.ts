import 'dotenv/config';
import * as path from 'path';
import { DEFAULT_SPEED_BOUNDS, type SpeedBounds } from './playback/transitions.js';

export interface AppConfig {
  port: number;
  tickIntervalMs: number;
  defaultThresholdDb: number;
  speed: SpeedBounds;
  maxRejectionsReported: number;
  /** Directory that `POST /api/mission/load { path }` may read from. */
  missionDir: string;
  missionFile?: string;
}

function intFrom(raw: string | undefined, fallback: number): number {
  const n = parseInt(raw || '', 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function floatFrom(raw: string | undefined, fallback: number): number {
  const n = parseFloat(raw || '');
  return Number.isFinite(n) ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const minSpeed = floatFrom(env.MIN_SPEED, DEFAULT_SPEED_BOUNDS.min);
  const maxSpeed = floatFrom(env.MAX_SPEED, DEFAULT_SPEED_BOUNDS.max);
  const speed = minSpeed > 0 && maxSpeed >= minSpeed ? { min: minSpeed, max: maxSpeed } : { ...DEFAULT_SPEED_BOUNDS };
  const threshold = floatFrom(env.DEFAULT_THRESHOLD_DB, 3);

  return {
    port: intFrom(env.PORT, 3401),
    tickIntervalMs: intFrom(env.TICK_INTERVAL_MS, 100),
    defaultThresholdDb: threshold >= 0 ? threshold : 3,
    speed,
    maxRejectionsReported: intFrom(env.MAX_REJECTIONS_REPORTED, 100),
    missionDir: path.resolve(env.MISSION_DIR || 'data'),
    missionFile: env.MISSION_FILE || undefined,
  };
}
