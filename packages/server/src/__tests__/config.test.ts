import * as path from 'path';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3401,
      tickIntervalMs: 100,
      defaultThresholdDb: 3,
      speed: { min: 1, max: 500 },
      maxRejectionsReported: 100,
      missionDir: path.resolve('data'),
      missionFile: undefined,
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      TICK_INTERVAL_MS: '50',
      DEFAULT_THRESHOLD_DB: '4.5',
      MIN_SPEED: '0.5',
      MAX_SPEED: '64',
      MISSION_DIR: '/srv/missions',
      MISSION_FILE: 'data/sample_mission.csv',
    });
    expect(config).toMatchObject({
      port: 8080,
      tickIntervalMs: 50,
      defaultThresholdDb: 4.5,
      speed: { min: 0.5, max: 64 },
      missionDir: path.resolve('/srv/missions'),
      missionFile: 'data/sample_mission.csv',
    });
  });

  it('ignores unusable values', () => {
    const config = loadConfig({ PORT: 'abc', DEFAULT_THRESHOLD_DB: '-2', MIN_SPEED: '10', MAX_SPEED: '5' });
    expect(config.port).toBe(3401);
    expect(config.defaultThresholdDb).toBe(3);
    expect(config.speed).toEqual({ min: 1, max: 500 });
  });
});
