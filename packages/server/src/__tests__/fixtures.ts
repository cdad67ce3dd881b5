import * as path from 'path';
import { readFileSync } from 'fs';

export const T0 = Date.parse('2024-05-01T12:00:00Z');

/** Epoch ms of the i-th sample in a 1 Hz series starting at T0. */
export const at = (i: number) => T0 + i * 1000;

export const SAMPLE_MISSION_PATH = path.join(__dirname, '../../data/sample_mission.csv');

export const SAMPLE_MISSION_CSV = readFileSync(SAMPLE_MISSION_PATH, 'utf-8');

export const CORE_HEADER = 'Timestamp,POS_Latitude_deg,POS_Longitude_deg,POS_Altitude_ft';

/** 1 Hz mission with a single link column carrying the given margins (-999 for redacted). */
export function linkCsv(column: string, margins: number[]): string {
  const rows = margins.map((m, i) =>
    [new Date(at(i)).toISOString(), 34 + i / 10, -117, 1000 + i * 100, m].join(','));
  return [`${CORE_HEADER},${column}`, ...rows].join('\n');
}
