// ============================================================================
// Sample values: measured vs. redacted
// ============================================================================
import type { RawCell, SampleValue } from '@missionreplay/shared';

/** The on-disk marker for redacted/unavailable data. */
export const REDACTED_SENTINEL = -999.0;

export const REDACTED: SampleValue = Object.freeze<SampleValue>({ kind: 'redacted' });

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function measured(value: number): SampleValue {
  return { kind: 'measured', value };
}

export function isRedacted(v: SampleValue): v is { kind: 'redacted' } {
  return v.kind === 'redacted';
}

export function valueOf(v: SampleValue): number | null {
  return v.kind === 'measured' ? v.value : null;
}

/** Converts back to the CSV contract, where -999.0 stands for redacted. */
export function toWire(v: SampleValue): number {
  return v.kind === 'measured' ? v.value : REDACTED_SENTINEL;
}

export type CellParse =
  | { status: 'number'; value: number }
  | { status: 'empty' }
  | { status: 'sentinel' }
  | { status: 'invalid'; text: string };

export function parseNumericCell(cell: RawCell): CellParse {
  if (cell === null || cell === undefined) return { status: 'empty' };
  if (typeof cell === 'number') {
    if (!Number.isFinite(cell)) return { status: 'invalid', text: String(cell) };
    return cell === REDACTED_SENTINEL ? { status: 'sentinel' } : { status: 'number', value: cell };
  }
  const text = cell.trim();
  if (text === '') return { status: 'empty' };
  if (!NUMERIC.test(text)) return { status: 'invalid', text };
  const value = Number(text);
  return value === REDACTED_SENTINEL ? { status: 'sentinel' } : { status: 'number', value };
}

/** Optional subsystem cell: anything that is not a real number becomes redacted. */
export function toSampleValue(parsed: CellParse): SampleValue {
  return parsed.status === 'number' ? measured(parsed.value) : REDACTED;
}
