import { REDACTED, REDACTED_SENTINEL, isRedacted, measured, parseNumericCell, toSampleValue, toWire, valueOf } from '../values.js';

describe('parseNumericCell', () => {
  it('parses plain, signed and exponent numbers', () => {
    expect(parseNumericCell('1.5')).toEqual({ status: 'number', value: 1.5 });
    expect(parseNumericCell(' -2 ')).toEqual({ status: 'number', value: -2 });
    expect(parseNumericCell('.5')).toEqual({ status: 'number', value: 0.5 });
    expect(parseNumericCell('1e3')).toEqual({ status: 'number', value: 1000 });
    expect(parseNumericCell(42)).toEqual({ status: 'number', value: 42 });
  });

  it('recognises the redacted sentinel as text or number', () => {
    expect(parseNumericCell('-999.0')).toEqual({ status: 'sentinel' });
    expect(parseNumericCell('-999')).toEqual({ status: 'sentinel' });
    expect(parseNumericCell(-999)).toEqual({ status: 'sentinel' });
  });

  it('separates empty cells from unparsable ones', () => {
    expect(parseNumericCell('')).toEqual({ status: 'empty' });
    expect(parseNumericCell('   ')).toEqual({ status: 'empty' });
    expect(parseNumericCell(null)).toEqual({ status: 'empty' });
    expect(parseNumericCell('n/a')).toEqual({ status: 'invalid', text: 'n/a' });
    expect(parseNumericCell('NaN')).toEqual({ status: 'invalid', text: 'NaN' });
    expect(parseNumericCell('0x10')).toEqual({ status: 'invalid', text: '0x10' });
    expect(parseNumericCell(Infinity)).toEqual({ status: 'invalid', text: 'Infinity' });
  });
});

describe('SampleValue helpers', () => {
  it('keeps zero as a measurement distinct from redacted', () => {
    const zero = toSampleValue(parseNumericCell('0'));
    expect(zero).toEqual(measured(0));
    expect(isRedacted(zero)).toBe(false);
    expect(valueOf(zero)).toBe(0);
  });

  it('maps every non-number parse to redacted', () => {
    expect(toSampleValue({ status: 'empty' })).toBe(REDACTED);
    expect(toSampleValue({ status: 'sentinel' })).toBe(REDACTED);
    expect(toSampleValue({ status: 'invalid', text: 'x' })).toBe(REDACTED);
    expect(valueOf(REDACTED)).toBeNull();
  });

  it('writes redacted back as the sentinel', () => {
    expect(toWire(REDACTED)).toBe(REDACTED_SENTINEL);
    expect(toWire(measured(12.5))).toBe(12.5);
  });
});
