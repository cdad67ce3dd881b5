import { InvalidParameterError, NoMissionError, SchemaError, UnknownFieldError, toErrorBody } from '../errors.js';

describe('toErrorBody', () => {
  it('passes mission errors through with their code and field', () => {
    expect(toErrorBody(new UnknownFieldError('link', 'NOPE'))).toEqual({
      code: 'unknown_link', message: 'Unknown link: NOPE', field: 'NOPE',
    });
    expect(toErrorBody(new NoMissionError())).toEqual({ code: 'no_mission', message: 'No mission is loaded' });
    expect(toErrorBody(new SchemaError('duplicate_column', 'EPS_V')).code).toBe('duplicate_column');
  });

  it('hides the message of any other error', () => {
    expect(toErrorBody(new TypeError("Cannot read properties of undefined (reading 'fields')"))).toEqual({
      code: 'internal_error', message: 'Internal error',
    });
    expect(toErrorBody('EACCES: /var/lib/missions')).toEqual({ code: 'internal_error', message: 'Internal error' });
  });

  it('keeps the error hierarchy for status mapping', () => {
    expect(new UnknownFieldError('field', 'X')).toBeInstanceOf(InvalidParameterError);
  });
});
