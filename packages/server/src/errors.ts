// ============================================================================
// Mission Replay Errors
// ============================================================================
import type { ErrorBody } from '@missionreplay/shared';

export class MissionError extends Error {
  readonly code: string;
  readonly field?: string;

  constructor(code: string, message: string, field?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.field = field;
  }

  toBody(): ErrorBody {
    return this.field === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, field: this.field };
  }
}

export type SchemaErrorCode = 'missing_required_field' | 'duplicate_column';

/** Column-level problem. Aborts the whole load. */
export class SchemaError extends MissionError {
  constructor(code: SchemaErrorCode, field: string) {
    super(code, code === 'missing_required_field'
      ? `Data is missing required column: ${field}`
      : `Column appears more than once in the header: ${field}`, field);
  }
}

/** Rejected at the call boundary; whatever the call would have changed stays as it was. */
export class InvalidParameterError extends MissionError {
  constructor(parameter: string, message: string, code = 'invalid_parameter') {
    super(code, message, parameter);
  }
}

export class UnknownFieldError extends InvalidParameterError {
  constructor(kind: 'field' | 'link', name: string) {
    super(name, `Unknown ${kind}: ${name}`, kind === 'field' ? 'unknown_field' : 'unknown_link');
  }
}

export class NoMissionError extends MissionError {
  constructor() {
    super('no_mission', 'No mission is loaded');
  }
}

export const INTERNAL_ERROR_BODY: Readonly<ErrorBody> = Object.freeze({ code: 'internal_error', message: 'Internal error' });

/** Client-facing body; anything that is not a MissionError is reported generically and logged by the caller. */
export function toErrorBody(err: unknown): ErrorBody {
  if (err instanceof MissionError) return err.toBody();
  return { ...INTERNAL_ERROR_BODY };
}
