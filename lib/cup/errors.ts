export type WaypointField =
  | 'name'
  | 'code'
  | 'country'
  | 'latitude'
  | 'longitude'
  | 'elevation'
  | 'style'
  | 'runway_direction'
  | 'runway_length'
  | 'runway_width'
  | 'frequency'
  | 'description';

/** A waypoint invariant was violated; the waypoint was not created. */
export class ValidationError extends Error {
  readonly field: WaypointField;

  constructor(field: WaypointField, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/** A coordinate token did not match the DDMM.mmm / DDDMM.mmm grammar. */
export class FormatError extends Error {
  readonly input: string;

  constructor(input: string, message: string) {
    super(message);
    this.name = 'FormatError';
    this.input = input;
  }
}

/** A row that was dropped (or a value that was flagged) while parsing a file. */
export interface ParseWarning {
  line: number;
  text: string;
  message: string;
}

export interface ParseResult<T> {
  waypoints: T[];
  warnings: ParseWarning[];
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
