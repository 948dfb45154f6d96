import { decimalToFixed } from './coordinates';
import { ValidationError } from './errors';
import { DEFAULT_STYLE, MAX_STYLE, MIN_STYLE } from './styles';

const ELEVATION_PATTERN = /^-?\d*\.?\d+\s*(m|ft)?$/i;
const RUNWAY_MEASURE_PATTERN = /^-?\d*\.?\d+\s*(m|nm|ml)?$/i;
const BARE_NUMBER_PATTERN = /^-?\d*\.?\d+$/;
const NUMERIC_FREQUENCY_PATTERN = /^(?=.*\d)[\d.,]+$/;
const BARE_FREQUENCY_PATTERN = /^\d+(?:\.\d+)?$/;
const LINE_BREAK_PATTERN = /\s*[\r\n]+\s*/g;
const PG_DIRECTION_PATTERN = /^(\d{3})\.(\d{3})$/;
const PG_DIRECTION_DECIMALS = ['000', '050', '055'];
const MIN_FREQUENCY_MHZ = 100;
const MAX_FREQUENCY_MHZ = 150;
const SHORT_DESCRIPTION_LENGTH = 50;

export interface WaypointInit {
  name: string;
  latitude: number;
  longitude: number;
  code?: string;
  country?: string;
  elevation?: string | null;
  style?: number;
  runwayDirection?: string;
  runwayLength?: string;
  runwayWidth?: string;
  frequency?: string;
  description?: string;
}

/** Transport/storage shape; key order matches the CSV column order. */
export interface WaypointMapping {
  name: string;
  code: string;
  country: string;
  latitude: number;
  longitude: number;
  elevation: string | null;
  style: number;
  runway_direction: string;
  runway_length: string;
  runway_width: string;
  frequency: string;
  description: string;
}

export interface CupRowOptions {
  /** Emit the rwwidth column. Older consumers expect `rwdir,rwlen,freq,desc`. */
  includeRunwayWidth?: boolean;
}

type WaypointFields = Required<WaypointInit>;

function normalizeRunwayDirection(raw: string): string {
  const value = raw.trim();
  if (!value) return '';

  if (/^\d{3}$/.test(value)) {
    const heading = parseInt(value, 10);
    if (heading === 360) return '000';
    if (heading > 359) {
      throw new ValidationError('runway_direction', `Runway direction '${value}' must be 000-359`);
    }
    return value;
  }

  const pg = value.match(PG_DIRECTION_PATTERN);
  if (pg) {
    const heading = parseInt(pg[1], 10);
    if (heading < 100 || heading > 359) {
      throw new ValidationError(
        'runway_direction',
        `PG runway direction '${value}' heading must be 100-359`
      );
    }
    if (!PG_DIRECTION_DECIMALS.includes(pg[2])) {
      throw new ValidationError(
        'runway_direction',
        `PG runway direction '${value}' decimal must be .000, .050, or .055`
      );
    }
    return value;
  }

  if (value.includes('.')) {
    throw new ValidationError(
      'runway_direction',
      `Runway direction '${value}' invalid format. Use 3-digit heading (e.g., '070') or PG format (e.g., '115.050')`
    );
  }
  throw new ValidationError(
    'runway_direction',
    `Runway direction '${value}' must be 3-digit heading (000-359) or PG format (e.g., '115.050')`
  );
}

function normalizeMeasure(
  field: 'runway_length' | 'runway_width',
  label: string,
  raw: string
): string {
  const value = raw.trim();
  if (value && !RUNWAY_MEASURE_PATTERN.test(value)) {
    throw new ValidationError(
      field,
      `${label} '${value}' must be numeric with optional unit (e.g., '1200m', '0.65nm', '0.75ml')`
    );
  }
  return value;
}

function frequencyWarnings(frequency: string): string[] {
  if (!NUMERIC_FREQUENCY_PATTERN.test(frequency)) return [];
  const mhz = Number(frequency.replace(',', '.'));
  if (!Number.isFinite(mhz)) return [];
  if (mhz < MIN_FREQUENCY_MHZ || mhz > MAX_FREQUENCY_MHZ) {
    return [`Frequency ${mhz} outside typical aviation range (100-150 MHz)`];
  }
  return [];
}

/** Trimmed, with line breaks folded to single spaces so a CUP row stays on one line. */
function singleLine(value: string): string {
  return value.replace(LINE_BREAK_PATTERN, ' ').trim();
}

// Checks run in a fixed order and stop at the first violation. Nothing is
// assigned until every check has passed.
function normalizeFields(fields: WaypointFields): { fields: WaypointFields; warnings: string[] } {
  if (!fields.name || !fields.name.trim()) {
    throw new ValidationError('name', 'Waypoint name cannot be empty');
  }
  if (!Number.isFinite(fields.latitude) || fields.latitude < -90 || fields.latitude > 90) {
    throw new ValidationError('latitude', `Latitude ${fields.latitude} must be between -90 and 90`);
  }
  if (!Number.isFinite(fields.longitude) || fields.longitude < -180 || fields.longitude > 180) {
    throw new ValidationError(
      'longitude',
      `Longitude ${fields.longitude} must be between -180 and 180`
    );
  }
  if (!Number.isInteger(fields.style) || fields.style < MIN_STYLE || fields.style > MAX_STYLE) {
    throw new ValidationError('style', `Style ${fields.style} must be between 0 and 21`);
  }

  const country = singleLine(fields.country);
  if (country.length > 3) {
    throw new ValidationError(
      'country',
      `Country code '${country}' should be 2-3 characters (e.g., 'PL', 'US')`
    );
  }

  const runwayDirection = normalizeRunwayDirection(fields.runwayDirection);

  const elevation = fields.elevation?.trim() || null;
  if (elevation !== null && !ELEVATION_PATTERN.test(elevation)) {
    throw new ValidationError(
      'elevation',
      `Elevation '${elevation}' must be numeric with optional unit (e.g., '504.0m', '1654ft')`
    );
  }

  const runwayLength = normalizeMeasure('runway_length', 'Runway length', fields.runwayLength);
  const runwayWidth = normalizeMeasure('runway_width', 'Runway width', fields.runwayWidth);
  const frequency = fields.frequency.trim();

  return {
    fields: {
      ...fields,
      name: singleLine(fields.name),
      code: singleLine(fields.code),
      country,
      elevation,
      runwayDirection,
      runwayLength,
      runwayWidth,
      frequency,
      description: singleLine(fields.description)
    },
    warnings: frequencyWarnings(frequency)
  };
}

export function isValidElevation(value: string): boolean {
  return ELEVATION_PATTERN.test(value.trim());
}

function quote(value: string): string {
  return `"${value.replace(LINE_BREAK_PATTERN, ' ').replace(/"/g, "'")}"`;
}

function quoteIfPresent(value: string): string {
  return value ? quote(value) : '';
}

function withMeters(value: string): string {
  return BARE_NUMBER_PATTERN.test(value) ? `${value}m` : value;
}

function readText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

function readNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed ? Number(trimmed) : fallback;
  }
  return Number.NaN;
}

export class Waypoint {
  name: string;
  code: string;
  country: string;
  latitude: number;
  longitude: number;
  elevation: string | null;
  style: number;
  runwayDirection: string;
  runwayLength: string;
  runwayWidth: string;
  frequency: string;
  description: string;
  warnings: string[];

  constructor(init: WaypointInit) {
    const { fields, warnings } = normalizeFields({
      name: init.name,
      latitude: init.latitude,
      longitude: init.longitude,
      code: init.code ?? '',
      country: init.country ?? '',
      elevation: init.elevation ?? null,
      style: init.style ?? DEFAULT_STYLE,
      runwayDirection: init.runwayDirection ?? '',
      runwayLength: init.runwayLength ?? '',
      runwayWidth: init.runwayWidth ?? '',
      frequency: init.frequency ?? '',
      description: init.description ?? ''
    });

    this.name = fields.name;
    this.code = fields.code;
    this.country = fields.country;
    this.latitude = fields.latitude;
    this.longitude = fields.longitude;
    this.elevation = fields.elevation;
    this.style = fields.style;
    this.runwayDirection = fields.runwayDirection;
    this.runwayLength = fields.runwayLength;
    this.runwayWidth = fields.runwayWidth;
    this.frequency = fields.frequency;
    this.description = fields.description;
    this.warnings = warnings;
  }

  /** Re-check the invariants after fields were changed in place. */
  validate(): void {
    const { fields, warnings } = normalizeFields({
      name: this.name,
      latitude: this.latitude,
      longitude: this.longitude,
      code: this.code,
      country: this.country,
      elevation: this.elevation,
      style: this.style,
      runwayDirection: this.runwayDirection,
      runwayLength: this.runwayLength,
      runwayWidth: this.runwayWidth,
      frequency: this.frequency,
      description: this.description
    });
    Object.assign(this, fields);
    this.warnings = warnings;
  }

  get isAirfield(): boolean {
    return Boolean(this.runwayDirection || this.runwayLength || this.frequency);
  }

  get shortDescription(): string {
    if (this.description.length <= SHORT_DESCRIPTION_LENGTH) return this.description;
    return `${this.description.slice(0, SHORT_DESCRIPTION_LENGTH)}...`;
  }

  toMapping(): WaypointMapping {
    return {
      name: this.name,
      code: this.code,
      country: this.country,
      latitude: this.latitude,
      longitude: this.longitude,
      elevation: this.elevation,
      style: this.style,
      runway_direction: this.runwayDirection,
      runway_length: this.runwayLength,
      runway_width: this.runwayWidth,
      frequency: this.frequency,
      description: this.description
    };
  }

  static fromMapping(data: Partial<Record<keyof WaypointMapping, unknown>>): Waypoint {
    const elevation = readText(data.elevation);
    return new Waypoint({
      name: readText(data.name),
      latitude: readNumber(data.latitude, 0),
      longitude: readNumber(data.longitude, 0),
      code: readText(data.code),
      country: readText(data.country),
      elevation: elevation || null,
      style: readNumber(data.style, DEFAULT_STYLE),
      runwayDirection: readText(data.runway_direction),
      runwayLength: readText(data.runway_length),
      runwayWidth: readText(data.runway_width),
      frequency: readText(data.frequency),
      description: readText(data.description)
    });
  }

  toCupRow(options: CupRowOptions = {}): string {
    const includeRunwayWidth = options.includeRunwayWidth ?? true;
    let elevation = '';
    if (this.elevation) {
      elevation = /(m|ft)$/i.test(this.elevation) ? this.elevation : `${this.elevation}m`;
    }
    const frequency = BARE_FREQUENCY_PATTERN.test(this.frequency)
      ? this.frequency
      : quoteIfPresent(this.frequency);

    const fields = [
      quote(this.name),
      quoteIfPresent(this.code),
      quoteIfPresent(this.country),
      decimalToFixed(this.latitude, true),
      decimalToFixed(this.longitude, false),
      elevation,
      String(this.style),
      this.runwayDirection,
      withMeters(this.runwayLength),
      ...(includeRunwayWidth ? [withMeters(this.runwayWidth)] : []),
      frequency,
      quoteIfPresent(this.description)
    ];
    return fields.join(',');
  }
}
