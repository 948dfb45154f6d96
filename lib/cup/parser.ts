/**
 * SeeYou CUP waypoint codec.
 *
 * Reads both historical runway encodings:
 *   old: rwdir holds one combined digit run DDDLLLL[WWW] (direction, length,
 *        optional width) followed by freq,desc
 *   new: rwdir,rwlen,rwwidth as separate fields with units, then freq,desc
 */

import { fixedToDecimal } from './coordinates';
import { describeError, type ParseResult, type ParseWarning } from './errors';
import { Waypoint, type CupRowOptions } from './waypoint';
import { DEFAULT_STYLE } from './styles';

export const CUP_HEADER = 'name,code,country,lat,lon,elev,style,rwdir,rwlen,rwwidth,freq,desc';
export const LEGACY_CUP_HEADER = 'name,code,country,lat,lon,elev,style,rwdir,rwlen,freq,desc';

const HEADER_PREFIX = 'name,code';
const TASKS_MARKER = '-----related tasks-----';
const MIN_FIELDS = 6;
const CANONICAL_FIELD_COUNT = 12;
const UNIT_TOKEN_PATTERN = /^-?\d*\.?\d+\s*(?:m|ft|nm|ml)$/i;
const MEASURE_PATTERN = /^(-?\d*\.?\d+)\s*(m|ft|nm|ml)?$/i;
const PG_DIRECTION_PATTERN = /^\d{3}\.\d{3}$/;

export type RunwayLayout =
  | { kind: 'none' }
  | { kind: 'old'; direction: string; length: string; width?: string }
  | { kind: 'new'; direction: string; length: string; width: string };

export type CupWriteOptions = CupRowOptions;

// Fields are separated by commas outside double quotes. Quote characters are
// dropped and never unescaped, so `""` inside a quoted field yields nothing.
export function splitCupLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inQuotes) {
      fields.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current.trim());
  return fields;
}

function hasUnitToken(value: string | undefined): boolean {
  return UNIT_TOKEN_PATTERN.test((value ?? '').trim());
}

function padDirection(value: string): string {
  return /^\d{1,2}$/.test(value) ? value.padStart(3, '0') : value;
}

/** "1200.0m" -> "1200", "0800" -> "800", "0.65nm" stays "0.65nm". */
export function canonicalMeasure(raw: string): string {
  const value = raw.trim();
  const match = value.match(MEASURE_PATTERN);
  if (!match) return value;
  const magnitude = String(Number(match[1]));
  const unit = (match[2] ?? 'm').toLowerCase();
  return unit === 'm' ? magnitude : `${magnitude}${unit}`;
}

function splitCombinedRunway(digits: string): RunwayLayout {
  if (digits.length <= 3) {
    return { kind: 'old', direction: digits.padStart(3, '0'), length: '' };
  }
  return {
    kind: 'old',
    direction: digits.slice(0, 3),
    length: canonicalMeasure(digits.slice(3, 7)),
    width: digits.length >= 10 ? canonicalMeasure(digits.slice(7, 10)) : undefined
  };
}

function positionalFieldCount(widthColumn: boolean): number {
  return widthColumn ? CANONICAL_FIELD_COUNT : CANONICAL_FIELD_COUNT - 1;
}

/**
 * Decide which runway encoding a row uses.
 *
 * A unit-tagged value after rwdir means the separate-field layout. Otherwise an
 * empty rwdir means no runway, a digit run is the combined layout, and
 * anything else carries no usable runway data. Rows with every column of the
 * layout are read positionally when rwdir holds a plain or PG heading, so rows
 * that carry only a direction or only a width keep it.
 *
 * `widthColumn` is false for files written without rwwidth; when the caller
 * does not know, an eleven-field row is taken to be one of those.
 */
export function classifyRunwayFields(
  fields: string[],
  widthColumn = fields.length !== CANONICAL_FIELD_COUNT - 1
): RunwayLayout {
  const area = (fields[7] ?? '').trim();
  const second = fields[8] ?? '';
  const third = widthColumn ? (fields[9] ?? '') : '';
  const positional = fields.length >= positionalFieldCount(widthColumn);
  const separate: RunwayLayout = {
    kind: 'new',
    direction: padDirection(area),
    length: canonicalMeasure(second),
    width: canonicalMeasure(third)
  };

  if (hasUnitToken(second) || (positional && hasUnitToken(third))) {
    return separate;
  }
  if (!area) {
    return { kind: 'none' };
  }
  if (/^\d+$/.test(area)) {
    return positional && area.length <= 3 ? separate : splitCombinedRunway(area);
  }
  if (positional && PG_DIRECTION_PATTERN.test(area)) {
    return separate;
  }
  return { kind: 'none' };
}

function trailingFields(
  fields: string[],
  layout: RunwayLayout,
  widthColumn: boolean
): [string, string] {
  const separateOffset = widthColumn ? 10 : 9;
  const offset =
    layout.kind === 'new' || fields.length >= positionalFieldCount(widthColumn)
      ? separateOffset
      : 8;
  return [fields[offset] ?? '', fields[offset + 1] ?? ''];
}

function parseStyle(raw: string): number {
  const value = raw.trim();
  if (!value) return DEFAULT_STYLE;
  if (!/^-?\d+$/.test(value)) {
    throw new Error(`Style '${value}' is not an integer`);
  }
  return parseInt(value, 10);
}

export interface CupLineOptions {
  /** Whether rows carry the rwwidth column; inferred per row when omitted. */
  widthColumn?: boolean;
}

export function parseCupLine(line: string, options: CupLineOptions = {}): Waypoint {
  const fields = splitCupLine(line);
  if (fields.length < MIN_FIELDS) {
    throw new Error(`Expected at least ${MIN_FIELDS} fields, found ${fields.length}`);
  }

  const [name, code, country, lat, lon, elevation] = fields;
  const widthColumn = options.widthColumn ?? fields.length !== CANONICAL_FIELD_COUNT - 1;
  const runway = classifyRunwayFields(fields, widthColumn);
  const [frequency, description] = trailingFields(fields, runway, widthColumn);

  return new Waypoint({
    name,
    code,
    country,
    latitude: fixedToDecimal(lat),
    longitude: fixedToDecimal(lon),
    elevation: elevation || null,
    style: parseStyle(fields[6] ?? ''),
    runwayDirection: runway.kind === 'none' ? '' : runway.direction,
    runwayLength: runway.kind === 'none' ? '' : runway.length,
    runwayWidth: runway.kind === 'none' ? '' : (runway.width ?? ''),
    frequency,
    description
  });
}

export function parseCup(content: string): ParseResult<Waypoint> {
  const waypoints: Waypoint[] = [];
  const warnings: ParseWarning[] = [];
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
  const options: CupLineOptions = {};

  for (let index = 0; index < lines.length; index += 1) {
    const text = lines[index].trim();
    const line = index + 1;
    if (!text) continue;

    const lowered = text.toLowerCase();
    if (lowered.startsWith(TASKS_MARKER)) break;
    if (lowered.startsWith(HEADER_PREFIX)) {
      options.widthColumn = splitCupLine(lowered).includes('rwwidth');
      continue;
    }

    try {
      const waypoint = parseCupLine(text, options);
      waypoints.push(waypoint);
      for (const message of waypoint.warnings) {
        warnings.push({ line, text, message });
      }
    } catch (error) {
      warnings.push({ line, text, message: describeError(error) });
    }
  }

  return { waypoints, warnings };
}

export function writeCup(waypoints: Waypoint[], options: CupWriteOptions = {}): string {
  const header = options.includeRunwayWidth === false ? LEGACY_CUP_HEADER : CUP_HEADER;
  return [header, ...waypoints.map((waypoint) => waypoint.toCupRow(options))].join('\n');
}
