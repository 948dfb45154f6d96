import Papa from 'papaparse';
import { fixedToDecimal, isFixedCoordinate } from './coordinates';
import { describeError, type ParseResult, type ParseWarning } from './errors';
import { DEFAULT_STYLE } from './styles';
import { isValidElevation, Waypoint, type WaypointMapping } from './waypoint';

type CsvField = keyof WaypointMapping;
type CsvRow = Record<string, string | undefined>;

export const CSV_COLUMNS: CsvField[] = [
  'name',
  'code',
  'country',
  'latitude',
  'longitude',
  'elevation',
  'style',
  'runway_direction',
  'runway_length',
  'runway_width',
  'frequency',
  'description'
];

const DELIMITER_SAMPLE_SIZE = 1024;
const CANDIDATE_DELIMITERS = [',', ';', '\t'];

// Lower-case header names accepted for each field, in priority order.
const FIELD_SYNONYMS: Record<CsvField, string[]> = {
  name: ['name', 'title', 'waypoint'],
  code: ['code', 'id', 'icao'],
  country: ['country'],
  latitude: ['latitude', 'lat'],
  longitude: ['longitude', 'lon', 'lng', 'long'],
  elevation: ['elevation', 'elev', 'altitude', 'alt'],
  style: ['style'],
  runway_direction: ['runway_direction', 'rwdir'],
  runway_length: ['runway_length', 'rwlen'],
  runway_width: ['runway_width', 'rwwidth'],
  frequency: ['frequency', 'freq'],
  description: ['description', 'desc', 'comment']
};

export function detectDelimiter(content: string): string {
  const sample = Papa.parse<string[]>(content.slice(0, DELIMITER_SAMPLE_SIZE), {
    delimitersToGuess: CANDIDATE_DELIMITERS,
    preview: 10
  });
  return CANDIDATE_DELIMITERS.includes(sample.meta.delimiter) ? sample.meta.delimiter : ',';
}

/** Map each field to the header that supplies it; the first synonym present wins. */
export function resolveColumns(headers: string[]): Partial<Record<CsvField, string>> {
  const byLowerName = new Map<string, string>();
  for (const header of headers) {
    const key = header.trim().toLowerCase();
    if (!byLowerName.has(key)) byLowerName.set(key, header);
  }

  const columns: Partial<Record<CsvField, string>> = {};
  for (const field of CSV_COLUMNS) {
    const header = FIELD_SYNONYMS[field]
      .map((synonym) => byLowerName.get(synonym))
      .find((candidate): candidate is string => candidate !== undefined);
    if (header !== undefined) columns[field] = header;
  }
  return columns;
}

function parseCoordinate(raw: string): number {
  if (isFixedCoordinate(raw)) {
    try {
      return fixedToDecimal(raw);
    } catch {
      return 0;
    }
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : 0;
}

function parseStyle(raw: string): number {
  const value = Number(raw);
  return raw && Number.isInteger(value) ? value : DEFAULT_STYLE;
}

function rowToWaypoint(row: CsvRow, columns: Partial<Record<CsvField, string>>): Waypoint {
  const read = (field: CsvField): string => {
    const header = columns[field];
    return header === undefined ? '' : (row[header] ?? '').trim();
  };

  const latitude = read('latitude');
  const longitude = read('longitude');
  if (!latitude || !longitude) {
    throw new Error('Row has no latitude/longitude value');
  }

  const elevation = read('elevation');
  return new Waypoint({
    name: read('name'),
    code: read('code'),
    country: read('country'),
    latitude: parseCoordinate(latitude),
    longitude: parseCoordinate(longitude),
    elevation: isValidElevation(elevation) ? elevation : null,
    style: parseStyle(read('style')),
    runwayDirection: read('runway_direction'),
    runwayLength: read('runway_length'),
    runwayWidth: read('runway_width'),
    frequency: read('frequency'),
    description: read('description')
  });
}

export function parseCsv(content: string): ParseResult<Waypoint> {
  const text = content.replace(/^\uFEFF/, '');
  const parsed = Papa.parse<CsvRow>(text, {
    delimiter: detectDelimiter(text),
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim()
  });

  const columns = resolveColumns(parsed.meta.fields ?? []);
  const waypoints: Waypoint[] = [];
  const warnings: ParseWarning[] = [];

  parsed.data.forEach((row, index) => {
    // Header is line 1.
    const line = index + 2;
    const rowText = Object.values(row)
      .filter((value): value is string => typeof value === 'string')
      .join(',');
    try {
      const waypoint = rowToWaypoint(row, columns);
      waypoints.push(waypoint);
      for (const message of waypoint.warnings) {
        warnings.push({ line, text: rowText, message });
      }
    } catch (error) {
      warnings.push({ line, text: rowText, message: describeError(error) });
    }
  });

  return { waypoints, warnings };
}

export function writeCsv(waypoints: Waypoint[]): string {
  return Papa.unparse({
    fields: CSV_COLUMNS,
    data: waypoints.map((waypoint) => {
      const mapping = waypoint.toMapping();
      return CSV_COLUMNS.map((column) => {
        const value = mapping[column];
        return value === null ? '' : String(value);
      });
    })
  });
}
