import { parseCsv, writeCsv } from '@/lib/cup/csv';
import type { ParseWarning } from '@/lib/cup/errors';
import { parseCup, writeCup, type CupWriteOptions } from '@/lib/cup/parser';
import { Waypoint, type WaypointMapping } from '@/lib/cup/waypoint';
import { formatElevation, type ElevationLookup } from '@/lib/geo-lookup';
import type { WaypointStore } from '@/lib/waypoint-store';

export type WaypointInput = Partial<Record<keyof WaypointMapping, unknown>>;
export type WaypointFileFormat = 'cup' | 'csv';

export interface EditorContext {
  store: WaypointStore;
  lookupElevation: ElevationLookup;
}

export interface ImportResult {
  filename: string;
  waypoints: Waypoint[];
  warnings: ParseWarning[];
  message: string;
}

export interface ExportedFile {
  filename: string;
  content: string;
  contentType: string;
}

export class UnsupportedFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedFileError';
  }
}

const CONTENT_TYPES: Record<WaypointFileFormat, string> = {
  cup: 'text/plain; charset=utf-8',
  csv: 'text/csv; charset=utf-8'
};

export function isWaypointFileFormat(value: string): value is WaypointFileFormat {
  return value === 'cup' || value === 'csv';
}

export function formatFromFilename(filename: string): WaypointFileFormat | null {
  const extension = filename.split('.').pop()?.toLowerCase() ?? '';
  return filename.includes('.') && isWaypointFileFormat(extension) ? extension : null;
}

export function safeFilename(filename: string): string {
  return filename
    .replace(/^.*[\\/]/, '')
    .replace(/[^\w.\- ]+/g, '_')
    .trim();
}

export function sortByName(waypoints: Waypoint[]): Waypoint[] {
  return [...waypoints].sort((a, b) => {
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  });
}

function coordinate(value: unknown): number | null {
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : null;
}

function hasElevation(input: WaypointInput): boolean {
  const { elevation } = input;
  return (typeof elevation === 'string' && elevation.trim() !== '') || typeof elevation === 'number';
}

// Lookup failure keeps whatever elevation the input already had.
async function withLookedUpElevation(
  input: WaypointInput,
  lookupElevation: ElevationLookup,
  refresh: boolean
): Promise<WaypointInput> {
  if (hasElevation(input) && !refresh) return input;
  const latitude = coordinate(input.latitude);
  const longitude = coordinate(input.longitude);
  if (latitude === null || longitude === null) return input;

  const meters = await lookupElevation(latitude, longitude);
  return meters === null ? input : { ...input, elevation: formatElevation(meters) };
}

function sameWaypoint(left: Waypoint, right: Waypoint): boolean {
  return JSON.stringify(left.toMapping()) === JSON.stringify(right.toMapping());
}

export function listWaypoints(store: WaypointStore, sessionId: string): Waypoint[] {
  return store.load(sessionId).waypoints;
}

export async function addWaypoint(
  context: EditorContext,
  sessionId: string,
  input: WaypointInput
): Promise<Waypoint> {
  const data = await withLookedUpElevation(input, context.lookupElevation, false);
  const waypoint = Waypoint.fromMapping(data);
  const { waypoints } = context.store.load(sessionId);
  context.store.save(sessionId, sortByName([...waypoints, waypoint]));
  return waypoint;
}

/**
 * Returns null when `index` does not address a waypoint. The collection is
 * read again after the elevation lookup, so changes saved while it was in
 * flight are kept; the edit is dropped if its waypoint moved or was removed.
 */
export async function updateWaypoint(
  context: EditorContext,
  sessionId: string,
  index: number,
  input: WaypointInput
): Promise<Waypoint | null> {
  const original = context.store.load(sessionId).waypoints[index];
  if (!Number.isInteger(index) || !original) return null;

  const coordinatesChanged =
    coordinate(input.latitude) !== original.latitude ||
    coordinate(input.longitude) !== original.longitude;
  const data = await withLookedUpElevation(input, context.lookupElevation, coordinatesChanged);
  const waypoint = Waypoint.fromMapping(data);

  const { waypoints } = context.store.load(sessionId);
  const position = waypoints.findIndex((candidate) => sameWaypoint(candidate, original));
  if (position === -1) return null;

  const next = [...waypoints];
  next[position] = waypoint;
  context.store.save(sessionId, sortByName(next));
  return waypoint;
}

export function deleteWaypoint(
  store: WaypointStore,
  sessionId: string,
  index: number
): Waypoint | null {
  const { waypoints } = store.load(sessionId);
  const deleted = waypoints[index];
  if (!Number.isInteger(index) || !deleted) return null;

  store.save(
    sessionId,
    waypoints.filter((_, position) => position !== index)
  );
  return deleted;
}

export function parseWaypointFile(
  format: WaypointFileFormat,
  content: string
): { waypoints: Waypoint[]; warnings: ParseWarning[] } {
  return format === 'cup' ? parseCup(content) : parseCsv(content);
}

export function serializeWaypoints(
  format: WaypointFileFormat,
  waypoints: Waypoint[],
  options: CupWriteOptions = {}
): string {
  return format === 'cup' ? writeCup(waypoints, options) : writeCsv(waypoints);
}

export function importWaypoints(
  store: WaypointStore,
  sessionId: string,
  filename: string,
  content: string
): ImportResult {
  const cleanName = safeFilename(filename);
  const format = formatFromFilename(cleanName);
  if (!format) {
    throw new UnsupportedFileError('Invalid file type. Only .cup and .csv files are allowed.');
  }

  const { waypoints, warnings } = parseWaypointFile(format, content);
  store.save(sessionId, waypoints, cleanName);
  return {
    filename: cleanName,
    waypoints,
    warnings,
    message: `Loaded ${waypoints.length} waypoints from ${cleanName}`
  };
}

export function exportWaypoints(
  store: WaypointStore,
  sessionId: string,
  format: WaypointFileFormat,
  options: CupWriteOptions = {}
): ExportedFile | null {
  const { waypoints, filename } = store.load(sessionId);
  if (waypoints.length === 0) return null;

  const baseName = filename.replace(/\.[^.]*$/, '') || 'waypoints';
  return {
    filename: `${baseName}.${format}`,
    content: serializeWaypoints(format, waypoints, options),
    contentType: CONTENT_TYPES[format]
  };
}

export function clearWaypoints(store: WaypointStore, sessionId: string): void {
  store.clear(sessionId);
}

/** Fill unknown elevations one lookup at a time; returns how many were filled. */
export async function fillMissingElevations(
  waypoints: Waypoint[],
  lookupElevation: ElevationLookup
): Promise<number> {
  let filled = 0;
  for (const waypoint of waypoints) {
    if (waypoint.elevation !== null) continue;
    const meters = await lookupElevation(waypoint.latitude, waypoint.longitude);
    if (meters === null) continue;
    waypoint.elevation = formatElevation(meters);
    filled += 1;
  }
  return filled;
}
