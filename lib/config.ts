import path from 'node:path';

const DEFAULT_DB_PATH = path.join(process.cwd(), 'data', 'waypoint-editor.sqlite');
const DEFAULT_ELEVATION_API_URL = 'https://api.open-elevation.com/api/v1/lookup';
const DEFAULT_ELEVATION_TIMEOUT_MS = 5_000;
const DEFAULT_GEOCODER_API_URL = 'https://nominatim.openstreetmap.org/reverse';
const DEFAULT_GEOCODER_TIMEOUT_MS = 3_000;
const DEFAULT_GEOCODER_USER_AGENT = 'cup-waypoint-editor/1.0';

function envString(name: string, fallback: string): string {
  const configured = process.env[name]?.trim();
  return configured || fallback;
}

function envTimeout(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
}

export function databasePath(): string {
  return envString('WAYPOINT_EDITOR_DB_PATH', DEFAULT_DB_PATH);
}

export function elevationApiUrl(): string {
  return envString('ELEVATION_API_URL', DEFAULT_ELEVATION_API_URL);
}

export function elevationTimeoutMs(): number {
  return envTimeout('ELEVATION_API_TIMEOUT_MS', DEFAULT_ELEVATION_TIMEOUT_MS);
}

export function geocoderApiUrl(): string {
  return envString('GEOCODER_API_URL', DEFAULT_GEOCODER_API_URL);
}

export function geocoderTimeoutMs(): number {
  return envTimeout('GEOCODER_TIMEOUT_MS', DEFAULT_GEOCODER_TIMEOUT_MS);
}

export function geocoderUserAgent(): string {
  return envString('GEOCODER_USER_AGENT', DEFAULT_GEOCODER_USER_AGENT);
}
