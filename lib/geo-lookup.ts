import {
  elevationApiUrl,
  elevationTimeoutMs,
  geocoderApiUrl,
  geocoderTimeoutMs,
  geocoderUserAgent
} from '@/lib/config';

const PLACE_KEYS = ['city', 'town', 'village', 'hamlet', 'suburb'] as const;
const REVERSE_GEOCODE_ZOOM = 10;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Given coordinates, an elevation in metres, or null when unavailable. */
export type ElevationLookup = (latitude: number, longitude: number) => Promise<number | null>;

export interface LookupOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

interface OpenElevationResponse {
  results?: Array<{ elevation?: number | null }>;
}

interface NominatimResponse {
  display_name?: string;
  address?: Partial<Record<(typeof PLACE_KEYS)[number], string>>;
}

async function fetchJson(
  url: URL,
  timeoutMs: number,
  fetchImpl: FetchLike,
  headers: Record<string, string> = {}
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchImpl(url.toString(), {
      cache: 'no-store',
      headers: { accept: 'application/json', ...headers },
      signal: controller.signal
    });
    if (!response.ok) {
      throw new Error(`upstream returned ${response.status}`);
    }
    return await response.json();
  } finally {
    clearTimeout(timeoutId);
  }
}

export async function lookupElevation(
  latitude: number,
  longitude: number,
  options: LookupOptions = {}
): Promise<number | null> {
  const url = new URL(options.baseUrl ?? elevationApiUrl());
  url.searchParams.set('locations', `${latitude},${longitude}`);

  try {
    const payload = (await fetchJson(
      url,
      options.timeoutMs ?? elevationTimeoutMs(),
      options.fetchImpl ?? fetch
    )) as OpenElevationResponse;
    const elevation = payload.results?.[0]?.elevation;
    if (typeof elevation !== 'number' || !Number.isFinite(elevation)) {
      console.warn(`[geo-lookup] No elevation in response for ${latitude}, ${longitude}`);
      return null;
    }
    return elevation;
  } catch (error) {
    console.warn(`[geo-lookup] Elevation fetch error for ${latitude}, ${longitude}:`, error);
    return null;
  }
}

export async function lookupLocationName(
  latitude: number,
  longitude: number,
  options: LookupOptions = {}
): Promise<string | null> {
  const url = new URL(options.baseUrl ?? geocoderApiUrl());
  url.searchParams.set('lat', String(latitude));
  url.searchParams.set('lon', String(longitude));
  url.searchParams.set('format', 'json');
  url.searchParams.set('zoom', String(REVERSE_GEOCODE_ZOOM));
  url.searchParams.set('addressdetails', '1');

  try {
    const payload = (await fetchJson(
      url,
      options.timeoutMs ?? geocoderTimeoutMs(),
      options.fetchImpl ?? fetch,
      { 'user-agent': geocoderUserAgent() }
    )) as NominatimResponse;

    for (const key of PLACE_KEYS) {
      const place = payload.address?.[key]?.trim();
      if (place) return place;
    }
    const displayName = payload.display_name?.split(',')[0]?.trim();
    return displayName || null;
  } catch (error) {
    console.warn(`[geo-lookup] Reverse geocoding error for ${latitude}, ${longitude}:`, error);
    return null;
  }
}

/** 504 -> "504.0m", the unit-tagged form stored on waypoints. */
export function formatElevation(meters: number): string {
  return `${meters.toFixed(1)}m`;
}
