import { randomUUID } from 'node:crypto';
import { NextResponse, type NextRequest } from 'next/server';
import { ValidationError, describeError } from '@/lib/cup/errors';
import { UnsupportedFileError } from '@/lib/waypoint-editor';

export const SESSION_COOKIE = 'waypoint_session';
const SESSION_MAX_AGE_SECONDS = 60 * 60 * 24 * 30;
const SESSION_ID_PATTERN = /^[0-9a-f-]{36}$/;

export interface EditorSession {
  id: string;
  isNew: boolean;
}

export function resolveSession(request: NextRequest): EditorSession {
  const existing = request.cookies.get(SESSION_COOKIE)?.value;
  if (existing && SESSION_ID_PATTERN.test(existing)) {
    return { id: existing, isNew: false };
  }
  return { id: randomUUID(), isNew: true };
}

export function withSession<T extends NextResponse>(response: T, session: EditorSession): T {
  if (session.isNew) {
    response.cookies.set(SESSION_COOKIE, session.id, {
      httpOnly: true,
      sameSite: 'lax',
      path: '/',
      maxAge: SESSION_MAX_AGE_SECONDS
    });
  }
  return response;
}

export function sessionJson(session: EditorSession, body: unknown, status = 200): NextResponse {
  return withSession(NextResponse.json(body, { status }), session);
}

/** Input problems become 400s; anything else is logged and reported as a 500. */
export function errorResponse(session: EditorSession, context: string, error: unknown): NextResponse {
  if (error instanceof ValidationError || error instanceof UnsupportedFileError) {
    return sessionJson(session, { success: false, error: error.message }, 400);
  }
  console.error(`[${context}] request failed:`, error);
  return sessionJson(session, { success: false, error: describeError(error) }, 500);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readJsonObject(request: NextRequest): Promise<Record<string, unknown> | null> {
  try {
    const body: unknown = await request.json();
    return isRecord(body) ? body : null;
  } catch {
    return null;
  }
}

export function parseIndex(raw: string): number | null {
  return /^\d+$/.test(raw) ? parseInt(raw, 10) : null;
}

export function parseCoordinateParams(
  request: NextRequest
): { latitude: number; longitude: number } | null {
  const { searchParams } = request.nextUrl;
  const latitude = parseFloat(searchParams.get('lat') ?? '');
  const longitude = parseFloat(searchParams.get('lon') ?? '');
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return null;
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return null;
  return { latitude, longitude };
}
