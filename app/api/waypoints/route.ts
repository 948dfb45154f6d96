import type { NextRequest } from 'next/server';
import { getWaypointStore } from '@/lib/db';
import { lookupElevation } from '@/lib/geo-lookup';
import { addWaypoint, listWaypoints } from '@/lib/waypoint-editor';
import { errorResponse, readJsonObject, resolveSession, sessionJson } from '../_lib/session';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  const session = resolveSession(request);
  try {
    const waypoints = listWaypoints(getWaypointStore(), session.id);
    return sessionJson(
      session,
      waypoints.map((waypoint) => waypoint.toMapping())
    );
  } catch (error) {
    return errorResponse(session, 'waypoints', error);
  }
}

export async function POST(request: NextRequest) {
  const session = resolveSession(request);
  const input = await readJsonObject(request);
  if (!input) {
    return sessionJson(session, { success: false, error: 'Expected a JSON object' }, 400);
  }

  try {
    const waypoint = await addWaypoint(
      { store: getWaypointStore(), lookupElevation },
      session.id,
      input
    );
    return sessionJson(session, { success: true, waypoint: waypoint.toMapping() });
  } catch (error) {
    return errorResponse(session, 'waypoints', error);
  }
}
