import type { NextRequest } from 'next/server';
import { getWaypointStore } from '@/lib/db';
import { clearWaypoints } from '@/lib/waypoint-editor';
import { errorResponse, resolveSession, sessionJson } from '../_lib/session';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

export async function POST(request: NextRequest) {
  const session = resolveSession(request);
  try {
    clearWaypoints(getWaypointStore(), session.id);
    return sessionJson(session, { success: true, message: 'All waypoints cleared' });
  } catch (error) {
    return errorResponse(session, 'clear', error);
  }
}
