import type { NextRequest } from 'next/server';
import { getWaypointStore } from '@/lib/db';
import { importWaypoints } from '@/lib/waypoint-editor';
import { errorResponse, resolveSession, sessionJson } from '../_lib/session';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

const MAX_UPLOAD_BYTES = 16 * 1024 * 1024;

export async function POST(request: NextRequest) {
  const session = resolveSession(request);

  try {
    const form = await request.formData();
    const file = form.get('file');
    if (!(file instanceof File)) {
      return sessionJson(session, { success: false, error: 'No file provided' }, 400);
    }
    if (!file.name) {
      return sessionJson(session, { success: false, error: 'No file selected' }, 400);
    }
    if (file.size > MAX_UPLOAD_BYTES) {
      return sessionJson(session, { success: false, error: 'File exceeds 16 MB' }, 413);
    }

    const result = importWaypoints(getWaypointStore(), session.id, file.name, await file.text());
    console.log(`[upload] ${result.message}`);
    if (result.warnings.length > 0) {
      console.warn(`[upload] ${result.warnings.length} diagnostics while reading ${result.filename}`);
    }

    return sessionJson(session, {
      success: true,
      message: result.message,
      waypoints: result.waypoints.map((waypoint) => waypoint.toMapping()),
      warnings: result.warnings
    });
  } catch (error) {
    return errorResponse(session, 'upload', error);
  }
}
