import { NextResponse, type NextRequest } from 'next/server';
import { lookupElevation } from '@/lib/geo-lookup';
import { parseCoordinateParams } from '../_lib/session';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

export async function GET(request: NextRequest) {
  const coordinates = parseCoordinateParams(request);
  if (!coordinates) {
    return NextResponse.json(
      { success: false, error: 'Invalid lat/lon parameters' },
      { status: 400 }
    );
  }

  const elevation = await lookupElevation(coordinates.latitude, coordinates.longitude);
  if (elevation === null) {
    return NextResponse.json({ success: false, elevation: null, error: 'Elevation unavailable' });
  }
  return NextResponse.json({ success: true, elevation });
}
