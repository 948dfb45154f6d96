import { NextResponse, type NextRequest } from 'next/server';
import { lookupLocationName } from '@/lib/geo-lookup';
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

  const name = await lookupLocationName(coordinates.latitude, coordinates.longitude);
  return NextResponse.json({ success: name !== null, name });
}
