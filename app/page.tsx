import { cookies } from 'next/headers';
import { SESSION_COOKIE } from '@/app/api/_lib/session';
import { decimalToFixed } from '@/lib/cup/coordinates';
import { styleLabel } from '@/lib/cup/styles';
import { getWaypointStore } from '@/lib/db';
import type { StoredSession } from '@/lib/waypoint-store';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

const EMPTY_SESSION: StoredSession = { waypoints: [], filename: '' };
const cellStyle = { padding: '4px 8px', borderBottom: '1px solid #d5dbe5' } as const;

export default async function Page() {
  const sessionId = (await cookies()).get(SESSION_COOKIE)?.value;
  const { waypoints, filename } = sessionId
    ? getWaypointStore().load(sessionId)
    : EMPTY_SESSION;

  return (
    <main style={{ fontFamily: 'system-ui, sans-serif', padding: 24 }}>
      <h1>Waypoint Editor</h1>
      <form action="/api/upload" method="post" encType="multipart/form-data">
        <input type="file" name="file" accept=".cup,.csv" />
        <button type="submit">Upload</button>
      </form>

      {waypoints.length === 0 ? (
        <p>No waypoints loaded.</p>
      ) : (
        <>
          <p>
            {waypoints.length} waypoints{filename ? ` from ${filename}` : ''} &middot;{' '}
            <a href="/api/download/cup">Download CUP</a> &middot;{' '}
            <a href="/api/download/cup?layout=legacy">Download CUP (no runway width)</a>{' '}
            &middot; <a href="/api/download/csv">Download CSV</a>
          </p>
          <table style={{ borderCollapse: 'collapse' }}>
            <thead>
              <tr>
                <th style={cellStyle}>Name</th>
                <th style={cellStyle}>Code</th>
                <th style={cellStyle}>Latitude</th>
                <th style={cellStyle}>Longitude</th>
                <th style={cellStyle}>Elevation</th>
                <th style={cellStyle}>Type</th>
                <th style={cellStyle}>Runway</th>
                <th style={cellStyle}>Frequency</th>
                <th style={cellStyle}>Description</th>
              </tr>
            </thead>
            <tbody>
              {waypoints.map((waypoint, index) => (
                <tr key={`${index}-${waypoint.name}`}>
                  <td style={cellStyle}>{waypoint.name}</td>
                  <td style={cellStyle}>{waypoint.code}</td>
                  <td style={cellStyle}>{decimalToFixed(waypoint.latitude, true)}</td>
                  <td style={cellStyle}>{decimalToFixed(waypoint.longitude, false)}</td>
                  <td style={cellStyle}>{waypoint.elevation ?? ''}</td>
                  <td style={cellStyle}>{styleLabel(waypoint.style)}</td>
                  <td style={cellStyle}>
                    {waypoint.isAirfield
                      ? [waypoint.runwayDirection, waypoint.runwayLength].filter(Boolean).join(' / ')
                      : ''}
                  </td>
                  <td style={cellStyle}>{waypoint.frequency}</td>
                  <td style={cellStyle}>{waypoint.shortDescription}</td>
                </tr>
              ))}
            </tbody>
          </table>
        </>
      )}
    </main>
  );
}
