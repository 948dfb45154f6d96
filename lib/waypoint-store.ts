import type Database from 'better-sqlite3';
import { Waypoint, type WaypointMapping } from '@/lib/cup/waypoint';

export interface StoredSession {
  waypoints: Waypoint[];
  filename: string;
}

interface SessionRow {
  filename: string;
  waypoints_json: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS editor_sessions (
    session_id TEXT PRIMARY KEY,
    filename TEXT NOT NULL DEFAULT '',
    waypoints_json TEXT NOT NULL DEFAULT '[]',
    updated_at INTEGER NOT NULL
  )
`;

/**
 * Session-keyed waypoint collections. The database handle is supplied by the
 * caller; lib/db.ts owns the file-backed one.
 */
export class WaypointStore {
  private readonly selectStmt: Database.Statement<[string], SessionRow>;
  private readonly upsertStmt: Database.Statement<[string, string, string, number]>;
  private readonly deleteStmt: Database.Statement<[string]>;

  constructor(db: Database.Database) {
    db.exec(SCHEMA);
    this.selectStmt = db.prepare<[string], SessionRow>(
      'SELECT filename, waypoints_json FROM editor_sessions WHERE session_id = ?'
    );
    this.upsertStmt = db.prepare<[string, string, string, number]>(`
      INSERT INTO editor_sessions (session_id, filename, waypoints_json, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(session_id) DO UPDATE SET
        filename = excluded.filename,
        waypoints_json = excluded.waypoints_json,
        updated_at = excluded.updated_at
    `);
    this.deleteStmt = db.prepare<[string]>('DELETE FROM editor_sessions WHERE session_id = ?');
  }

  load(sessionId: string): StoredSession {
    const row = this.selectStmt.get(sessionId);
    if (!row) {
      return { waypoints: [], filename: '' };
    }
    const mappings: unknown = JSON.parse(row.waypoints_json);
    const waypoints = Array.isArray(mappings)
      ? mappings.map((mapping: Partial<Record<keyof WaypointMapping, unknown>>) =>
          Waypoint.fromMapping(mapping)
        )
      : [];
    return { waypoints, filename: row.filename };
  }

  save(sessionId: string, waypoints: Waypoint[], filename?: string): void {
    const nextFilename = filename ?? this.load(sessionId).filename;
    this.upsertStmt.run(
      sessionId,
      nextFilename,
      JSON.stringify(waypoints.map((waypoint) => waypoint.toMapping())),
      Date.now()
    );
  }

  clear(sessionId: string): void {
    this.deleteStmt.run(sessionId);
  }
}
