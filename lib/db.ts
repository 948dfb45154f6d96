import 'server-only';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'path';
import { databasePath } from '@/lib/config';
import { WaypointStore } from '@/lib/waypoint-store';

let dbInstance: Database.Database | null = null;
let storeInstance: WaypointStore | null = null;

export function getDb(): Database.Database {
  if (!dbInstance) {
    const dbPath = databasePath();
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    dbInstance = new Database(dbPath);
    dbInstance.pragma('journal_mode = WAL');
  }
  return dbInstance;
}

export function getWaypointStore(): WaypointStore {
  if (!storeInstance) {
    storeInstance = new WaypointStore(getDb());
  }
  return storeInstance;
}
