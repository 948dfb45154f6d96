import assert from 'node:assert/strict';
import test from 'node:test';
import Database from 'better-sqlite3';
import { Waypoint } from './cup/waypoint';
import type { ElevationLookup } from './geo-lookup';
import {
  UnsupportedFileError,
  addWaypoint,
  clearWaypoints,
  deleteWaypoint,
  exportWaypoints,
  fillMissingElevations,
  formatFromFilename,
  importWaypoints,
  listWaypoints,
  safeFilename,
  updateWaypoint,
  type EditorContext
} from './waypoint-editor';
import { WaypointStore } from './waypoint-store';

const SESSION = 'session-1';

const EXAMPLE_CUP = [
  'name,code,country,lat,lon,elev,style,rwdir,rwlen,rwwidth,freq,desc',
  '"Test","TST","PL",5245.914N,02311.207E,504.0m,1,,,,"123.500","desc"',
  '"Broken row",5012.250N'
].join('\n');

function createContext(elevation: number | null = 118) {
  const lookups: Array<[number, number]> = [];
  const lookupElevation: ElevationLookup = async (latitude, longitude) => {
    lookups.push([latitude, longitude]);
    return elevation;
  };
  const context: EditorContext = {
    store: new WaypointStore(new Database(':memory:')),
    lookupElevation
  };
  return { context, lookups };
}

function names(context: EditorContext): string[] {
  return listWaypoints(context.store, SESSION).map((waypoint) => waypoint.name);
}

test('recognizes supported file extensions and strips unsafe filename parts', () => {
  assert.equal(formatFromFilename('Gliders.CUP'), 'cup');
  assert.equal(formatFromFilename('export.csv'), 'csv');
  assert.equal(formatFromFilename('notes.txt'), null);
  assert.equal(formatFromFilename('cup'), null);

  assert.equal(safeFilename('../../uploads/pass wd.cup'), 'pass wd.cup');
  assert.equal(safeFilename('C:\\maps\\alps$.csv'), 'alps_.csv');
});

test('adds waypoints in name order and looks up a missing elevation', async () => {
  const { context, lookups } = createContext();

  const added = await addWaypoint(context, SESSION, { name: 'bravo', latitude: 52.5, longitude: 21 });
  await addWaypoint(context, SESSION, { name: 'Alpha', latitude: '10', longitude: '20', elevation: '300m' });
  await addWaypoint(context, SESSION, { name: 'charlie', latitude: 1, longitude: 2, elevation: 45 });

  assert.equal(added.elevation, '118.0m');
  assert.deepEqual(lookups, [[52.5, 21]]);
  assert.deepEqual(names(context), ['Alpha', 'bravo', 'charlie']);
  assert.equal(listWaypoints(context.store, SESSION)[2].elevation, '45');
});

test('leaves elevation unset when the lookup has no answer', async () => {
  const { context } = createContext(null);

  const added = await addWaypoint(context, SESSION, { name: 'Alpha', latitude: 1, longitude: 2 });

  assert.equal(added.elevation, null);
  assert.equal(listWaypoints(context.store, SESSION).length, 1);
});

test('rejects an invalid waypoint without changing the collection', async () => {
  const { context } = createContext();
  await addWaypoint(context, SESSION, { name: 'Alpha', latitude: 1, longitude: 2 });

  await assert.rejects(
    addWaypoint(context, SESSION, { name: 'Bad', latitude: 91, longitude: 2 }),
    { name: 'ValidationError', field: 'latitude' }
  );
  assert.deepEqual(names(context), ['Alpha']);
});

test('refreshes elevation only when an edit moves the waypoint', async () => {
  const { context, lookups } = createContext(250);
  context.store.save(SESSION, [
    new Waypoint({ name: 'Alpha', latitude: 1, longitude: 2, elevation: '100m' }),
    new Waypoint({ name: 'Bravo', latitude: 3, longitude: 4, elevation: '200m' })
  ]);

  const renamed = await updateWaypoint(context, SESSION, 0, {
    name: 'Zulu',
    latitude: 1,
    longitude: 2,
    elevation: '100m'
  });
  assert.equal(renamed?.elevation, '100m');
  assert.deepEqual(lookups, []);
  assert.deepEqual(names(context), ['Bravo', 'Zulu']);

  const moved = await updateWaypoint(context, SESSION, 0, {
    name: 'Bravo',
    latitude: 5,
    longitude: 6,
    elevation: '200m'
  });
  assert.equal(moved?.elevation, '250.0m');
  assert.deepEqual(lookups, [[5, 6]]);
});

test('keeps waypoints added while an edit waits for its elevation', async () => {
  const store = new WaypointStore(new Database(':memory:'));
  const context: EditorContext = {
    store,
    lookupElevation: async () => {
      await addWaypoint(context, SESSION, { name: 'Able', latitude: 7, longitude: 8, elevation: '70m' });
      return 300;
    }
  };
  store.save(SESSION, [
    new Waypoint({ name: 'Bravo', latitude: 1, longitude: 2, elevation: '100m' }),
    new Waypoint({ name: 'Charlie', latitude: 3, longitude: 4, elevation: '200m' })
  ]);

  const moved = await updateWaypoint(context, SESSION, 0, {
    name: 'Bravo',
    latitude: 5,
    longitude: 6,
    elevation: '100m'
  });

  assert.equal(moved?.elevation, '300.0m');
  assert.deepEqual(
    listWaypoints(store, SESSION).map((waypoint) => [waypoint.name, waypoint.latitude]),
    [
      ['Able', 7],
      ['Bravo', 5],
      ['Charlie', 3]
    ]
  );
});

test('drops an edit whose waypoint was deleted during the elevation lookup', async () => {
  const store = new WaypointStore(new Database(':memory:'));
  const context: EditorContext = {
    store,
    lookupElevation: async () => {
      deleteWaypoint(store, SESSION, 0);
      return 300;
    }
  };
  store.save(SESSION, [
    new Waypoint({ name: 'Bravo', latitude: 1, longitude: 2 }),
    new Waypoint({ name: 'Charlie', latitude: 3, longitude: 4 })
  ]);

  const result = await updateWaypoint(context, SESSION, 0, { name: 'Bravo', latitude: 5, longitude: 6 });

  assert.equal(result, null);
  assert.deepEqual(names(context), ['Charlie']);
});

test('reports out-of-range edits and deletes as missing', async () => {
  const { context } = createContext();
  await addWaypoint(context, SESSION, { name: 'Alpha', latitude: 1, longitude: 2 });

  assert.equal(await updateWaypoint(context, SESSION, 1, { name: 'X', latitude: 0, longitude: 0 }), null);
  assert.equal(deleteWaypoint(context.store, SESSION, 5), null);
  assert.equal(deleteWaypoint(context.store, SESSION, -1), null);
  assert.deepEqual(names(context), ['Alpha']);
});

test('deletes by position and returns the removed waypoint', async () => {
  const { context } = createContext();
  await addWaypoint(context, SESSION, { name: 'Alpha', latitude: 1, longitude: 2 });
  await addWaypoint(context, SESSION, { name: 'Bravo', latitude: 3, longitude: 4 });

  const deleted = deleteWaypoint(context.store, SESSION, 0);

  assert.equal(deleted?.name, 'Alpha');
  assert.deepEqual(names(context), ['Bravo']);
});

test('imports a CUP upload, keeping its rows in file order and reporting skipped lines', () => {
  const { context } = createContext();

  const result = importWaypoints(context.store, SESSION, 'Club Fields.cup', EXAMPLE_CUP);

  assert.equal(result.message, 'Loaded 1 waypoints from Club Fields.cup');
  assert.equal(result.filename, 'Club Fields.cup');
  assert.equal(result.warnings.length, 1);
  assert.equal(result.warnings[0].line, 3);
  assert.deepEqual(names(context), ['Test']);
});

test('rejects uploads that are neither CUP nor CSV', () => {
  const { context } = createContext();

  assert.throws(
    () => importWaypoints(context.store, SESSION, 'notes.txt', 'hello'),
    (error: unknown) =>
      error instanceof UnsupportedFileError &&
      error.message === 'Invalid file type. Only .cup and .csv files are allowed.'
  );
});

test('exports under the uploaded base name in either format', () => {
  const { context } = createContext();
  assert.equal(exportWaypoints(context.store, SESSION, 'cup'), null);

  importWaypoints(context.store, SESSION, 'Club Fields.cup', EXAMPLE_CUP);

  const cup = exportWaypoints(context.store, SESSION, 'cup', { includeRunwayWidth: false });
  assert.deepEqual(cup, {
    filename: 'Club Fields.cup',
    contentType: 'text/plain; charset=utf-8',
    content: [
      'name,code,country,lat,lon,elev,style,rwdir,rwlen,freq,desc',
      '"Test","TST","PL",5245.914N,02311.207E,504.0m,1,,,123.500,"desc"'
    ].join('\n')
  });

  const csv = exportWaypoints(context.store, SESSION, 'csv');
  assert.equal(csv?.filename, 'Club Fields.csv');
  assert.equal(csv?.contentType, 'text/csv; charset=utf-8');
  const row = csv?.content.split('\r\n')[1]?.split(',') ?? [];
  const [stored] = listWaypoints(context.store, SESSION);
  assert.deepEqual(
    [...row.slice(0, 3), ...row.slice(5)],
    ['Test', 'TST', 'PL', '504.0m', '1', '', '', '', '123.500', 'desc']
  );
  assert.equal(Number(row[3]), stored.latitude);
  assert.equal(Number(row[4]), stored.longitude);
});

test('exports a default file name when nothing was uploaded', async () => {
  const { context } = createContext();
  await addWaypoint(context, SESSION, { name: 'Alpha', latitude: 1, longitude: 2 });

  assert.equal(exportWaypoints(context.store, SESSION, 'csv')?.filename, 'waypoints.csv');
});

test('clears the session collection', async () => {
  const { context } = createContext();
  await addWaypoint(context, SESSION, { name: 'Alpha', latitude: 1, longitude: 2 });

  clearWaypoints(context.store, SESSION);

  assert.deepEqual(names(context), []);
});

test('fills only the elevations that are missing', async () => {
  const { context, lookups } = createContext(640);
  const waypoints = [
    new Waypoint({ name: 'Known', latitude: 1, longitude: 2, elevation: '10m' }),
    new Waypoint({ name: 'Unknown', latitude: 3, longitude: 4 })
  ];

  const filled = await fillMissingElevations(waypoints, context.lookupElevation);

  assert.equal(filled, 1);
  assert.deepEqual(lookups, [[3, 4]]);
  assert.deepEqual(
    waypoints.map((waypoint) => waypoint.elevation),
    ['10m', '640.0m']
  );
});
