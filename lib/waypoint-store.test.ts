import assert from 'node:assert/strict';
import test from 'node:test';
import Database from 'better-sqlite3';
import { Waypoint } from './cup/waypoint';
import { WaypointStore } from './waypoint-store';

function createStore() {
  return new WaypointStore(new Database(':memory:'));
}

const alpha = new Waypoint({
  name: 'Alpha',
  latitude: 52.5,
  longitude: 21.25,
  elevation: '120m',
  style: 4,
  runwayDirection: '070',
  runwayLength: '800'
});
const bravo = new Waypoint({ name: 'Bravo', latitude: -12.25, longitude: -45.5 });

test('returns an empty collection for an unknown session', () => {
  assert.deepEqual(createStore().load('missing'), { waypoints: [], filename: '' });
});

test('persists waypoints and filename per session', () => {
  const store = createStore();
  store.save('session-a', [alpha, bravo], 'gliders.cup');
  store.save('session-b', [bravo]);

  const sessionA = store.load('session-a');
  assert.equal(sessionA.filename, 'gliders.cup');
  assert.deepEqual(
    sessionA.waypoints.map((waypoint) => waypoint.toMapping()),
    [alpha.toMapping(), bravo.toMapping()]
  );
  assert.ok(sessionA.waypoints[0] instanceof Waypoint);

  const sessionB = store.load('session-b');
  assert.equal(sessionB.filename, '');
  assert.deepEqual(
    sessionB.waypoints.map((waypoint) => waypoint.name),
    ['Bravo']
  );
});

test('keeps the stored filename when a save does not name one', () => {
  const store = createStore();
  store.save('session', [alpha], 'gliders.cup');
  store.save('session', [bravo]);

  const session = store.load('session');
  assert.equal(session.filename, 'gliders.cup');
  assert.deepEqual(
    session.waypoints.map((waypoint) => waypoint.name),
    ['Bravo']
  );
});

test('clears one session without touching another', () => {
  const store = createStore();
  store.save('session-a', [alpha], 'a.cup');
  store.save('session-b', [bravo], 'b.csv');

  store.clear('session-a');

  assert.deepEqual(store.load('session-a'), { waypoints: [], filename: '' });
  assert.equal(store.load('session-b').filename, 'b.csv');
});
