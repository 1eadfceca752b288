import assert from 'node:assert/strict';
import test from 'node:test';
import {
  makeAirport,
  makeAirspace,
  makeBoxAirspace,
  makeWaypoint
} from '@/lib/__fixtures__/entities';
import { EDDH, EDDH_N1, EDDH_N2, EDHL, routeNavigationData } from '@/lib/__fixtures__/route-data';
import { agl, altitude, fl, msl } from '@/lib/core/vertical-distance';
import { coord } from '@/lib/geo/coordinate';
import { NavigationDataBuilder } from '@/lib/nd/builder';
import { airportNavAid, waypointNavAid } from '@/lib/nd/navaid';
import type { NavigationData } from '@/lib/nd/navigation-data';
import type { Airspace } from '@/lib/nd/types';
import { intersectionLengthNm, VerticalProfile } from './profile';
import { Route } from './route';

const HAMBURG = makeBoxAirspace('HAMBURG CTR', 53.5, 53.75, 9.8, 10.2);
const LUEBECK = makeBoxAirspace('LUEBECK CTR', 53.7, 53.9, 10.5, 10.9);

function near(actual: number, expected: number, tolerance = 1e-6): void {
  assert.ok(Math.abs(actual - expected) < tolerance, `${actual} is not close to ${expected}`);
}

// Decodes WEST to EAST along the given latitude from longitude 0 to 4.
function eastbound(latitude: number, airspace: Airspace) {
  const nd = new NavigationDataBuilder()
    .addWaypoint(makeWaypoint('WEST', latitude, 0))
    .addWaypoint(makeWaypoint('EAST', latitude, 4))
    .addAirspace(airspace)
    .build();
  const route = new Route();
  route.decode('WEST EAST', nd);
  const total = route.legs()[0].distNm;
  const profile = new VerticalProfile(route, nd);
  nd.close();
  return { profile, total };
}

function assertWithinRoute(profile: VerticalProfile, total: number): void {
  for (const { entryDistanceNm, exitDistanceNm } of profile.intersections) {
    assert.ok(entryDistanceNm >= 0);
    assert.ok(entryDistanceNm <= exitDistanceNm);
    assert.ok(exitDistanceNm <= total + 1e-9);
  }
}

function hamburgLuebeck(): NavigationData {
  return new NavigationDataBuilder()
    .addAirport(EDDH)
    .addAirport(EDHL)
    .addAirspace(LUEBECK)
    .addAirspace(HAMBURG)
    .build();
}

test('finds the airspaces around both ends of a route in order of entry', () => {
  const nd = hamburgLuebeck();
  const route = new Route();
  route.decode('EDDH EDHL', nd);
  const total = route.legs()[0].distNm;

  const { intersections } = new VerticalProfile(route, nd);

  assert.deepEqual(
    intersections.map((i) => i.airspace.name),
    ['HAMBURG CTR', 'LUEBECK CTR']
  );
  const [hamburg, luebeck] = intersections;

  assert.equal(hamburg.entryDistanceNm, 0);
  assert.deepEqual(hamburg.entryPoint, EDDH.coordinate);
  near(hamburg.exitDistanceNm, ((10.2 - 9.98823) / (10.71778 - 9.98823)) * total);
  near(hamburg.exitPoint.longitude, 10.2, 1e-9);

  near(luebeck.entryDistanceNm, ((10.5 - 9.98823) / (10.71778 - 9.98823)) * total);
  near(luebeck.entryPoint.longitude, 10.5, 1e-9);
  near(luebeck.exitDistanceNm, total);
  assert.deepEqual(luebeck.exitPoint, EDHL.coordinate);
  nd.close();
});

test('measures a pass through an airspace between its boundary crossings', () => {
  const alpha = makeWaypoint('ALPHA', 50, 8);
  const bravo = makeWaypoint('BRAVO', 51, 8);
  const box = makeBoxAirspace('MIDDLE TMA', 50 + 1 / 3, 50 + 2 / 3, 7.5, 8.5, { type: 'TMA' });
  const nd = new NavigationDataBuilder().addWaypoint(alpha).addWaypoint(bravo).addAirspace(box).build();
  const route = new Route();
  route.decode('ALPHA BRAVO', nd);
  const total = route.legs()[0].distNm;

  const profile = new VerticalProfile(route, nd);

  assert.equal(profile.length, 1);
  const [pass] = profile.intersections;
  near(pass.entryDistanceNm, total / 3);
  near(pass.exitDistanceNm, (2 * total) / 3);
  near(intersectionLengthNm(pass), total / 3);
  near(pass.entryPoint.latitude, 50 + 1 / 3, 1e-9);
  near(pass.exitPoint.latitude, 50 + 2 / 3, 1e-9);
  nd.close();
});

test('is empty when the route misses every airspace', () => {
  const nd = new NavigationDataBuilder()
    .addAirport(EDDH)
    .addAirport(EDHL)
    .addAirspace(makeBoxAirspace('FAR AWAY', 40, 41, 0, 1))
    .build();
  const route = new Route();
  route.decode('EDDH EDHL', nd);

  const profile = new VerticalProfile(route, nd);

  assert.ok(profile.isEmpty());
  assert.equal(profile.length, 0);
  nd.close();
});

test('is empty without a route', () => {
  const nd = hamburgLuebeck();

  const profile = new VerticalProfile(new Route(), nd);

  assert.ok(profile.isEmpty());
  assert.deepEqual(profile.profile, []);
  assert.equal(profile.maxLevel(), null);
  nd.close();
});

test('follows the levels along the route from origin to destination elevation', () => {
  const nd = routeNavigationData();
  const route = new Route();
  route.decode('EDDH A0250 N2 F045 N1 EDHL', nd);
  const totals = route.accumulateLegs();

  const { profile } = new VerticalProfile(route, nd);

  assert.deepEqual(profile, [
    { kind: 'navAid', level: msl(53), distanceNm: 0, navAid: airportNavAid(EDDH) },
    {
      kind: 'navAid',
      level: altitude(2500),
      distanceNm: totals[0].distNm,
      navAid: waypointNavAid(EDDH_N2)
    },
    { kind: 'navAid', level: fl(45), distanceNm: totals[1].distNm, navAid: waypointNavAid(EDDH_N1) },
    { kind: 'navAid', level: msl(55), distanceNm: totals[2].distNm, navAid: airportNavAid(EDHL) }
  ]);
  nd.close();
});

test('reports the highest level of the profile', () => {
  const nd = routeNavigationData();
  const route = new Route();
  route.decode('EDDH A0250 N2 F045 N1 EDHL', nd);

  assert.deepEqual(new VerticalProfile(route, nd).maxLevel(), fl(45));
  nd.close();
});

test('leaves levels above ground out of the maximum', () => {
  const origin = makeAirport('ORGA', 52, 9, { elevation: agl(9000) });
  const destination = makeAirport('DSTB', 52.5, 9, { elevation: msl(100) });
  const nd = new NavigationDataBuilder().addAirport(origin).addAirport(destination).build();
  const route = new Route();
  route.decode('ORGA DSTB', nd);

  assert.deepEqual(new VerticalProfile(route, nd).maxLevel(), msl(100));
  nd.close();
});

test('counts a crossing through a polygon vertex once', () => {
  const diamond = makeAirspace('DIAMOND', [coord(0, 1), coord(1, 2), coord(0, 3), coord(-1, 2)]);

  const { profile, total } = eastbound(0, diamond);

  assert.equal(profile.length, 1);
  const [pass] = profile.intersections;
  near(pass.entryDistanceNm, total / 4);
  near(pass.exitDistanceNm, (3 * total) / 4);
  assertWithinRoute(profile, total);
});

test('enters and leaves along a boundary edge the route runs on', () => {
  const ledge = makeBoxAirspace('LEDGE', 0, 1, 1, 3);

  const { profile, total } = eastbound(0, ledge);

  assert.equal(profile.length, 1);
  const [pass] = profile.intersections;
  near(pass.entryDistanceNm, total / 4);
  near(pass.exitDistanceNm, (3 * total) / 4);
  assert.deepEqual(pass.entryPoint, coord(0, 1));
  assert.deepEqual(pass.exitPoint, coord(0, 3));
  assertWithinRoute(profile, total);
});

test('reports every pass through a re-entrant airspace', () => {
  const horseshoe = makeAirspace('HORSESHOE', [
    coord(0, 1),
    coord(0, 3),
    coord(1, 3),
    coord(1, 2.5),
    coord(0.25, 2.5),
    coord(0.25, 1.5),
    coord(1, 1.5),
    coord(1, 1)
  ]);

  const { profile, total } = eastbound(0.5, horseshoe);

  assert.equal(profile.length, 2);
  const [first, second] = profile.intersections;
  near(first.entryDistanceNm, total / 4);
  near(first.exitDistanceNm, (3 * total) / 8);
  near(second.entryDistanceNm, (5 * total) / 8);
  near(second.exitDistanceNm, (3 * total) / 4);
  assert.equal(first.airspace, second.airspace);
  assertWithinRoute(profile, total);
});
