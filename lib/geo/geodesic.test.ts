import assert from 'node:assert/strict';
import test from 'node:test';
import { coord, coordinateKey, coordinatesEqual } from './coordinate';
import {
  geodesicBearing,
  geodesicDestination,
  geodesicDistanceMeters,
  geodesicDistanceNm,
  geodesicInverse,
  normalizeBearing
} from './geodesic';

const DHE = coord(54.18568611, 7.9107);
const EDHF = coord(53.9925, 9.57666667);

test('measures bearing and distance between two fixes on the ellipsoid', () => {
  assert.equal(Math.round(geodesicBearing(DHE, EDHF)), 100);
  assert.equal(Math.round(geodesicDistanceNm(DHE, EDHF)), 60);
});

test('returns zero distance for coincident points', () => {
  const result = geodesicInverse(DHE, coord(DHE.latitude, DHE.longitude));
  assert.equal(result.distanceMeters, 0);
  assert.equal(result.initialBearing, 0);
});

test('projects a destination that measures back to the same bearing and distance', () => {
  const origin = coord(53.63, 9.99);
  const target = geodesicDestination(origin, 45, 18520);
  const back = geodesicInverse(origin, target);

  assert.ok(Math.abs(back.distanceMeters - 18520) < 0.01);
  assert.ok(Math.abs(back.initialBearing - 45) < 1e-6);
});

test('projects due north along the meridian', () => {
  const target = geodesicDestination(coord(53, 10), 0, 10000);
  assert.ok(Math.abs(target.longitude - 10) < 1e-9);
  assert.ok(target.latitude > 53.08 && target.latitude < 53.1);
  assert.ok(Math.abs(geodesicDistanceMeters(coord(53, 10), target) - 10000) < 0.01);
});

test('normalizes bearings into [0, 360)', () => {
  assert.equal(normalizeBearing(-10), 350);
  assert.equal(normalizeBearing(360), 0);
  assert.equal(normalizeBearing(725), 5);
});

test('compares coordinates by exact value', () => {
  assert.equal(coordinatesEqual(coord(53.5, 9.5), coord(53.5, 9.5)), true);
  assert.equal(coordinatesEqual(coord(53.5, 9.5), coord(53.5, 9.5000001)), false);
  assert.equal(coordinateKey(coord(53.5, 9.5)), coordinateKey(coord(53.5, 9.5)));
  assert.notEqual(coordinateKey(coord(0, 0)), coordinateKey(coord(-0, 0)));
});
