import assert from 'node:assert/strict';
import test from 'node:test';
import { agl, fl, gnd, msl, unlimited } from '@/lib/core/vertical-distance';
import { isNavDataError } from '@/lib/errors';
import {
  parseAirspaceType,
  parseArcDistanceNm,
  parseBoundaryVia,
  parseCycle,
  parseLatitude,
  parseLimit,
  parseLongitude,
  parseMagneticVariation,
  parseRegion,
  parseRunwayBearing,
  parseRunwayDesignator,
  parseRunwayGradient,
  parseWaypointUsage
} from './fields';

test('parses column coordinates', () => {
  assert.ok(Math.abs(parseLatitude('N53374900') - (53 + 37 / 60 + 49 / 3600)) < 1e-9);
  assert.ok(Math.abs(parseLongitude('E009591762') - (9 + 59 / 60 + 17.62 / 3600)) < 1e-9);
  assert.ok(Math.abs(parseLatitude('S33563200') + (33 + 56 / 60 + 32 / 3600)) < 1e-9);
  assert.ok(Math.abs(parseLongitude('W000270000') + 0.45) < 1e-9);
});

test('rejects malformed coordinates', () => {
  assert.throws(() => parseLatitude('X53374900'), isNavDataError);
  assert.throws(() => parseLatitude('N5337490'), isNavDataError);
  assert.throws(() => parseLongitude('E0095917AB'), isNavDataError);
});

test('parses magnetic variation in tenths of a degree, east positive', () => {
  assert.equal(parseMagneticVariation('E0030'), 3);
  assert.equal(parseMagneticVariation('W0041'), -4.1);
  assert.equal(parseMagneticVariation('T0000'), 0);
  assert.equal(parseMagneticVariation('     '), null);
  assert.throws(() => parseMagneticVariation('X0030'), isNavDataError);
});

test('parses cycles and regions', () => {
  assert.deepEqual(parseCycle('2401'), { year: 24, cycle: 1 });
  assert.throws(() => parseCycle('24A1'), isNavDataError);
  assert.deepEqual(parseRegion('ENRT'), { kind: 'enroute' });
  assert.deepEqual(parseRegion('EDHL'), { kind: 'terminalArea', airport: 'EDHL' });
});

test('reads VFR usage only from a lone V waypoint type', () => {
  assert.equal(parseWaypointUsage('V  '), 'vfrOnly');
  assert.equal(parseWaypointUsage('VR '), 'unknown');
  assert.equal(parseWaypointUsage('C  '), 'unknown');
});

test('parses runway identifiers, bearings and gradients', () => {
  assert.equal(parseRunwayDesignator('RW07 '), '07');
  assert.equal(parseRunwayDesignator('RW36L'), '36L');
  assert.equal(parseRunwayDesignator('H1'), 'H1');
  assert.throws(() => parseRunwayDesignator('RW37'), isNavDataError);

  assert.deepEqual(parseRunwayBearing('0681'), { bearing: 68.1, reference: 'magnetic' });
  assert.deepEqual(parseRunwayBearing('347T'), { bearing: 347, reference: 'true' });

  assert.equal(parseRunwayGradient('+00450'), 0.45);
  assert.equal(parseRunwayGradient('-01000'), -1);
  assert.equal(parseRunwayGradient('      '), 0);
});

test('parses vertical limits with their unit indicator', () => {
  assert.deepEqual(parseLimit('FL065', 'M'), fl(65));
  assert.deepEqual(parseLimit('01500', 'M'), msl(1500));
  assert.deepEqual(parseLimit('01500', 'A'), agl(1500));
  assert.deepEqual(parseLimit('GND  ', 'M'), gnd());
  assert.deepEqual(parseLimit('MSL  ', 'M'), msl(0));
  assert.deepEqual(parseLimit('UNLTD', 'M'), unlimited());
  assert.equal(parseLimit('NOTSP', 'M'), null);
  assert.equal(parseLimit('     ', 'M'), null);
  assert.throws(() => parseLimit('ABCDE', 'M'), isNavDataError);
});

test('maps airspace types and lets the class letter take precedence', () => {
  assert.deepEqual(parseAirspaceType('Z', 'D'), { type: 'CTR', classification: 'D' });
  assert.deepEqual(parseAirspaceType('A', ' '), { type: 'CTA', classification: 'C' });
  assert.deepEqual(parseAirspaceType('T', ' '), { type: 'CTA', classification: 'B' });
  assert.deepEqual(parseAirspaceType('T', 'A'), { type: 'CTA', classification: 'A' });
  assert.deepEqual(parseAirspaceType('M', ' '), { type: 'TMA', classification: null });
  assert.deepEqual(parseAirspaceType('R', ' '), { type: 'RadarZone', classification: null });
  assert.throws(() => parseAirspaceType('Q', ' '), isNavDataError);
});

test('parses boundary via and arc distance', () => {
  assert.deepEqual(parseBoundaryVia('G '), { path: 'greatCircle', returnToOrigin: false });
  assert.deepEqual(parseBoundaryVia('RE'), { path: 'clockwiseArc', returnToOrigin: true });
  assert.deepEqual(parseBoundaryVia('CE'), { path: 'circle', returnToOrigin: true });
  assert.throws(() => parseBoundaryVia('X '), isNavDataError);
  assert.equal(parseArcDistanceNm('0045'), 4.5);
  assert.equal(parseArcDistanceNm('    '), null);
});
