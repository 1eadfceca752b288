import assert from 'node:assert/strict';
import test from 'node:test';
import {
  agl,
  altitude,
  compareVerticalDistance,
  divideVerticalDistance,
  fieldPressureAltitude,
  fl,
  formatVerticalDistance,
  gnd,
  msl,
  parseVerticalDistance,
  pressureAltitude,
  unlimited,
  verticalDistanceToMsl
} from './vertical-distance';

test('parses ICAO level groups', () => {
  assert.deepEqual(parseVerticalDistance('F085'), fl(85));
  assert.deepEqual(parseVerticalDistance('S1130'), fl(371));
  assert.deepEqual(parseVerticalDistance('A025'), altitude(2500));
  assert.deepEqual(parseVerticalDistance('M0762'), altitude(2500));
  assert.deepEqual(parseVerticalDistance('A0250'), altitude(2500));
});

test('rejects malformed level groups', () => {
  assert.equal(parseVerticalDistance('F08'), null);
  assert.equal(parseVerticalDistance('FOOB'), null);
  assert.equal(parseVerticalDistance('X100'), null);
  assert.equal(parseVerticalDistance(''), null);
});

test('formats every reference', () => {
  assert.equal(formatVerticalDistance(gnd()), 'GND');
  assert.equal(formatVerticalDistance(fl(65)), 'FL65');
  assert.equal(formatVerticalDistance(agl(1000)), '1000 AGL');
  assert.equal(formatVerticalDistance(msl(1500)), '1500 MSL');
  assert.equal(formatVerticalDistance(altitude(2500)), '2500 ALT');
  assert.equal(formatVerticalDistance(pressureAltitude(300)), 'PA 300');
  assert.equal(formatVerticalDistance(unlimited()), 'unlimited');
});

test('orders GND lowest and unlimited highest', () => {
  for (const other of [agl(1000), altitude(1000), fl(10), msl(100), pressureAltitude(50)]) {
    assert.equal(compareVerticalDistance(gnd(), other), -1);
    assert.equal(compareVerticalDistance(unlimited(), other), 1);
  }
  assert.equal(compareVerticalDistance(gnd(), gnd()), 0);
  assert.equal(compareVerticalDistance(unlimited(), unlimited()), 0);
  assert.equal(compareVerticalDistance(gnd(), unlimited()), -1);
});

test('compares on the MSL datum and within AGL', () => {
  assert.equal(compareVerticalDistance(agl(1000), agl(2000)), -1);
  assert.equal(compareVerticalDistance(altitude(1000), altitude(2000)), -1);
  assert.equal(compareVerticalDistance(msl(1000), fl(100)), -1);
  assert.equal(compareVerticalDistance(fl(65), msl(6500)), 0);
});

test('refuses to order values without a common datum', () => {
  assert.throws(() => compareVerticalDistance(agl(1000), msl(1000)), /common datum/);
  assert.throws(() => divideVerticalDistance(fl(100), msl(1000)), /different references/);
});

test('divides distances of the same reference', () => {
  assert.equal(divideVerticalDistance(fl(100), fl(50)), 2);
  assert.equal(divideVerticalDistance(gnd(), gnd()), 1);
});

test('resolves to MSL with a QNH correction', () => {
  assert.equal(verticalDistanceToMsl(fl(100), 1013.25, 0), 10000);
  assert.equal(verticalDistanceToMsl(msl(5000), 1013.25, 0), 5000);
  assert.equal(verticalDistanceToMsl(fl(100), 1033.25, 0), 10540);
  assert.equal(verticalDistanceToMsl(agl(1000), 1013.25, 500), 1500);
  assert.equal(verticalDistanceToMsl(gnd(), 1013.25, 500), 500);
  assert.equal(verticalDistanceToMsl(unlimited(), 1013.25, 0), null);
});

test('computes field pressure altitude', () => {
  assert.deepEqual(fieldPressureAltitude(1000, 1013.25), pressureAltitude(1000));
  assert.deepEqual(fieldPressureAltitude(0, 1003.25), pressureAltitude(274));
});
