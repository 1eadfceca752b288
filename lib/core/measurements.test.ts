import assert from 'node:assert/strict';
import test from 'node:test';
import {
  formatSpeed,
  formatWind,
  knots,
  parseSpeed,
  parseWind,
  speedToKnots,
  trueToMagnetic
} from './measurements';

test('parses cruise speed groups', () => {
  assert.deepEqual(parseSpeed('N0107'), knots(107));
  assert.deepEqual(parseSpeed('K0200'), { value: 200, unit: 'kmh' });
  assert.deepEqual(parseSpeed('M082'), { value: 0.82, unit: 'mach' });
});

test('rejects words that are not speed groups', () => {
  assert.equal(parseSpeed('N1'), null);
  assert.equal(parseSpeed('N01070'), null);
  assert.equal(parseSpeed('M0762'), null);
  assert.equal(parseSpeed('EDDH'), null);
});

test('converts speeds to knots', () => {
  assert.equal(speedToKnots(knots(120)), 120);
  assert.ok(Math.abs(speedToKnots({ value: 185.2, unit: 'kmh' }) - 100) < 1e-9);
  assert.ok(Math.abs(speedToKnots({ value: 1, unit: 'mach' }) - 661.4788) < 0.001);
});

test('formats speed groups', () => {
  assert.equal(formatSpeed(knots(107)), 'N0107');
  assert.equal(formatSpeed({ value: 200, unit: 'kmh' }), 'K0200');
  assert.equal(formatSpeed({ value: 0.82, unit: 'mach' }), 'M082');
});

test('parses and formats wind groups', () => {
  assert.deepEqual(parseWind('24015KT'), { direction: 240, speedKt: 15 });
  assert.deepEqual(parseWind('270105KT'), { direction: 270, speedKt: 105 });
  assert.deepEqual(parseWind('00000KT'), { direction: 0, speedKt: 0 });
  assert.equal(parseWind('24015'), null);
  assert.equal(parseWind('99915KT'), null);
  assert.equal(formatWind({ direction: 90, speedKt: 5 }), '09005KT');
});

test('applies east-positive variation to true courses', () => {
  assert.equal(trueToMagnetic(100, 3), 97);
  assert.equal(trueToMagnetic(2, 5), 357);
  assert.equal(trueToMagnetic(100, -4), 104);
});
