import assert from 'node:assert/strict';
import test from 'node:test';
import { makeBoxAirspace } from '@/lib/__fixtures__/entities';
import { fl, gnd, msl, unlimited } from '@/lib/core/vertical-distance';
import { coord } from '@/lib/geo/coordinate';
import { airspaceContains, airspaceEnvelope, formatAirspace } from './airspace';

test('formats name, type, class and limits', () => {
  const tma = makeBoxAirspace('TMA BREMEN A', 52.9, 53.1, 8.9, 9.1, {
    type: 'TMA',
    classification: 'D',
    ceiling: fl(65),
    floor: msl(1500)
  });
  const radar = makeBoxAirspace('RAS', 52.9, 53.1, 8.9, 9.1, {
    type: 'RadarZone',
    classification: null,
    ceiling: unlimited(),
    floor: gnd()
  });

  assert.equal(formatAirspace(tma), 'TMA BREMEN A: TMA (Class D) | FL65/1500 MSL');
  assert.equal(formatAirspace(radar), 'RAS: Radar Zone | unlimited/GND');
});

test('exposes the envelope and lateral containment', () => {
  const box = makeBoxAirspace('BOX', 53, 54, 9, 10);

  assert.deepEqual(airspaceEnvelope(box), { minLat: 53, maxLat: 54, minLon: 9, maxLon: 10 });
  assert.equal(airspaceContains(box, coord(53.5, 9.5)), true);
  assert.equal(airspaceContains(box, coord(54.5, 9.5)), false);
});
