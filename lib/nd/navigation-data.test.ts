import assert from 'node:assert/strict';
import test from 'node:test';
import {
  makeAirport,
  makeAirspace,
  makeBoxAirspace,
  makeTerminalWaypoint,
  makeWaypoint
} from '@/lib/__fixtures__/entities';
import { fl, msl } from '@/lib/core/vertical-distance';
import { coord } from '@/lib/geo/coordinate';
import { geodesicDestination } from '@/lib/geo/geodesic';
import { airacCycle } from './airac-cycle';
import { NavigationDataBuilder } from './builder';
import { navAidIdent } from './navaid';
import { NavigationData } from './navigation-data';

const BREMEN_TMA = makeAirspace(
  'TMA BREMEN A',
  [
    coord(53.10111, 8.974999),
    coord(53.102776, 9.079166),
    coord(52.97028, 9.084444),
    coord(52.96889, 8.982222)
  ],
  { type: 'TMA', classification: 'D', ceiling: fl(65), floor: msl(1500) }
);

test('returns the airspaces whose polygon contains a point', () => {
  const nd = new NavigationDataBuilder().addAirspace(BREMEN_TMA).build();

  assert.deepEqual(nd.at(coord(53.03759, 9.00533)).airspaces, [BREMEN_TMA]);
  assert.deepEqual(nd.at(coord(53.04892, 8.90907)).airspaces, []);
  nd.close();
});

test('returns navaids within the radius alongside airspaces', () => {
  const nd = new NavigationDataBuilder()
    .addAirport(makeAirport('EDDH', 53.63, 9.99))
    .addWaypoint(makeWaypoint('DHN1', 53.6, 9.95))
    .addWaypoint(makeTerminalWaypoint('EDDH', 'N1', 53.8, 10.03))
    .addAirspace(makeBoxAirspace('CTR HAMBURG', 53.5, 53.8, 9.7, 10.2))
    .build();

  const nearby = nd.at(coord(53.62, 9.97), 5);
  assert.deepEqual(
    nearby.airspaces.map((a) => a.name),
    ['CTR HAMBURG']
  );
  assert.deepEqual(nearby.navAids.map(navAidIdent).sort(), ['DHN1', 'EDDH']);
  nd.close();
});

test('finds waypoints before airports by exact identifier', () => {
  const nd = new NavigationDataBuilder()
    .addAirport(makeAirport('EDDH', 53.63, 9.99))
    .addWaypoint(makeWaypoint('EDDH', 50, 8))
    .addAirport(makeAirport('EDHL', 53.81, 10.7))
    .build();

  assert.equal(nd.find('EDDH')?.kind, 'waypoint');
  assert.equal(nd.find('EDHL')?.kind, 'airport');
  assert.equal(nd.find('eddh'), null);
  assert.equal(nd.find('ED'), null);
  nd.close();
});

test('includes appended partitions in every query until they are removed', () => {
  const root = NavigationData.empty();
  const partition = new NavigationDataBuilder()
    .withSource('partition one')
    .addAirport(makeAirport('EDHL', 53.81, 10.7))
    .addWaypoint(makeTerminalWaypoint('EDHL', 'W', 53.83, 10.56))
    .addAirspace(BREMEN_TMA)
    .build();

  root.append(partition);
  assert.deepEqual(root.partitionIds(), [partition.partitionId]);
  assert.equal(root.find('EDHL')?.kind, 'airport');
  assert.equal(root.findTerminalWaypoint('EDHL', 'W')?.kind, 'waypoint');
  assert.equal(root.at(coord(53.03759, 9.00533)).airspaces.length, 1);
  assert.deepEqual(root.at(coord(53.81, 10.7), 1).navAids.map(navAidIdent), ['EDHL']);

  root.remove(partition.partitionId);
  assert.deepEqual(root.partitionIds(), []);
  assert.equal(root.find('EDHL'), null);
  assert.equal(root.at(coord(53.03759, 9.00533)).airspaces.length, 0);
  assert.deepEqual(root.at(coord(53.81, 10.7), 1).navAids, []);
  root.close();
});

test('closes partitions it removes or replaces', (t) => {
  const root = NavigationData.empty();
  const removed = new NavigationDataBuilder()
    .withSource('removed')
    .addAirport(makeAirport('EDHL', 53.81, 10.7))
    .build();
  const closeRemoved = t.mock.method(removed, 'close');

  root.append(removed);
  root.remove(removed.partitionId);
  assert.equal(closeRemoved.mock.callCount(), 1);

  const older = new NavigationDataBuilder()
    .withSource('same source')
    .addAirport(makeAirport('EDDH', 53.63, 9.99))
    .build();
  const newer = new NavigationDataBuilder()
    .withSource('same source')
    .addAirport(makeAirport('EDDH', 53.63, 9.99))
    .build();
  const closeOlder = t.mock.method(older, 'close');

  root.append(older);
  root.append(newer);
  assert.equal(closeOlder.mock.callCount(), 1);
  assert.deepEqual(root.partitionIds(), [newer.partitionId]);
  assert.deepEqual(root.at(coord(53.63, 9.99), 1).navAids.map(navAidIdent), ['EDDH']);
  root.close();
});

test('finds a navaid due north just inside the radius at the equator', () => {
  const center = coord(0, 0);
  const north = geodesicDestination(center, 0, 9.99 * 1852);
  const nd = new NavigationDataBuilder()
    .addAirport(makeAirport('NRTH', north.latitude, north.longitude))
    .build();

  assert.deepEqual(nd.at(center, 10).navAids.map(navAidIdent), ['NRTH']);
  nd.close();
});

test('reports partitions whose cycle has expired', () => {
  const root = NavigationData.empty();
  const old = new NavigationDataBuilder()
    .withSource('cycle 2501')
    .addAirport(makeAirport('EDDH', 53.63, 9.99, { cycle: airacCycle(25, 1) }))
    .build();
  const current = new NavigationDataBuilder()
    .withSource('cycle 2502')
    .addAirport(makeAirport('EDHL', 53.81, 10.7, { cycle: airacCycle(25, 2) }))
    .build();
  const undated = new NavigationDataBuilder()
    .withSource('no cycle')
    .addAirport(makeAirport('EDAH', 53.88, 14.15))
    .build();

  root.append(old);
  root.append(current);
  root.append(undated);

  assert.deepEqual(root.expiredPartitions(new Date('2025-03-01T00:00:00Z')), [old.partitionId]);
  assert.deepEqual(root.expiredPartitions(new Date('2025-02-01T00:00:00Z')), []);
  root.close();
});
