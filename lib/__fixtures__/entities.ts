import { gnd, unlimited } from '@/lib/core/vertical-distance';
import { coord, type Coordinate } from '@/lib/geo/coordinate';
import { closeRing } from '@/lib/geo/planar';
import type { Airport, Airspace, Runway, Waypoint } from '@/lib/nd/types';

export function makeAirport(
  icaoIdent: string,
  latitude: number,
  longitude: number,
  overrides: Partial<Airport> = {}
): Airport {
  return {
    icaoIdent,
    iataDesignator: '',
    name: icaoIdent,
    coordinate: coord(latitude, longitude),
    magVar: null,
    elevation: gnd(),
    runways: [],
    location: icaoIdent.slice(0, 2),
    cycle: null,
    ...overrides
  };
}

export function makeRunway(designator: string, overrides: Partial<Runway> = {}): Runway {
  return {
    designator,
    bearing: parseInt(designator.slice(0, 2), 10) * 10,
    bearingReference: 'magnetic',
    lengthFt: 3000,
    toraFt: 3000,
    todaFt: 3000,
    ldaFt: 3000,
    surface: 'asphalt',
    slope: 0,
    elevation: gnd(),
    ...overrides
  };
}

export function makeWaypoint(
  fixIdent: string,
  latitude: number,
  longitude: number,
  overrides: Partial<Waypoint> = {}
): Waypoint {
  return {
    fixIdent,
    description: '',
    usage: 'unknown',
    coordinate: coord(latitude, longitude),
    magVar: null,
    region: { kind: 'enroute' },
    location: null,
    cycle: null,
    ...overrides
  };
}

export function makeTerminalWaypoint(
  airport: string,
  fixIdent: string,
  latitude: number,
  longitude: number
): Waypoint {
  return makeWaypoint(fixIdent, latitude, longitude, {
    usage: 'vfrOnly',
    region: { kind: 'terminalArea', airport }
  });
}

export function makeAirspace(
  name: string,
  ring: Coordinate[],
  overrides: Partial<Airspace> = {}
): Airspace {
  return {
    name,
    type: 'CTR',
    classification: 'D',
    ceiling: unlimited(),
    floor: gnd(),
    polygon: closeRing(ring),
    ...overrides
  };
}

/** Axis-aligned box airspace between the given latitudes and longitudes. */
export function makeBoxAirspace(
  name: string,
  minLat: number,
  maxLat: number,
  minLon: number,
  maxLon: number,
  overrides: Partial<Airspace> = {}
): Airspace {
  return makeAirspace(
    name,
    [coord(minLat, minLon), coord(minLat, maxLon), coord(maxLat, maxLon), coord(maxLat, minLon)],
    overrides
  );
}
