import { coord } from '@/lib/geo/coordinate';
import { closeRing } from '@/lib/geo/planar';
import { gnd, unlimited } from '@/lib/core/vertical-distance';
import { isNavDataError, invalidRecord } from '@/lib/errors';
import { createLogger } from '@/lib/log';
import { NavigationDataBuilder } from '@/lib/nd/builder';
import type { NavigationData } from '@/lib/nd/navigation-data';
import type { Airport, Airspace, Runway, RunwaySurface, Waypoint } from '@/lib/nd/types';
import type {
  AirportHeliportFeature,
  AirspaceFeature,
  AixmFeature,
  DesignatedPointFeature,
  NavaidFeature,
  RunwayDirectionFeature,
  RunwayFeature
} from './features';
import {
  airspaceKind,
  fieldElevation,
  runwayBearing,
  runwayLengthFt,
  runwaySurface,
  volumeLimits
} from './fields';

const log = createLogger('aixm');

interface RunwayInfo {
  airportUuid: string | undefined;
  lengthFt: number;
  surface: RunwaySurface;
}

export function toAirport(feature: AirportHeliportFeature): Airport {
  if (!feature.coordinate) {
    throw invalidRecord('airport', `${feature.designator} has no reference point`);
  }
  const [latitude, longitude] = feature.coordinate;
  return {
    icaoIdent: feature.locationIndicatorIcao ?? feature.designator,
    iataDesignator: feature.iataDesignator ?? '',
    name: feature.name,
    coordinate: coord(latitude, longitude),
    magVar: null,
    elevation: fieldElevation(feature.fieldElevation, feature.fieldElevationUom),
    runways: [],
    location: feature.locationIndicatorIcao?.slice(0, 2) ?? null,
    cycle: null
  };
}

export function toWaypoint(feature: DesignatedPointFeature | NavaidFeature): Waypoint {
  if (!feature.coordinate) {
    throw invalidRecord(feature.kind, `${feature.designator} has no location`);
  }
  const [latitude, longitude] = feature.coordinate;
  return {
    fixIdent: feature.designator,
    description: feature.name ?? '',
    usage: 'unknown',
    coordinate: coord(latitude, longitude),
    magVar: null,
    region: { kind: 'enroute' },
    location: null,
    cycle: null
  };
}

export function toAirspace(feature: AirspaceFeature): Airspace {
  const { type, classification } = airspaceKind(feature.type);
  const [volume] = feature.volumes;
  const limits = volume ? volumeLimits(volume) : { ceiling: unlimited(), floor: gnd() };
  const ring = volume ? volume.polygon.map(([latitude, longitude]) => coord(latitude, longitude)) : [];

  return {
    name: feature.name ?? feature.designator ?? '',
    type,
    classification,
    ceiling: limits.ceiling,
    floor: limits.floor,
    polygon: closeRing(ring)
  };
}

function toRunwayInfo(feature: RunwayFeature): RunwayInfo {
  return {
    airportUuid: feature.associatedAirportUuid,
    lengthFt: runwayLengthFt(feature.nominalLength, feature.nominalLengthUom),
    surface: runwaySurface(feature.surfaceComposition)
  };
}

function toRunway(direction: RunwayDirectionFeature, info: RunwayInfo): Runway {
  const { bearing, reference } = runwayBearing(direction.trueBearing, direction.magneticBearing);
  return {
    designator: direction.designator,
    bearing,
    bearingReference: reference,
    lengthFt: info.lengthFt,
    toraFt: info.lengthFt,
    todaFt: info.lengthFt,
    ldaFt: info.lengthFt,
    surface: info.surface,
    slope: 0,
    elevation: gnd()
  };
}

/**
 * Converts a stream of features into a navigation data partition. Runway
 * directions reference their runway, and runways their airport, in any
 * order; they are resolved once the stream is exhausted.
 */
export function convertAixm(
  features: Iterable<AixmFeature | Error>,
  source?: string | Uint8Array
): NavigationData {
  const builder = new NavigationDataBuilder();
  const airportIdents = new Map<string, string>();
  const runwayInfos = new Map<string, RunwayInfo>();
  const directions: RunwayDirectionFeature[] = [];

  for (const feature of features) {
    if (feature instanceof Error) {
      builder.addError(feature);
      continue;
    }

    try {
      switch (feature.kind) {
        case 'airportHeliport': {
          const airport = toAirport(feature);
          airportIdents.set(feature.uuid, airport.icaoIdent);
          builder.addAirport(airport);
          break;
        }
        case 'runway':
          runwayInfos.set(feature.uuid, toRunwayInfo(feature));
          break;
        case 'runwayDirection':
          if (feature.usedRunwayUuid) directions.push(feature);
          break;
        case 'designatedPoint':
        case 'navaid':
          builder.addWaypoint(toWaypoint(feature));
          break;
        case 'airspace':
          builder.addAirspace(toAirspace(feature));
          break;
      }
    } catch (error) {
      if (!isNavDataError(error)) throw error;
      builder.addError(error);
    }
  }

  for (const direction of directions) {
    const info = direction.usedRunwayUuid ? runwayInfos.get(direction.usedRunwayUuid) : undefined;
    const airportIdent = info?.airportUuid ? airportIdents.get(info.airportUuid) : undefined;
    if (!info || !airportIdent) {
      log.debug(`unresolved runway direction ${direction.designator}`);
      continue;
    }
    builder.addRunway(airportIdent, toRunway(direction, info));
  }

  if (source !== undefined) builder.withSource(source);
  return builder.build();
}
