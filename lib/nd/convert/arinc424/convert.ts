import { gnd } from '@/lib/core/vertical-distance';
import { isNavDataError } from '@/lib/errors';
import { createLogger } from '@/lib/log';
import { NavigationDataBuilder } from '@/lib/nd/builder';
import type { NavigationData } from '@/lib/nd/navigation-data';
import type { Airport, Runway, Waypoint } from '@/lib/nd/types';
import { AirspaceBoundaryBuilder } from './airspace-builder';
import {
  parseBoundaryVia,
  parseCoordinate,
  parseCycle,
  parseMagneticVariation,
  parseRegion,
  parseRunwayBearing,
  parseRunwayDesignator,
  parseRunwayGradient,
  parseRunwayLength,
  parseWaypointUsage
} from './fields';
import type {
  AirportRecord,
  Arinc424Record,
  ControlledAirspaceRecord,
  RunwayRecord,
  WaypointRecord
} from './records';

const log = createLogger('arinc424');

function optionalText(raw: string): string | null {
  const trimmed = raw.trim();
  return trimmed === '' ? null : trimmed;
}

export function toAirport(record: AirportRecord): Airport {
  return {
    icaoIdent: record.airportIdent.trim(),
    iataDesignator: record.iata.trim(),
    name: record.airportName.trim(),
    coordinate: parseCoordinate(record.latitude, record.longitude),
    magVar: parseMagneticVariation(record.magVar),
    elevation: gnd(),
    runways: [],
    location: optionalText(record.icaoCode),
    cycle: parseCycle(record.cycle)
  };
}

export function toRunway(record: RunwayRecord): Runway {
  const lengthFt = parseRunwayLength(record.runwayLength);
  const { bearing, reference } = parseRunwayBearing(record.runwayBearing);
  return {
    designator: parseRunwayDesignator(record.runwayId),
    bearing,
    bearingReference: reference,
    lengthFt,
    toraFt: lengthFt,
    todaFt: lengthFt,
    ldaFt: lengthFt,
    surface: 'asphalt',
    slope: parseRunwayGradient(record.runwayGradient),
    elevation: gnd()
  };
}

export function toWaypoint(record: WaypointRecord): Waypoint {
  return {
    fixIdent: record.fixIdent.trim(),
    description: record.nameDescription.trim(),
    usage: parseWaypointUsage(record.waypointType),
    coordinate: parseCoordinate(record.latitude, record.longitude),
    magVar: parseMagneticVariation(record.magVar),
    region: parseRegion(record.regionCode),
    location: optionalText(record.icaoCode),
    cycle: parseCycle(record.cycle)
  };
}

function isReturnToOrigin(record: ControlledAirspaceRecord): boolean {
  return parseBoundaryVia(record.boundaryVia).returnToOrigin;
}

/**
 * Converts a stream of column records into a navigation data partition.
 * Failing records, and reader errors passed through the stream, are
 * collected on the result. A failing boundary record drops the airspace it
 * belongs to.
 */
export function convertArinc424(
  records: Iterable<Arinc424Record | Error>,
  source?: string | Uint8Array
): NavigationData {
  const builder = new NavigationDataBuilder();
  let airspace: AirspaceBoundaryBuilder | null = null;
  let discardingAirspace = false;
  let count = 0;

  for (const record of records) {
    count += 1;
    if (record instanceof Error) {
      builder.addError(record);
      continue;
    }

    try {
      switch (record.kind) {
        case 'airport':
          builder.addAirport(toAirport(record));
          break;
        case 'runway':
          builder.addRunway(record.airportIdent.trim(), toRunway(record));
          break;
        case 'waypoint':
          builder.addWaypoint(toWaypoint(record));
          break;
        case 'controlledAirspace': {
          const closes = isReturnToOrigin(record);
          if (!discardingAirspace) {
            airspace = (airspace ?? new AirspaceBoundaryBuilder()).addRecord(record);
            if (closes) builder.addAirspace(airspace.build());
          }
          if (closes) {
            airspace = null;
            discardingAirspace = false;
          }
          break;
        }
      }
    } catch (error) {
      if (!isNavDataError(error)) throw error;
      if (record.kind === 'controlledAirspace') {
        airspace = null;
        discardingAirspace = !recordClosesSafely(record);
      }
      builder.addError(error);
    }
  }

  if (airspace) {
    builder.addError(new Error('airspace boundary ended without returning to its origin'));
  }

  log.info(`converted ${count} records`);
  if (source !== undefined) builder.withSource(source);
  return builder.build();
}

function recordClosesSafely(record: ControlledAirspaceRecord): boolean {
  try {
    return isReturnToOrigin(record);
  } catch (error) {
    if (!isNavDataError(error)) throw error;
    return false;
  }
}
