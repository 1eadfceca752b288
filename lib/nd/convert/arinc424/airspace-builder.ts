import { gnd, unlimited, type VerticalDistance } from '@/lib/core/vertical-distance';
import { ARC_POINTS_PER_QUADRANT, NM_TO_METERS } from '@/lib/constants';
import { coordinatesEqual, type Coordinate } from '@/lib/geo/coordinate';
import { geodesicBearing, geodesicDestination } from '@/lib/geo/geodesic';
import type { Airspace, AirspaceClassification, AirspaceType } from '@/lib/nd/types';
import {
  parseAirspaceType,
  parseArcDistanceNm,
  parseBoundaryVia,
  parseLimit,
  parseOptionalCoordinate,
  type BoundaryPath
} from './fields';
import type { ControlledAirspaceRecord } from './records';

interface BoundarySegment {
  path: BoundaryPath;
  endPoint: Coordinate;
  arcCenter: Coordinate | null;
  arcRadiusNm: number | null;
}

interface AirspaceMetadata {
  name: string;
  type: AirspaceType;
  classification: AirspaceClassification | null;
  ceiling: VerticalDistance | null;
  floor: VerticalDistance | null;
}

/**
 * Signed sweep in degrees from `start` to `end`: clockwise is positive,
 * counter-clockwise negative, never zero.
 */
export function calculateArcSweep(start: number, end: number, clockwise: boolean): number {
  let delta = end - start;
  if (clockwise) {
    if (delta <= 0) delta += 360;
  } else if (delta >= 0) {
    delta -= 360;
  }
  return delta;
}

/**
 * Accumulates the boundary records of one controlled airspace. The first
 * record carries the metadata and the starting point; every record's path
 * type describes how the ring reaches that record's point.
 */
export class AirspaceBoundaryBuilder {
  private metadata: AirspaceMetadata | null = null;
  private readonly segments: BoundarySegment[] = [];

  addRecord(record: ControlledAirspaceRecord): this {
    const point = parseOptionalCoordinate(record.latitude, record.longitude);
    const arcCenter = parseOptionalCoordinate(record.arcOriginLatitude, record.arcOriginLongitude);
    const arcRadiusNm = parseArcDistanceNm(record.arcDistance);
    const via = parseBoundaryVia(record.boundaryVia);

    const endPoint = point ?? arcCenter;
    if (!endPoint) {
      throw new Error(
        `boundary record ${record.sequenceNumber.trim()} has neither a point nor an arc origin`
      );
    }

    if (!this.metadata) {
      const { type, classification } = parseAirspaceType(record.airspaceType, record.airspaceClass);
      this.metadata = {
        name: record.airspaceName.trim(),
        type,
        classification,
        ceiling: parseLimit(record.upperLimit, record.upperUnit),
        floor: parseLimit(record.lowerLimit, record.lowerUnit)
      };
    }

    this.segments.push({ path: via.path, endPoint, arcCenter, arcRadiusNm });
    return this;
  }

  build(): Airspace {
    const metadata = this.metadata;
    if (!metadata) {
      throw new Error('cannot build an airspace without boundary records');
    }
    return {
      name: metadata.name,
      type: metadata.type,
      classification: metadata.classification,
      ceiling: metadata.ceiling ?? unlimited(),
      floor: metadata.floor ?? gnd(),
      polygon: this.buildPolygon()
    };
  }

  private buildPolygon(): Coordinate[] {
    const [first, ...rest] = this.segments;
    if (first.path === 'circle' && rest.length === 0) {
      return buildCircle(first);
    }

    const ring: Coordinate[] = [first.endPoint];
    let previous = first.endPoint;
    for (const segment of rest) {
      switch (segment.path) {
        case 'clockwiseArc':
          ring.push(...interpolateArc(previous, segment, true));
          break;
        case 'counterClockwiseArc':
          ring.push(...interpolateArc(previous, segment, false));
          break;
        default:
          // Straight paths and circles inside a sequence contribute their endpoint.
          ring.push(segment.endPoint);
      }
      previous = segment.endPoint;
    }

    const last = ring[ring.length - 1];
    if (!coordinatesEqual(ring[0], last)) {
      ring.push(ring[0]);
    }
    return ring;
  }
}

function buildCircle(segment: BoundarySegment): Coordinate[] {
  const radiusMeters = (segment.arcRadiusNm ?? 0) * NM_TO_METERS;
  const count = ARC_POINTS_PER_QUADRANT * 4;
  const ring: Coordinate[] = [];
  for (let i = 0; i < count; i += 1) {
    ring.push(geodesicDestination(segment.endPoint, (i * 360) / count, radiusMeters));
  }
  ring.push(ring[0]);
  return ring;
}

function interpolateArc(start: Coordinate, segment: BoundarySegment, clockwise: boolean): Coordinate[] {
  const { arcCenter, arcRadiusNm } = segment;
  if (!arcCenter || arcRadiusNm === null) {
    return [segment.endPoint];
  }

  const startBearing = geodesicBearing(arcCenter, start);
  const endBearing = geodesicBearing(arcCenter, segment.endPoint);
  const sweep = calculateArcSweep(startBearing, endBearing, clockwise);
  const steps = Math.max(2, Math.ceil((Math.abs(sweep) / 90) * ARC_POINTS_PER_QUADRANT));
  const radiusMeters = arcRadiusNm * NM_TO_METERS;

  const points: Coordinate[] = [];
  for (let i = 1; i <= steps; i += 1) {
    points.push(geodesicDestination(arcCenter, startBearing + (sweep * i) / steps, radiusMeters));
  }
  return points;
}
