import {
  compareVerticalDistance,
  type VerticalDistance
} from '@/lib/core/vertical-distance';
import { CROSSING_DEDUP_METERS, NM_TO_METERS } from '@/lib/constants';
import {
  envelopeOf,
  fromPlanar,
  toPlanar,
  type Coordinate,
  type PlanarPoint
} from '@/lib/geo/coordinate';
import { geodesicDistanceMeters } from '@/lib/geo/geodesic';
import { intersectSegments, ringContains, segmentFraction } from '@/lib/geo/planar';
import { airportNavAid, navAidCoordinate } from '@/lib/nd/navaid';
import type { NavigationData } from '@/lib/nd/navigation-data';
import type { Airspace, NavAid } from '@/lib/nd/types';
import type { Route } from './route';

/** Where the route enters and leaves an airspace, distances in NM along the route. */
export interface AirspaceIntersection {
  readonly airspace: Airspace;
  readonly entryDistanceNm: number;
  readonly exitDistanceNm: number;
  readonly entryPoint: Coordinate;
  readonly exitPoint: Coordinate;
}

export type VerticalPoint =
  | { kind: 'topOfClimb'; level: VerticalDistance; distanceNm: number }
  | { kind: 'navAid'; level: VerticalDistance; distanceNm: number; navAid: NavAid }
  | { kind: 'topOfDescent'; level: VerticalDistance; distanceNm: number }
  | { kind: 'levelOf'; level: VerticalDistance; distanceNm: number };

interface Transition {
  distanceMeters: number;
  point: Coordinate;
}

interface RouteLine {
  points: Coordinate[];
  planar: PlanarPoint[];
  segmentMeters: number[];
  totalMeters: number;
}

export function intersectionLengthNm(intersection: AirspaceIntersection): number {
  return intersection.exitDistanceNm - intersection.entryDistanceNm;
}

/**
 * The airspaces a route passes through and its altitude profile. Vertical
 * limits are not compared; an intersection only means the lateral track
 * enters the airspace.
 */
export class VerticalProfile {
  readonly intersections: readonly AirspaceIntersection[];
  readonly profile: readonly VerticalPoint[];

  constructor(route: Route, nd: NavigationData) {
    const line = routeLine(route);
    this.intersections = line ? findIntersections(line, nd) : [];
    this.profile = buildProfile(route);
  }

  /**
   * Highest level of the profile among levels on a common datum. AGL and
   * pressure altitudes are left out.
   */
  maxLevel(): VerticalDistance | null {
    let max: VerticalDistance | null = null;
    for (const { level } of this.profile) {
      if (level.kind === 'agl' || level.kind === 'pressureAltitude') continue;
      if (!max || compareVerticalDistance(level, max) > 0) max = level;
    }
    return max;
  }

  get length(): number {
    return this.intersections.length;
  }

  isEmpty(): boolean {
    return this.intersections.length === 0;
  }
}

function routeLine(route: Route): RouteLine | null {
  const legs = route.legs();
  if (legs.length === 0) return null;

  const points = [navAidCoordinate(legs[0].from), ...legs.map((leg) => navAidCoordinate(leg.to))];
  const segmentMeters: number[] = [];
  for (let i = 1; i < points.length; i += 1) {
    segmentMeters.push(geodesicDistanceMeters(points[i - 1], points[i]));
  }
  return {
    points,
    planar: points.map(toPlanar),
    segmentMeters,
    totalMeters: segmentMeters.reduce((sum, meters) => sum + meters, 0)
  };
}

function findIntersections(line: RouteLine, nd: NavigationData): AirspaceIntersection[] {
  const envelope = envelopeOf(line.points);
  if (!envelope) return [];

  const intersections: AirspaceIntersection[] = [];
  for (const airspace of nd.candidateAirspaces(envelope)) {
    intersections.push(...intersectAirspace(airspace, line));
  }
  return intersections.sort((a, b) => a.entryDistanceNm - b.entryDistanceNm);
}

function boundaryCrossings(line: RouteLine, ring: readonly Coordinate[]): Transition[] {
  const boundary = ring.map(toPlanar);
  const crossings: Transition[] = [];
  let before = 0;

  for (let s = 0; s < line.segmentMeters.length; s += 1) {
    const a = line.planar[s];
    const b = line.planar[s + 1];
    const at = (point: PlanarPoint): Transition => ({
      distanceMeters: before + segmentFraction(a, b, point) * line.segmentMeters[s],
      point: fromPlanar(point)
    });

    for (let e = 1; e < boundary.length; e += 1) {
      const hit = intersectSegments(a, b, boundary[e - 1], boundary[e]);
      if (hit?.kind === 'point') {
        crossings.push(at(hit.point));
      } else if (hit?.kind === 'collinear') {
        crossings.push(at(hit.start), at(hit.end));
      }
    }
    before += line.segmentMeters[s];
  }

  crossings.sort((x, y) => x.distanceMeters - y.distanceMeters);
  const distinct: Transition[] = [];
  for (const crossing of crossings) {
    const last = distinct[distinct.length - 1];
    // Shared boundary vertices are hit once per adjoining edge.
    if (last && crossing.distanceMeters - last.distanceMeters < CROSSING_DEDUP_METERS) continue;
    distinct.push(crossing);
  }
  return distinct;
}

function intersectAirspace(airspace: Airspace, line: RouteLine): AirspaceIntersection[] {
  const start = line.points[0];
  const end = line.points[line.points.length - 1];
  const startInside = ringContains(airspace.polygon, start);
  const endInside = ringContains(airspace.polygon, end);
  const crossings = boundaryCrossings(line, airspace.polygon);
  if (crossings.length === 0 && !startInside) return [];

  const transitions: Transition[] = [
    ...(startInside ? [{ distanceMeters: 0, point: start }] : []),
    ...crossings,
    ...(endInside ? [{ distanceMeters: line.totalMeters, point: end }] : [])
  ];

  const intersections: AirspaceIntersection[] = [];
  // A trailing unpaired transition is a tangential touch.
  for (let i = 0; i + 1 < transitions.length; i += 2) {
    const entry = transitions[i];
    const exit = transitions[i + 1];
    intersections.push({
      airspace,
      entryDistanceNm: entry.distanceMeters / NM_TO_METERS,
      exitDistanceNm: exit.distanceMeters / NM_TO_METERS,
      entryPoint: entry.point,
      exitPoint: exit.point
    });
  }
  return intersections;
}

/**
 * Origin elevation, the level of every leg at its end fix, and the
 * destination elevation at the total distance.
 */
function buildProfile(route: Route): VerticalPoint[] {
  const legs = route.legs();
  if (legs.length === 0) return [];

  const profile: VerticalPoint[] = [];
  const origin = route.origin();
  if (origin) {
    profile.push({ kind: 'navAid', level: origin.elevation, distanceNm: 0, navAid: airportNavAid(origin) });
  }

  const totals = route.accumulateLegs();
  legs.forEach((leg, i) => {
    const { distNm } = totals[i];
    if (i === legs.length - 1) {
      const destination = route.destination();
      if (destination) {
        profile.push({
          kind: 'navAid',
          level: destination.elevation,
          distanceNm: distNm,
          navAid: airportNavAid(destination)
        });
      }
    } else if (leg.level) {
      profile.push({ kind: 'navAid', level: leg.level, distanceNm: distNm, navAid: leg.to });
    }
  });
  return profile;
}
