import { booleanPointInPolygon } from '@turf/turf';
import type { Polygon } from 'geojson';
import {
  coordinatesEqual,
  toPosition,
  type Coordinate,
  type PlanarPoint
} from '@/lib/geo/coordinate';

export type SegmentIntersection =
  | { kind: 'point'; point: PlanarPoint }
  | { kind: 'collinear'; start: PlanarPoint; end: PlanarPoint };

function cross(a: PlanarPoint, b: PlanarPoint): number {
  return a.x * b.y - a.y * b.x;
}

function dot(a: PlanarPoint, b: PlanarPoint): number {
  return a.x * b.x + a.y * b.y;
}

function sub(a: PlanarPoint, b: PlanarPoint): PlanarPoint {
  return { x: a.x - b.x, y: a.y - b.y };
}

function along(origin: PlanarPoint, direction: PlanarPoint, t: number): PlanarPoint {
  return { x: origin.x + direction.x * t, y: origin.y + direction.y * t };
}

/**
 * Intersection of segments a1-a2 and b1-b2 in the plane. Collinear
 * overlaps report both ends of the shared stretch; a zero-length segment
 * never intersects.
 */
export function intersectSegments(
  a1: PlanarPoint,
  a2: PlanarPoint,
  b1: PlanarPoint,
  b2: PlanarPoint
): SegmentIntersection | null {
  const r = sub(a2, a1);
  const s = sub(b2, b1);
  const rr = dot(r, r);
  if (rr === 0 || dot(s, s) === 0) return null;

  const qp = sub(b1, a1);
  const rxs = cross(r, s);
  const qpxr = cross(qp, r);

  if (rxs === 0) {
    if (qpxr !== 0) return null;

    const t0 = dot(qp, r) / rr;
    const t1 = t0 + dot(s, r) / rr;
    const tMin = Math.max(0, Math.min(t0, t1));
    const tMax = Math.min(1, Math.max(t0, t1));
    if (tMin > tMax) return null;
    if (tMin === tMax) return { kind: 'point', point: along(a1, r, tMin) };
    return { kind: 'collinear', start: along(a1, r, tMin), end: along(a1, r, tMax) };
  }

  const t = cross(qp, s) / rxs;
  const u = qpxr / rxs;
  if (t < 0 || t > 1 || u < 0 || u > 1) return null;
  return { kind: 'point', point: along(a1, r, t) };
}

/** Position of `point` projected onto segment a-b, as a fraction clamped to [0, 1]. */
export function segmentFraction(a: PlanarPoint, b: PlanarPoint, point: PlanarPoint): number {
  const ab = sub(b, a);
  const lengthSq = dot(ab, ab);
  if (lengthSq === 0) return 0;
  const t = dot(sub(point, a), ab) / lengthSq;
  return Math.min(1, Math.max(0, t));
}

export function closeRing(ring: readonly Coordinate[]): Coordinate[] {
  const closed = [...ring];
  const first = closed[0];
  const last = closed[closed.length - 1];
  if (first && last && !coordinatesEqual(first, last)) {
    closed.push(first);
  }
  return closed;
}

export function toGeoJsonPolygon(ring: readonly Coordinate[]): Polygon {
  return { type: 'Polygon', coordinates: [ring.map(toPosition)] };
}

/**
 * Whether `point` lies strictly inside the closed ring. Points on the
 * boundary and rings with fewer than four positions are outside.
 */
export function ringContains(ring: readonly Coordinate[], point: Coordinate): boolean {
  if (ring.length < 4) return false;
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (!coordinatesEqual(first, last)) return false;
  return booleanPointInPolygon(toPosition(point), toGeoJsonPolygon(ring), {
    ignoreBoundary: true
  });
}
