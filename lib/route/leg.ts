import { speedToKnots, trueToMagnetic, type Speed, type Wind } from '@/lib/core/measurements';
import type { VerticalDistance } from '@/lib/core/vertical-distance';
import { geodesicInverse, normalizeBearing } from '@/lib/geo/geodesic';
import { NM_TO_METERS } from '@/lib/constants';
import { navAidCoordinate, navAidMagVar } from '@/lib/nd/navaid';
import type { NavAid } from '@/lib/nd/types';

const DEG_TO_RAD = Math.PI / 180;

/**
 * One edge of a route. The derived fields are computed once on creation;
 * angles are degrees in [0, 360), ground speed is knots.
 */
export interface Leg {
  readonly from: NavAid;
  readonly to: NavAid;
  readonly level: VerticalDistance | null;
  readonly tas: Speed | null;
  readonly wind: Wind | null;
  /** True course. */
  readonly bearing: number;
  /** Magnetic course, using the variation at `from`. */
  readonly mc: number;
  readonly distNm: number;
  readonly wca: number | null;
  readonly gsKt: number | null;
  /** True heading. */
  readonly heading: number | null;
  readonly mh: number | null;
  readonly eteSeconds: number | null;
}

export function windCorrectionAngle(wind: Wind, tasKt: number, bearing: number): number {
  // Law of sines in the wind triangle: sin(wca) / ws = sin(windAngle) / tas
  const windAngle = (bearing - (wind.direction + 180)) * DEG_TO_RAD;
  const wca = Math.asin((wind.speedKt / tasKt) * Math.sin(windAngle)) / DEG_TO_RAD;
  return normalizeBearing(wca);
}

export function groundSpeed(wind: Wind, tasKt: number, bearing: number, wca: number): number {
  const angle = (bearing - wind.direction + wca) * DEG_TO_RAD;
  return Math.sqrt(
    tasKt * tasKt + wind.speedKt * wind.speedKt - 2 * tasKt * wind.speedKt * Math.cos(angle)
  );
}

export function createLeg(
  from: NavAid,
  to: NavAid,
  level: VerticalDistance | null,
  tas: Speed | null,
  wind: Wind | null
): Leg {
  const { distanceMeters, initialBearing: bearing } = geodesicInverse(
    navAidCoordinate(from),
    navAidCoordinate(to)
  );
  const magVar = navAidMagVar(from);
  const distNm = distanceMeters / NM_TO_METERS;

  let wca: number | null = null;
  let gsKt: number | null = null;
  if (tas && wind) {
    const tasKt = speedToKnots(tas);
    wca = windCorrectionAngle(wind, tasKt, bearing);
    gsKt = groundSpeed(wind, tasKt, bearing, wca);
  }

  const heading = wca === null ? null : normalizeBearing(bearing + wca);
  return {
    from,
    to,
    level,
    tas,
    wind,
    bearing,
    mc: trueToMagnetic(bearing, magVar),
    distNm,
    wca,
    gsKt,
    heading,
    mh: heading === null ? null : trueToMagnetic(heading, magVar),
    eteSeconds: gsKt ? (distNm / gsKt) * 3600 : null
  };
}
