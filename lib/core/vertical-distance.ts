import {
  FEET_PER_HPA,
  METERS_TO_FEET,
  STANDARD_PRESSURE_HPA
} from '@/lib/constants';

/**
 * A vertical measurement that keeps its reference. Values are feet except
 * for flight levels (hundreds of feet on standard pressure).
 */
export type VerticalDistance =
  | { kind: 'gnd' }
  | { kind: 'unlimited' }
  | { kind: 'agl'; value: number }
  | { kind: 'msl'; value: number }
  | { kind: 'altitude'; value: number }
  | { kind: 'pressureAltitude'; value: number }
  | { kind: 'fl'; value: number };

export type VerticalDistanceKind = VerticalDistance['kind'];

export const gnd = (): VerticalDistance => ({ kind: 'gnd' });
export const unlimited = (): VerticalDistance => ({ kind: 'unlimited' });
export const agl = (value: number): VerticalDistance => ({ kind: 'agl', value });
export const msl = (value: number): VerticalDistance => ({ kind: 'msl', value });
export const altitude = (value: number): VerticalDistance => ({ kind: 'altitude', value });
export const fl = (value: number): VerticalDistance => ({ kind: 'fl', value });
export const pressureAltitude = (value: number): VerticalDistance => ({
  kind: 'pressureAltitude',
  value
});

function digitsAt(raw: string, start: number, length: number): number | null {
  const digits = raw.slice(start, start + length);
  if (digits.length !== length || !/^\d+$/.test(digits)) return null;
  return parseInt(digits, 10);
}

/**
 * Parses an ICAO level group: F085 (FL85), S1130 (tens of meters, metric
 * level), A025 (hundreds of feet) or M0762 (tens of meters altitude).
 * Characters after the digit group are ignored.
 */
export function parseVerticalDistance(raw: string): VerticalDistance | null {
  switch (raw[0]) {
    case 'F': {
      const value = digitsAt(raw, 1, 3);
      return value === null ? null : fl(value);
    }
    case 'S': {
      const value = digitsAt(raw, 1, 4);
      return value === null ? null : fl(Math.round((value * METERS_TO_FEET) / 10));
    }
    case 'A': {
      const value = digitsAt(raw, 1, 3);
      return value === null ? null : altitude(value * 100);
    }
    case 'M': {
      const value = digitsAt(raw, 1, 4);
      return value === null ? null : altitude(Math.round(value * METERS_TO_FEET));
    }
    default:
      return null;
  }
}

export function formatVerticalDistance(vd: VerticalDistance): string {
  switch (vd.kind) {
    case 'gnd':
      return 'GND';
    case 'unlimited':
      return 'unlimited';
    case 'fl':
      return `FL${vd.value}`;
    case 'agl':
      return `${vd.value} AGL`;
    case 'msl':
      return `${vd.value} MSL`;
    case 'altitude':
      return `${vd.value} ALT`;
    case 'pressureAltitude':
      return `PA ${vd.value}`;
  }
}

function mslDatumFeet(vd: VerticalDistance): number {
  switch (vd.kind) {
    case 'fl':
      return vd.value * 100;
    case 'msl':
    case 'altitude':
      return vd.value;
    default:
      throw new Error(
        `Cannot compare ${formatVerticalDistance(vd)}: it does not reference a common datum`
      );
  }
}

/**
 * Orders two vertical distances: GND is lowest, unlimited highest, AGL
 * and pressure altitudes only against their own kind, everything else on
 * the MSL datum. Throws for pairs without a common reference.
 */
export function compareVerticalDistance(a: VerticalDistance, b: VerticalDistance): number {
  if (a.kind === 'gnd' || b.kind === 'gnd') {
    return a.kind === b.kind ? 0 : a.kind === 'gnd' ? -1 : 1;
  }
  if (a.kind === 'unlimited' || b.kind === 'unlimited') {
    return a.kind === b.kind ? 0 : a.kind === 'unlimited' ? 1 : -1;
  }
  if (a.kind === 'agl' && b.kind === 'agl') return Math.sign(a.value - b.value);
  if (a.kind === 'pressureAltitude' && b.kind === 'pressureAltitude') {
    return Math.sign(a.value - b.value);
  }
  return Math.sign(mslDatumFeet(a) - mslDatumFeet(b));
}

/** Ratio of two distances of the same kind. */
export function divideVerticalDistance(a: VerticalDistance, b: VerticalDistance): number {
  if (a.kind !== b.kind) {
    throw new Error(
      `Cannot divide ${formatVerticalDistance(a)} by ${formatVerticalDistance(b)}: different references`
    );
  }
  if ('value' in a && 'value' in b) return a.value / b.value;
  return 1;
}

/**
 * Resolves to feet above mean sea level for the given QNH (hPa) and
 * ground elevation (ft). Unlimited has no altitude.
 */
export function verticalDistanceToMsl(
  vd: VerticalDistance,
  qnhHpa: number,
  elevationFt: number
): number | null {
  const qnhCorrectionFt = (qnhHpa - STANDARD_PRESSURE_HPA) * FEET_PER_HPA;
  switch (vd.kind) {
    case 'gnd':
      return elevationFt;
    case 'agl':
      return elevationFt + vd.value;
    case 'msl':
    case 'altitude':
      return vd.value;
    case 'fl':
      return vd.value * 100 + qnhCorrectionFt;
    case 'pressureAltitude':
      return vd.value + qnhCorrectionFt;
    case 'unlimited':
      return null;
  }
}

/** Pressure altitude of a field at `elevationFt` with the given QNH. */
export function fieldPressureAltitude(elevationFt: number, qnhHpa: number): VerticalDistance {
  const offset = Math.round(145366.45 * (1 - Math.pow(qnhHpa / STANDARD_PRESSURE_HPA, 0.190284)));
  return pressureAltitude(Math.trunc(elevationFt) + offset);
}
