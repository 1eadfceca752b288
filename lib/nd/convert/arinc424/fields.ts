import {
  agl,
  fl,
  gnd,
  msl,
  unlimited,
  type VerticalDistance
} from '@/lib/core/vertical-distance';
import type { Coordinate } from '@/lib/geo/coordinate';
import { invalidRecord } from '@/lib/errors';
import { airacCycle, type AiracCycle } from '@/lib/nd/airac-cycle';
import type {
  AirspaceClassification,
  AirspaceType,
  Region,
  WaypointUsage
} from '@/lib/nd/types';

export type BoundaryPath = 'circle' | 'greatCircle' | 'rhumbLine' | 'counterClockwiseArc' | 'clockwiseArc';

export interface BoundaryVia {
  path: BoundaryPath;
  returnToOrigin: boolean;
}

function isBlank(raw: string | undefined): boolean {
  return raw === undefined || raw.trim() === '';
}

function digits(raw: string, field: string): number {
  if (!/^\d+$/.test(raw)) {
    throw invalidRecord(field, `expected digits, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

// Parse DMS coordinates from the column format
// Latitude:  N53374900  = N53°37'49.00"
// Longitude: E009591762 = E009°59'17.62"
function parseDMS(dms: string, field: string, degreeDigits: 2 | 3, positive: string, negative: string): number {
  const trimmed = dms.trim();
  if (trimmed.length !== 1 + degreeDigits + 6) {
    throw invalidRecord(field, `unexpected length in "${dms}"`);
  }
  const hemisphere = trimmed[0];
  const rest = trimmed.slice(1);
  const degrees = digits(rest.slice(0, degreeDigits), field);
  const minutes = digits(rest.slice(degreeDigits, degreeDigits + 2), field);
  const seconds = digits(rest.slice(degreeDigits + 2), field) / 100;

  const decimal = degrees + minutes / 60 + seconds / 3600;
  if (hemisphere === positive) return decimal;
  if (hemisphere === negative) return -decimal;
  throw invalidRecord(field, `expected ${positive} or ${negative}, got "${hemisphere}"`);
}

export function parseLatitude(raw: string): number {
  return parseDMS(raw, 'latitude', 2, 'N', 'S');
}

export function parseLongitude(raw: string): number {
  return parseDMS(raw, 'longitude', 3, 'E', 'W');
}

export function parseCoordinate(latitude: string, longitude: string): Coordinate {
  return { latitude: parseLatitude(latitude), longitude: parseLongitude(longitude) };
}

/** Both halves present, or none. */
export function parseOptionalCoordinate(
  latitude: string | undefined,
  longitude: string | undefined
): Coordinate | null {
  if (latitude === undefined || longitude === undefined) return null;
  if (isBlank(latitude) || isBlank(longitude)) return null;
  return parseCoordinate(latitude, longitude);
}

/** E0030 = 3.0° east, W0041 = 4.1° west (negative), T = oriented to true north. */
export function parseMagneticVariation(raw: string): number | null {
  const trimmed = raw.trim().toUpperCase();
  if (!trimmed) return null;
  if (trimmed[0] === 'T') return 0;

  const directionalMatch = trimmed.match(/^([EW])(\d{4})$/);
  if (!directionalMatch) {
    throw invalidRecord('magnetic variation', `expected E, W or T, got "${raw}"`);
  }
  const [, direction, value] = directionalMatch;
  const magnitude = parseInt(value, 10) / 10;
  return direction === 'W' ? -magnitude : magnitude;
}

export function parseCycle(raw: string): AiracCycle {
  const trimmed = raw.trim();
  if (!/^\d{4}$/.test(trimmed)) {
    throw invalidRecord('cycle', `expected YYCC, got "${raw}"`);
  }
  return airacCycle(parseInt(trimmed.slice(0, 2), 10), parseInt(trimmed.slice(2), 10));
}

/** RW07 -> 07, RW36L -> 36L; identifiers without the RW prefix pass through. */
export function parseRunwayDesignator(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith('RW')) return trimmed;
  const designator = trimmed.slice(2);
  const number = designator.slice(0, 2);
  if (!/^\d{2}$/.test(number) || parseInt(number, 10) > 36) {
    throw invalidRecord('runway identifier', `expected 00 to 36, got "${designator}"`);
  }
  return designator;
}

/** 2302 = 230.2° magnetic, 347T = 347° true. */
export function parseRunwayBearing(raw: string): { bearing: number; reference: 'true' | 'magnetic' } {
  const trimmed = raw.trim();
  if (trimmed.endsWith('T')) {
    return { bearing: digits(trimmed.slice(0, -1), 'runway bearing'), reference: 'true' };
  }
  return { bearing: digits(trimmed, 'runway bearing') / 10, reference: 'magnetic' };
}

export function parseRunwayLength(raw: string): number {
  return digits(raw.trim(), 'runway length');
}

/** +00450 = 0.45 %, blank = level. */
export function parseRunwayGradient(raw: string): number {
  const trimmed = raw.trim();
  if (!trimmed) return 0;
  const sign = trimmed[0];
  const slope = digits(trimmed.slice(1), 'runway gradient') / 1000;
  if (sign === '+') return slope;
  if (sign === '-') return -slope;
  throw invalidRecord('runway gradient', `expected + or -, got "${sign}"`);
}

export function parseRegion(raw: string): Region {
  const trimmed = raw.trim();
  return trimmed === 'ENRT' ? { kind: 'enroute' } : { kind: 'terminalArea', airport: trimmed };
}

export function parseWaypointUsage(waypointType: string): WaypointUsage {
  return waypointType.startsWith('V') && waypointType.slice(1).trim() === '' ? 'vfrOnly' : 'unknown';
}

/**
 * Lower/upper limit with its unit indicator (M = MSL, A = AGL). Limits
 * that are not specified or published by NOTAM yield null.
 */
export function parseLimit(raw: string, unitIndicator: string): VerticalDistance | null {
  if (isBlank(raw)) return null;
  const value = raw.padEnd(5, ' ').slice(0, 5);

  if (value.startsWith('FL') && /^\d{3}$/.test(value.slice(2))) {
    return fl(parseInt(value.slice(2), 10));
  }
  if (/^\d{5}$/.test(value)) {
    const feet = parseInt(value, 10);
    return unitIndicator.trim() === 'A' ? agl(feet) : msl(feet);
  }

  switch (value) {
    case 'GND  ':
      return gnd();
    case 'MSL  ':
      return msl(0);
    case 'UNLTD':
      return unlimited();
    case 'NOTSP':
    case 'NOTAM':
      return null;
    default:
      throw invalidRecord('lower/upper limit', `unexpected "${raw}"`);
  }
}

/** Airspace type code and optional class letter to type and classification. */
export function parseAirspaceType(
  arspType: string,
  arspClass: string
): { type: AirspaceType; classification: AirspaceClassification | null } {
  const classification = parseClassification(arspClass);
  switch (arspType) {
    case 'A':
      return { type: 'CTA', classification: classification ?? 'C' };
    case 'C':
      return { type: 'CTA', classification };
    case 'M':
      return { type: 'TMA', classification };
    case 'R':
      return { type: 'RadarZone', classification };
    case 'T':
      return { type: 'CTA', classification: classification ?? 'B' };
    case 'U':
      return { type: 'RMZ', classification };
    case 'V':
      return { type: 'TMZ', classification };
    case 'Z':
      return { type: 'CTR', classification };
    default:
      throw invalidRecord('airspace type', `unexpected "${arspType}"`);
  }
}

const CLASSIFICATIONS: readonly AirspaceClassification[] = ['A', 'B', 'C', 'D', 'E', 'F', 'G'];

function parseClassification(raw: string): AirspaceClassification | null {
  const letter = raw.trim();
  return CLASSIFICATIONS.find((classification) => classification === letter) ?? null;
}

export function parseBoundaryVia(raw: string): BoundaryVia {
  const returnToOrigin = raw[1] === 'E';
  switch (raw[0]) {
    case 'C':
      return { path: 'circle', returnToOrigin };
    case 'G':
      return { path: 'greatCircle', returnToOrigin };
    case 'H':
      return { path: 'rhumbLine', returnToOrigin };
    case 'L':
      return { path: 'counterClockwiseArc', returnToOrigin };
    case 'R':
      return { path: 'clockwiseArc', returnToOrigin };
    default:
      throw invalidRecord('boundary via', `expected C, G, H, L or R, got "${raw}"`);
  }
}

/** Tenths of nautical miles; blank = none. */
export function parseArcDistanceNm(raw: string): number | null {
  if (isBlank(raw)) return null;
  return digits(raw.trim(), 'arc distance') / 10;
}
