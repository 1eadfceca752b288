import {
  altitude,
  fl,
  gnd,
  msl,
  unlimited,
  type VerticalDistance
} from '@/lib/core/vertical-distance';
import { METERS_TO_FEET } from '@/lib/constants';
import type {
  AirspaceClassification,
  AirspaceType,
  RunwaySurface
} from '@/lib/nd/types';
import type { AirspaceVolume } from './features';

export interface AirspaceKind {
  type: AirspaceType | null;
  classification: AirspaceClassification | null;
}

export function airspaceKind(raw: string | undefined): AirspaceKind {
  switch (raw) {
    case 'A':
    case 'CLASS_A':
      return { type: null, classification: 'A' };
    case 'B':
    case 'CLASS_B':
      return { type: null, classification: 'B' };
    case 'C':
    case 'CLASS_C':
      return { type: null, classification: 'C' };
    case 'D':
    case 'CLASS_D':
      return { type: null, classification: 'D' };
    case 'E':
    case 'CLASS_E':
      return { type: null, classification: 'E' };
    case 'F':
    case 'CLASS_F':
      return { type: null, classification: 'F' };
    case 'G':
    case 'CLASS_G':
      return { type: null, classification: 'G' };
    case 'CTA':
      return { type: 'CTA', classification: null };
    case 'CTR':
      return { type: 'CTR', classification: null };
    case 'TMA':
      return { type: 'TMA', classification: null };
    case 'RAS':
      return { type: 'RadarZone', classification: null };
    case 'TMZ':
      return { type: 'TMZ', classification: null };
    case 'RMZ':
      return { type: 'RMZ', classification: null };
    case 'R':
    case 'RESTRICT':
      return { type: 'Restricted', classification: null };
    case 'D_OTHER':
    case 'DA':
      return { type: 'Danger', classification: null };
    case 'P':
    case 'PROHIBIT':
      return { type: 'Prohibited', classification: null };
    default:
      return { type: null, classification: 'G' };
  }
}

/** GND/SFC, UNL, flight levels and numeric limits; missing limits are unlimited. */
export function verticalLimit(
  value: string | undefined,
  uom: string | undefined,
  reference: string | undefined
): VerticalDistance {
  const trimmed = value?.trim();
  if (!trimmed) return unlimited();
  if (trimmed === 'GND' || trimmed === 'SFC') return gnd();
  if (trimmed === 'UNL') return unlimited();
  if (!/^\d+$/.test(trimmed)) return unlimited();

  const numeric = parseInt(trimmed, 10);
  if (uom === 'FL') return fl(numeric);
  if (reference === 'SFC' || reference === 'GND') return altitude(numeric);
  return msl(numeric);
}

export function volumeLimits(volume: AirspaceVolume): {
  ceiling: VerticalDistance;
  floor: VerticalDistance;
} {
  return {
    ceiling: verticalLimit(volume.upperLimit, volume.upperLimitUom, volume.upperLimitRef),
    floor: verticalLimit(volume.lowerLimit, volume.lowerLimitUom, volume.lowerLimitRef)
  };
}

export function runwaySurface(composition: string | undefined): RunwaySurface {
  switch (composition) {
    case 'CONC':
      return 'concrete';
    case 'GRASS':
      return 'grass';
    default:
      return 'asphalt';
  }
}

export function runwayLengthFt(value: number | undefined, uom: string | undefined): number {
  if (value === undefined) return 0;
  switch (uom) {
    case 'FT':
      return value;
    case 'KM':
      return value * 1000 * METERS_TO_FEET;
    default:
      return value * METERS_TO_FEET;
  }
}

export function runwayBearing(
  trueBearing: number | undefined,
  magneticBearing: number | undefined
): { bearing: number; reference: 'true' | 'magnetic' } {
  if (trueBearing !== undefined) return { bearing: trueBearing, reference: 'true' };
  if (magneticBearing !== undefined) return { bearing: magneticBearing, reference: 'magnetic' };
  return { bearing: 0, reference: 'true' };
}

/** Whole feet above MSL; a missing elevation is ground. */
export function fieldElevation(value: number | undefined, uom: string | undefined): VerticalDistance {
  if (value === undefined) return gnd();
  return msl(Math.trunc(uom === 'M' ? value * METERS_TO_FEET : value));
}
