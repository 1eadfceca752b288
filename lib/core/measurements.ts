import { KMH_TO_KNOTS, MACH_ONE_KNOTS } from '@/lib/constants';
import { normalizeBearing } from '@/lib/geo/geodesic';

export type SpeedUnit = 'kt' | 'kmh' | 'mach';

export interface Speed {
  value: number;
  unit: SpeedUnit;
}

/** Direction the wind blows from (degrees true) and its speed in knots. */
export interface Wind {
  direction: number;
  speedKt: number;
}

export function knots(value: number): Speed {
  return { value, unit: 'kt' };
}

/**
 * ICAO cruise speed group: N0107 (knots), K0200 (km/h) or M082 (Mach in
 * hundredths).
 */
export function parseSpeed(raw: string): Speed | null {
  const match = raw.match(/^(?:([NK])(\d{4})|M(\d{3}))$/);
  if (!match) return null;
  const [, prefix, fourDigits, machDigits] = match;
  if (machDigits !== undefined) {
    return { value: parseInt(machDigits, 10) / 100, unit: 'mach' };
  }
  return { value: parseInt(fourDigits, 10), unit: prefix === 'K' ? 'kmh' : 'kt' };
}

export function speedToKnots(speed: Speed): number {
  switch (speed.unit) {
    case 'kt':
      return speed.value;
    case 'kmh':
      return speed.value * KMH_TO_KNOTS;
    case 'mach':
      return speed.value * MACH_ONE_KNOTS;
  }
}

export function formatSpeed(speed: Speed): string {
  switch (speed.unit) {
    case 'kt':
      return `N${String(speed.value).padStart(4, '0')}`;
    case 'kmh':
      return `K${String(speed.value).padStart(4, '0')}`;
    case 'mach':
      return `M${String(Math.round(speed.value * 100)).padStart(3, '0')}`;
  }
}

/** Wind group such as 24015KT or 270105KT. */
export function parseWind(raw: string): Wind | null {
  const match = raw.match(/^(\d{3})(\d{2,3})KT$/);
  if (!match) return null;
  const direction = parseInt(match[1], 10);
  if (direction > 360) return null;
  return { direction: direction % 360, speedKt: parseInt(match[2], 10) };
}

export function formatWind(wind: Wind): string {
  const direction = String(wind.direction).padStart(3, '0');
  const speed = String(wind.speedKt).padStart(2, '0');
  return `${direction}${speed}KT`;
}

/**
 * Magnetic from true with a signed variation (east positive).
 */
export function trueToMagnetic(trueDegrees: number, magVar: number): number {
  return normalizeBearing(trueDegrees - magVar);
}
