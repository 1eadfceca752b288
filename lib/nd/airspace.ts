import { formatVerticalDistance } from '@/lib/core/vertical-distance';
import { envelopeOf, type Coordinate, type Envelope } from '@/lib/geo/coordinate';
import { ringContains } from '@/lib/geo/planar';
import type { Airspace, AirspaceType } from '@/lib/nd/types';

const AIRSPACE_TYPE_LABELS: Record<AirspaceType, string> = {
  CTA: 'CTA',
  CTR: 'CTR',
  TMA: 'TMA',
  Restricted: 'Restricted',
  Danger: 'Danger',
  Prohibited: 'Prohibited',
  TMZ: 'TMZ',
  RMZ: 'RMZ',
  RadarZone: 'Radar Zone'
};

/** e.g. "TMA BREMEN A: TMA (Class D) | FL65/1500 MSL" */
export function formatAirspace(airspace: Airspace): string {
  const parts = [airspace.name + ':'];
  if (airspace.type) parts.push(AIRSPACE_TYPE_LABELS[airspace.type]);
  if (airspace.classification) parts.push(`(Class ${airspace.classification})`);
  const limits = `${formatVerticalDistance(airspace.ceiling)}/${formatVerticalDistance(airspace.floor)}`;
  return `${parts.join(' ')} | ${limits}`;
}

export function airspaceEnvelope(airspace: Airspace): Envelope | null {
  return envelopeOf(airspace.polygon);
}

/** Lateral containment only; floor and ceiling are not checked. */
export function airspaceContains(airspace: Airspace, point: Coordinate): boolean {
  return ringContains(airspace.polygon, point);
}
