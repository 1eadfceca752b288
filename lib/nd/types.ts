import type { VerticalDistance } from '@/lib/core/vertical-distance';
import type { Coordinate } from '@/lib/geo/coordinate';
import type { AiracCycle } from '@/lib/nd/airac-cycle';

export type RunwaySurface = 'asphalt' | 'concrete' | 'grass';

export interface Runway {
  readonly designator: string;
  readonly bearing: number;
  readonly bearingReference: 'true' | 'magnetic';
  readonly lengthFt: number;
  readonly toraFt: number;
  readonly todaFt: number;
  readonly ldaFt: number;
  readonly surface: RunwaySurface;
  /** Gradient in percent, positive uphill. */
  readonly slope: number;
  readonly elevation: VerticalDistance;
}

export interface Airport {
  readonly icaoIdent: string;
  readonly iataDesignator: string;
  readonly name: string;
  readonly coordinate: Coordinate;
  /** Degrees, east positive. */
  readonly magVar: number | null;
  readonly elevation: VerticalDistance;
  readonly runways: readonly Runway[];
  /** ICAO location indicator prefix, e.g. ED. */
  readonly location: string | null;
  readonly cycle: AiracCycle | null;
}

export type WaypointUsage = 'vfrOnly' | 'unknown';

export type Region = { kind: 'enroute' } | { kind: 'terminalArea'; airport: string };

export interface Waypoint {
  readonly fixIdent: string;
  readonly description: string;
  readonly usage: WaypointUsage;
  readonly coordinate: Coordinate;
  readonly magVar: number | null;
  readonly region: Region;
  readonly location: string | null;
  readonly cycle: AiracCycle | null;
}

export type AirspaceType =
  | 'CTA'
  | 'CTR'
  | 'TMA'
  | 'Restricted'
  | 'Danger'
  | 'Prohibited'
  | 'TMZ'
  | 'RMZ'
  | 'RadarZone';

export type AirspaceClassification = 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G';

export interface Airspace {
  readonly name: string;
  readonly type: AirspaceType | null;
  readonly classification: AirspaceClassification | null;
  readonly ceiling: VerticalDistance;
  readonly floor: VerticalDistance;
  /** Closed ring, first coordinate repeated at the end. */
  readonly polygon: readonly Coordinate[];
}

/** Anything usable as a fix: an airport reference point or a waypoint. */
export type NavAid =
  | { readonly kind: 'airport'; readonly airport: Airport }
  | { readonly kind: 'waypoint'; readonly waypoint: Waypoint };

export interface Nearby {
  airspaces: Airspace[];
  navAids: NavAid[];
}
