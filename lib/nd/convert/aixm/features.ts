// Typed features as handed over by the feature reader. Cross references
// carry the bare UUID of the referenced feature.

export interface AirportHeliportFeature {
  kind: 'airportHeliport';
  uuid: string;
  designator: string;
  name: string;
  locationIndicatorIcao?: string;
  iataDesignator?: string;
  fieldElevation?: number;
  fieldElevationUom?: string;
  /** Aerodrome reference point as latitude, longitude. */
  coordinate?: [number, number];
}

export interface RunwayFeature {
  kind: 'runway';
  uuid: string;
  designator: string;
  nominalLength?: number;
  nominalLengthUom?: string;
  surfaceComposition?: string;
  associatedAirportUuid?: string;
}

export interface RunwayDirectionFeature {
  kind: 'runwayDirection';
  uuid: string;
  designator: string;
  trueBearing?: number;
  magneticBearing?: number;
  usedRunwayUuid?: string;
}

export interface DesignatedPointFeature {
  kind: 'designatedPoint';
  uuid: string;
  designator: string;
  name?: string;
  coordinate?: [number, number];
}

export interface NavaidFeature {
  kind: 'navaid';
  uuid: string;
  designator: string;
  name?: string;
  coordinate?: [number, number];
}

export interface AirspaceVolume {
  upperLimit?: string;
  upperLimitUom?: string;
  upperLimitRef?: string;
  lowerLimit?: string;
  lowerLimitUom?: string;
  lowerLimitRef?: string;
  /** Exterior ring as latitude, longitude pairs. */
  polygon: [number, number][];
}

export interface AirspaceFeature {
  kind: 'airspace';
  uuid: string;
  type?: string;
  designator?: string;
  name?: string;
  volumes: AirspaceVolume[];
}

export type AixmFeature =
  | AirportHeliportFeature
  | RunwayFeature
  | RunwayDirectionFeature
  | DesignatedPointFeature
  | NavaidFeature
  | AirspaceFeature;
