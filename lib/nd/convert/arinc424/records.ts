// Typed column records as handed over by the record reader. Fields keep
// their raw column text; blank columns are empty or space-filled strings.

export interface AirportRecord {
  kind: 'airport';
  airportIdent: string;
  icaoCode: string;
  iata: string;
  latitude: string;
  longitude: string;
  magVar: string;
  airportName: string;
  cycle: string;
}

export interface RunwayRecord {
  kind: 'runway';
  airportIdent: string;
  runwayId: string;
  runwayLength: string;
  runwayBearing: string;
  runwayGradient: string;
  cycle: string;
}

export interface WaypointRecord {
  kind: 'waypoint';
  regionCode: string;
  icaoCode: string;
  fixIdent: string;
  waypointType: string;
  latitude: string;
  longitude: string;
  magVar: string;
  nameDescription: string;
  cycle: string;
}

export interface ControlledAirspaceRecord {
  kind: 'controlledAirspace';
  icaoCode: string;
  airspaceType: string;
  airspaceCenter: string;
  airspaceClass: string;
  sequenceNumber: string;
  boundaryVia: string;
  latitude: string;
  longitude: string;
  arcOriginLatitude: string;
  arcOriginLongitude: string;
  arcDistance: string;
  lowerLimit: string;
  lowerUnit: string;
  upperLimit: string;
  upperUnit: string;
  airspaceName: string;
  cycle: string;
}

export type Arinc424Record = AirportRecord | RunwayRecord | WaypointRecord | ControlledAirspaceRecord;
