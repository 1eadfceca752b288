/** WGS-84 latitude/longitude in decimal degrees. */
export interface Coordinate {
  latitude: number;
  longitude: number;
}

/** Planar ordering used by the geometry routines: x = longitude, y = latitude. */
export interface PlanarPoint {
  x: number;
  y: number;
}

export interface Envelope {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

export function coord(latitude: number, longitude: number): Coordinate {
  return { latitude, longitude };
}

export function toPlanar(coordinate: Coordinate): PlanarPoint {
  return { x: coordinate.longitude, y: coordinate.latitude };
}

export function fromPlanar(point: PlanarPoint): Coordinate {
  return { latitude: point.y, longitude: point.x };
}

/** GeoJSON position order. */
export function toPosition(coordinate: Coordinate): [number, number] {
  return [coordinate.longitude, coordinate.latitude];
}

// Object.is compares like the raw float bits: NaN equals NaN, 0 and -0 differ.
export function coordinatesEqual(a: Coordinate, b: Coordinate): boolean {
  return Object.is(a.latitude, b.latitude) && Object.is(a.longitude, b.longitude);
}

export function coordinateKey(coordinate: Coordinate): string {
  const view = new DataView(new ArrayBuffer(16));
  view.setFloat64(0, coordinate.latitude);
  view.setFloat64(8, coordinate.longitude);
  return `${view.getBigUint64(0).toString(16)}:${view.getBigUint64(8).toString(16)}`;
}

export function envelopeOf(coordinates: readonly Coordinate[]): Envelope | null {
  if (coordinates.length === 0) return null;
  let minLat = Infinity;
  let maxLat = -Infinity;
  let minLon = Infinity;
  let maxLon = -Infinity;
  for (const { latitude, longitude } of coordinates) {
    minLat = Math.min(minLat, latitude);
    maxLat = Math.max(maxLat, latitude);
    minLon = Math.min(minLon, longitude);
    maxLon = Math.max(maxLon, longitude);
  }
  return { minLat, maxLat, minLon, maxLon };
}
