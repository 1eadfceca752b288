import type { Coordinate } from '@/lib/geo/coordinate';
import type { Airport, NavAid, Waypoint } from '@/lib/nd/types';

export function airportNavAid(airport: Airport): NavAid {
  return { kind: 'airport', airport };
}

export function waypointNavAid(waypoint: Waypoint): NavAid {
  return { kind: 'waypoint', waypoint };
}

export function navAidIdent(navAid: NavAid): string {
  return navAid.kind === 'airport' ? navAid.airport.icaoIdent : navAid.waypoint.fixIdent;
}

export function navAidCoordinate(navAid: NavAid): Coordinate {
  return navAid.kind === 'airport' ? navAid.airport.coordinate : navAid.waypoint.coordinate;
}

export function navAidMagVar(navAid: NavAid): number {
  const magVar = navAid.kind === 'airport' ? navAid.airport.magVar : navAid.waypoint.magVar;
  return magVar ?? 0;
}

/** Same underlying entity. */
export function sameNavAid(a: NavAid, b: NavAid): boolean {
  if (a.kind === 'airport' && b.kind === 'airport') return a.airport === b.airport;
  if (a.kind === 'waypoint' && b.kind === 'waypoint') return a.waypoint === b.waypoint;
  return false;
}

export function terminalArea(waypoint: Waypoint): string | null {
  return waypoint.region.kind === 'terminalArea' ? waypoint.region.airport : null;
}
