import { parseSpeed, parseWind } from '@/lib/core/measurements';
import { parseVerticalDistance } from '@/lib/core/vertical-distance';
import { unknownRunwayInRoute } from '@/lib/errors';
import type { NavigationData } from '@/lib/nd/navigation-data';
import type { Word } from './token';

const DIRECT = 'DCT';

/**
 * Classifies every whitespace separated element of a route without looking
 * at its neighbours. Elements that match nothing become VFR waypoint
 * candidates for the tokenizer to resolve.
 */
export function lex(route: string, nd: NavigationData): Word[] {
  return route
    .toUpperCase()
    .split(/\s+/)
    .filter((element) => element.length > 0)
    .map((element) => classify(element, nd));
}

function classify(element: string, nd: NavigationData): Word {
  if (element === DIRECT) return { kind: 'via', via: 'direct' };

  const navAid = nd.find(element);
  if (navAid) {
    if (navAid.kind === 'airport') {
      return { kind: 'airport', airport: navAid.airport, runway: null };
    }
    if (navAid.waypoint.usage === 'vfrOnly') {
      return { kind: 'vfrWaypoint', ident: navAid.waypoint.fixIdent, waypoint: navAid.waypoint };
    }
    return { kind: 'navAid', navAid };
  }

  const speed = parseSpeed(element);
  if (speed) return { kind: 'speed', speed };

  const level = parseVerticalDistance(element);
  if (level) return { kind: 'level', level };

  const wind = parseWind(element);
  if (wind) return { kind: 'wind', wind };

  if (element.length > 4) {
    const airportWithRunway = nd.find(element.slice(0, 4));
    if (airportWithRunway?.kind === 'airport') {
      const { airport } = airportWithRunway;
      const designator = element.slice(4);
      const runway = airport.runways.find((rwy) => rwy.designator === designator);
      if (!runway) throw unknownRunwayInRoute(airport.icaoIdent, designator);
      return { kind: 'airport', airport, runway };
    }
  }

  return { kind: 'vfrWaypoint', ident: element, waypoint: null };
}
