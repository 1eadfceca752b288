import { bbox, lineString } from '@turf/turf';
import type { Feature, LineString } from 'geojson';
import type { Speed, Wind } from '@/lib/core/measurements';
import type { VerticalDistance } from '@/lib/core/vertical-distance';
import { toPosition } from '@/lib/geo/coordinate';
import { createLogger } from '@/lib/log';
import { airportNavAid, navAidCoordinate, navAidIdent } from '@/lib/nd/navaid';
import type { NavigationData } from '@/lib/nd/navigation-data';
import type { Airport, NavAid, Runway } from '@/lib/nd/types';
import { createLeg, type Leg } from './leg';
import { formatToken, type Token } from './token';
import { tokenize } from './tokenizer';

const log = createLogger('route');

/** Running totals from the start of the route up to and including a leg. */
export interface LegTotals {
  distNm: number;
  /** Null once any leg so far has no ETE. */
  eteSeconds: number | null;
}

export interface RouteProperties {
  route: string;
  origin: string | null;
  destination: string | null;
}

/**
 * A route decoded from a space separated list of fixes and performance
 * elements, e.g. `13509KT N0107 EDDH D DCT W EDHL`. Speed, level and wind
 * elements apply to every following leg; the first speed and level are the
 * cruise values.
 */
export class Route {
  private currentTokens: Token[] = [];
  private currentLegs: Leg[] = [];
  private cruiseSpeed: Speed | null = null;
  private cruiseLevel: VerticalDistance | null = null;
  private originAirport: Airport | null = null;
  private takeoffRwy: Runway | null = null;
  private destinationAirport: Airport | null = null;
  private landingRwy: Runway | null = null;
  private alternateNavAid: NavAid | null = null;

  /** Replaces the route. A failing decode leaves the previous route untouched. */
  decode(route: string, nd: NavigationData): void {
    log.debug(`decoding "${route}"`);
    let tokens: Token[];
    try {
      tokens = tokenize(route, nd);
    } catch (error) {
      log.warn(`failed to decode "${route}": ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }

    const legs: Leg[] = [];
    let cruiseSpeed: Speed | null = null;
    let cruiseLevel: VerticalDistance | null = null;
    let origin: Airport | null = null;
    let takeoffRwy: Runway | null = null;
    let destination: Airport | null = null;
    let landingRwy: Runway | null = null;

    let level: VerticalDistance | null = null;
    let tas: Speed | null = null;
    let wind: Wind | null = null;
    let from: NavAid | null = null;
    let to: NavAid | null = null;

    for (const token of tokens) {
      let fix: NavAid | null = null;
      switch (token.kind) {
        case 'speed':
          tas = token.speed;
          if (!cruiseSpeed) cruiseSpeed = token.speed;
          break;
        case 'level':
          level = token.level;
          if (!cruiseLevel) cruiseLevel = token.level;
          break;
        case 'wind':
          wind = token.wind;
          break;
        case 'airport':
          fix = airportNavAid(token.airport);
          if (!origin) {
            origin = token.airport;
            takeoffRwy = token.runway;
          } else {
            destination = token.airport;
            landingRwy = token.runway;
          }
          break;
        case 'navAid':
          fix = token.navAid;
          break;
        case 'via':
          break;
      }

      if (fix) {
        if (!from) from = fix;
        else if (!to) to = fix;
      }
      if (from && to) {
        legs.push(createLeg(from, to, level, tas, wind));
        from = to;
        to = null;
      }
    }

    this.currentTokens = tokens;
    this.currentLegs = legs;
    this.cruiseSpeed = cruiseSpeed;
    this.cruiseLevel = cruiseLevel;
    this.originAirport = origin;
    this.takeoffRwy = takeoffRwy;
    this.destinationAirport = destination;
    this.landingRwy = landingRwy;
    log.debug(`decoded ${legs.length} leg(s)`);
  }

  /** Clears tokens, legs and the alternate. */
  clear(): void {
    this.currentTokens = [];
    this.currentLegs = [];
    this.cruiseSpeed = null;
    this.cruiseLevel = null;
    this.originAirport = null;
    this.takeoffRwy = null;
    this.destinationAirport = null;
    this.landingRwy = null;
    this.alternateNavAid = null;
  }

  tokens(): readonly Token[] {
    return this.currentTokens;
  }

  legs(): readonly Leg[] {
    return this.currentLegs;
  }

  speed(): Speed | null {
    return this.cruiseSpeed;
  }

  level(): VerticalDistance | null {
    return this.cruiseLevel;
  }

  origin(): Airport | null {
    return this.originAirport;
  }

  takeoffRunway(): Runway | null {
    return this.takeoffRwy;
  }

  destination(): Airport | null {
    return this.destinationAirport;
  }

  landingRunway(): Runway | null {
    return this.landingRwy;
  }

  /** Null removes the alternate. */
  setAlternate(alternate: NavAid | null): void {
    this.alternateNavAid = alternate;
  }

  /** A leg from the end of the route to the alternate, flown like the final leg. */
  alternate(): Leg | null {
    const finalLeg = this.currentLegs[this.currentLegs.length - 1];
    if (!finalLeg || !this.alternateNavAid) return null;
    return createLeg(finalLeg.to, this.alternateNavAid, finalLeg.level, finalLeg.tas, finalLeg.wind);
  }

  accumulateLegs(): LegTotals[] {
    const totals: LegTotals[] = [];
    let previous: LegTotals = { distNm: 0, eteSeconds: 0 };
    for (const leg of this.currentLegs) {
      previous = {
        distNm: previous.distNm + leg.distNm,
        eteSeconds:
          previous.eteSeconds === null || leg.eteSeconds === null
            ? null
            : previous.eteSeconds + leg.eteSeconds
      };
      totals.push(previous);
    }
    return totals;
  }

  totals(): LegTotals | null {
    const totals = this.accumulateLegs();
    return totals[totals.length - 1] ?? null;
  }

  toString(): string {
    return this.currentTokens.map(formatToken).join(' ');
  }

  /** The leg endpoints as a GeoJSON line with its bounding box; null without legs. */
  toGeoJson(): Feature<LineString, RouteProperties> | null {
    const [first] = this.currentLegs;
    if (!first) return null;

    const positions = [
      toPosition(navAidCoordinate(first.from)),
      ...this.currentLegs.map((leg) => toPosition(navAidCoordinate(leg.to)))
    ];
    const feature = lineString(positions, {
      route: this.toString(),
      origin: this.originAirport?.icaoIdent ?? null,
      destination: this.destinationAirport?.icaoIdent ?? null
    });
    feature.bbox = bbox(feature);
    return feature;
  }

  /** Identifiers of the fixes along the route, in order. */
  fixes(): string[] {
    const [first] = this.currentLegs;
    if (!first) return [];
    return [navAidIdent(first.from), ...this.currentLegs.map((leg) => navAidIdent(leg.to))];
  }
}
