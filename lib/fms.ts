import type { Coordinate } from '@/lib/geo/coordinate';
import { unknownIdent } from '@/lib/errors';
import { createLogger } from '@/lib/log';
import { NavigationData } from '@/lib/nd/navigation-data';
import type { Nearby } from '@/lib/nd/types';
import { VerticalProfile } from '@/lib/route/profile';
import { Route } from '@/lib/route/route';

const log = createLogger('fms');

/** Ties the navigation data to the route being planned on it. */
export class FlightManagement {
  readonly nd: NavigationData;
  readonly route = new Route();

  constructor(nd: NavigationData = NavigationData.empty()) {
    this.nd = nd;
  }

  decode(route: string): Route {
    this.route.decode(route, this.nd);
    return this.route;
  }

  /** Sets the alternate by identifier; null removes it. */
  setAlternate(ident: string | null): void {
    if (ident === null) {
      this.route.setAlternate(null);
      return;
    }
    const navAid = this.nd.find(ident.toUpperCase());
    if (!navAid) throw unknownIdent(ident);
    log.debug(`alternate set to ${ident}`);
    this.route.setAlternate(navAid);
  }

  verticalProfile(): VerticalProfile {
    return new VerticalProfile(this.route, this.nd);
  }

  nearby(point: Coordinate, radiusNm: number): Nearby {
    return this.nd.at(point, radiusNm);
  }

  close(): void {
    this.nd.close();
  }
}
