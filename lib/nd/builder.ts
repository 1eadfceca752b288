import { createHash, randomUUID } from 'node:crypto';
import { createLogger } from '@/lib/log';
import { compareAiracCycles, type AiracCycle } from '@/lib/nd/airac-cycle';
import { NavigationData } from '@/lib/nd/navigation-data';
import type { Airport, Airspace, Runway, Waypoint } from '@/lib/nd/types';

const log = createLogger('navdata');

export function partitionIdForSource(source: string | Uint8Array): string {
  return createHash('sha256').update(source).digest('hex').slice(0, 16);
}

/**
 * Collects converted entities and conversion errors, then freezes them into
 * a NavigationData. Runways may arrive before their airport; they are
 * attached on build.
 */
export class NavigationDataBuilder {
  private readonly airports = new Map<string, Airport>();
  private readonly runways = new Map<string, Runway[]>();
  private readonly airspaces: Airspace[] = [];
  private readonly waypoints: Waypoint[] = [];
  private readonly terminalWaypoints = new Map<string, Waypoint[]>();
  private readonly locations = new Set<string>();
  private readonly errors: Error[] = [];
  private cycle: AiracCycle | null = null;
  private partitionId: string | null = null;

  addAirport(airport: Airport): this {
    this.airports.set(airport.icaoIdent, airport);
    this.trackLocation(airport.location);
    this.trackCycle(airport.cycle);
    return this;
  }

  addRunway(airportIdent: string, runway: Runway): this {
    const runways = this.runways.get(airportIdent);
    if (runways) {
      runways.push(runway);
    } else {
      this.runways.set(airportIdent, [runway]);
    }
    return this;
  }

  addAirspace(airspace: Airspace): this {
    this.airspaces.push(airspace);
    return this;
  }

  /** Enroute waypoints are global; terminal waypoints are grouped by their airport. */
  addWaypoint(waypoint: Waypoint): this {
    if (waypoint.region.kind === 'terminalArea') {
      const airportIdent = waypoint.region.airport;
      const scoped = this.terminalWaypoints.get(airportIdent);
      if (scoped) {
        scoped.push(waypoint);
      } else {
        this.terminalWaypoints.set(airportIdent, [waypoint]);
      }
    } else {
      this.waypoints.push(waypoint);
    }
    this.trackLocation(waypoint.location);
    this.trackCycle(waypoint.cycle);
    return this;
  }

  addError(error: Error): this {
    log.warn(error.message);
    this.errors.push(error);
    return this;
  }

  /** Derives the partition id from the raw source the entities came from. */
  withSource(source: string | Uint8Array): this {
    this.partitionId = partitionIdForSource(source);
    return this;
  }

  build(): NavigationData {
    const airports: Airport[] = [];
    for (const [ident, airport] of this.airports) {
      const runways = this.runways.get(ident);
      airports.push(runways ? { ...airport, runways: [...airport.runways, ...runways] } : airport);
    }

    for (const ident of this.runways.keys()) {
      if (!this.airports.has(ident)) {
        log.warn(`dropping runways of unknown airport ${ident}`);
      }
    }

    return new NavigationData({
      airports,
      airspaces: [...this.airspaces],
      waypoints: [...this.waypoints],
      terminalWaypoints: new Map(
        [...this.terminalWaypoints].map(([ident, waypoints]) => [ident, [...waypoints]])
      ),
      locations: [...this.locations],
      errors: [...this.errors],
      cycle: this.cycle,
      partitionId: this.partitionId ?? randomUUID()
    });
  }

  private trackLocation(location: string | null): void {
    if (location) this.locations.add(location);
  }

  private trackCycle(cycle: AiracCycle | null): void {
    if (cycle && (!this.cycle || compareAiracCycles(cycle, this.cycle) < 0)) {
      this.cycle = cycle;
    }
  }
}
