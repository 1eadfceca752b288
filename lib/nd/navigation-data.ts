import { randomUUID } from 'node:crypto';
import type { Coordinate, Envelope } from '@/lib/geo/coordinate';
import { createLogger } from '@/lib/log';
import { cycleValidity, type AiracCycle } from '@/lib/nd/airac-cycle';
import { airspaceContains } from '@/lib/nd/airspace';
import { airportNavAid, waypointNavAid } from '@/lib/nd/navaid';
import { SpatialIndex } from '@/lib/nd/spatial-index';
import type { Airport, Airspace, NavAid, Nearby, Waypoint } from '@/lib/nd/types';

const log = createLogger('navdata');

export interface NavigationDataContents {
  airports: readonly Airport[];
  airspaces: readonly Airspace[];
  waypoints: readonly Waypoint[];
  terminalWaypoints: ReadonlyMap<string, readonly Waypoint[]>;
  locations: readonly string[];
  errors: readonly Error[];
  cycle: AiracCycle | null;
  partitionId: string;
}

/**
 * The entity store. Holds its own entities plus any appended partitions;
 * every query covers both. The spatial index is built on the first spatial
 * query and rebuilt whenever the set of partitions changes, so a store used
 * only as a partition never builds one.
 */
export class NavigationData {
  private readonly contents: NavigationDataContents;
  private readonly partitions = new Map<string, NavigationData>();
  private index: SpatialIndex | null = null;

  constructor(contents: NavigationDataContents) {
    this.contents = contents;
  }

  static empty(): NavigationData {
    return new NavigationData({
      airports: [],
      airspaces: [],
      waypoints: [],
      terminalWaypoints: new Map(),
      locations: [],
      errors: [],
      cycle: null,
      partitionId: randomUUID()
    });
  }

  get partitionId(): string {
    return this.contents.partitionId;
  }

  cycle(): AiracCycle | null {
    return this.contents.cycle;
  }

  locations(): string[] {
    return [...this.contents.locations];
  }

  /** Airspaces containing the point, plus navaids within `radiusNm` of it. */
  at(point: Coordinate, radiusNm = 0): Nearby {
    return {
      airspaces: this.spatialIndex()
        .candidatesAt(point)
        .filter((airspace) => airspaceContains(airspace, point)),
      navAids: this.spatialIndex().withinRadius(point, radiusNm)
    };
  }

  /** Bounding-box candidates only; callers confirm geometry themselves. */
  candidateAirspaces(envelope: Envelope): Airspace[] {
    return this.spatialIndex().candidatesIntersecting(envelope);
  }

  /** Exact identifier match, waypoints before airports. */
  find(ident: string): NavAid | null {
    for (const waypoint of this.waypoints()) {
      if (waypoint.fixIdent === ident) return waypointNavAid(waypoint);
    }
    for (const airport of this.airports()) {
      if (airport.icaoIdent === ident) return airportNavAid(airport);
    }
    return null;
  }

  findTerminalWaypoint(airportIdent: string, fixIdent: string): NavAid | null {
    for (const waypoint of this.terminalWaypoints(airportIdent)) {
      if (waypoint.fixIdent === fixIdent) return waypointNavAid(waypoint);
    }
    return null;
  }

  /** Replaces and closes a partition appended earlier under the same id. */
  append(partition: NavigationData): void {
    const replaced = this.partitions.get(partition.partitionId);
    if (replaced && replaced !== partition) replaced.close();
    this.partitions.set(partition.partitionId, partition);
    log.info(`appended partition ${partition.partitionId}`);
    this.reindex();
  }

  /** Removes and closes the partition. */
  remove(partitionId: string): void {
    const partition = this.partitions.get(partitionId);
    if (!partition) return;
    this.partitions.delete(partitionId);
    partition.close();
    log.info(`removed partition ${partitionId}`);
    this.reindex();
  }

  partitionIds(): string[] {
    return [...this.partitions.keys()];
  }

  /** Partitions whose AIRAC cycle has lapsed at `at`. Partitions without a cycle never expire. */
  expiredPartitions(at: Date = new Date()): string[] {
    const expired: string[] = [];
    for (const [id, partition] of this.partitions) {
      const cycle = partition.cycle();
      if (cycle && cycleValidity(cycle, at) === 'expired') expired.push(id);
    }
    return expired;
  }

  errors(): Error[] {
    return this.collect((nd) => nd.contents.errors);
  }

  airports(): Airport[] {
    return this.collect((nd) => nd.contents.airports);
  }

  /** Enroute waypoints. */
  waypoints(): Waypoint[] {
    return this.collect((nd) => nd.contents.waypoints);
  }

  terminalWaypoints(airportIdent: string): Waypoint[] {
    return this.collect((nd) => nd.contents.terminalWaypoints.get(airportIdent) ?? []);
  }

  airspaces(): Airspace[] {
    return this.collect((nd) => nd.contents.airspaces);
  }

  close(): void {
    this.index?.close();
    this.index = null;
    for (const partition of this.partitions.values()) {
      partition.close();
    }
  }

  private collect<T>(select: (nd: NavigationData) => readonly T[]): T[] {
    const items = [...select(this)];
    for (const partition of this.partitions.values()) {
      items.push(...select(partition));
    }
    return items;
  }

  private allTerminalWaypoints(): Waypoint[] {
    return this.collect((nd) => [...nd.contents.terminalWaypoints.values()].flat());
  }

  private spatialIndex(): SpatialIndex {
    if (!this.index) {
      this.index = new SpatialIndex();
      this.index.rebuild(this.airspaces(), this.navAids());
    }
    return this.index;
  }

  private navAids(): NavAid[] {
    return [
      ...this.airports().map(airportNavAid),
      ...this.waypoints().map(waypointNavAid),
      ...this.allTerminalWaypoints().map(waypointNavAid)
    ];
  }

  private reindex(): void {
    this.index?.rebuild(this.airspaces(), this.navAids());
  }
}
