import { randomUUID } from 'node:crypto';
import Database from 'better-sqlite3';
import { getConfig } from '@/lib/config';
import { NM_TO_METERS } from '@/lib/constants';
import type { Coordinate, Envelope } from '@/lib/geo/coordinate';
import { geodesicDistanceMeters } from '@/lib/geo/geodesic';
import { createLogger } from '@/lib/log';
import { airspaceEnvelope } from '@/lib/nd/airspace';
import { navAidCoordinate } from '@/lib/nd/navaid';
import type { Airspace, NavAid } from '@/lib/nd/types';

const log = createLogger('navdata');

const DEG_TO_RAD = Math.PI / 180;
// Shortest degree of latitude on WGS-84 (at the equator).
const MIN_METERS_PER_DEGREE_LAT = 110574;
// Covers the gap between the spherical box and the ellipsoid.
const RADIUS_PADDING = 1.01;

type BoxParams = [number, number, number, number];
type InsertParams = [number, number, number, number, number];
interface IdRow {
  id: number;
}

interface Statements {
  clearAirspaces: Database.Statement<[]>;
  clearNavAids: Database.Statement<[]>;
  insertAirspace: Database.Statement<InsertParams>;
  insertNavAid: Database.Statement<InsertParams>;
  selectAirspaces: Database.Statement<BoxParams, IdRow>;
  selectNavAids: Database.Statement<BoxParams, IdRow>;
}

type LonRange = [number, number];

/**
 * Two SQLite R-trees over the store's entities: airspace bounding boxes and
 * navaid points. Rebuilt in full from the entity lists; row ids are the
 * entity's position in its list plus one. Each index owns a uniquely named
 * pair of tables and drops them on close.
 */
export class SpatialIndex {
  private readonly db: Database.Database;
  private readonly ownsDb: boolean;
  private readonly airspaceTable: string;
  private readonly navAidTable: string;
  private readonly stmts: Statements;
  private airspaces: readonly Airspace[] = [];
  private navAids: readonly NavAid[] = [];

  /** Opens its own connection on NAVDATA_INDEX_DB_PATH unless one is given. */
  constructor(db?: Database.Database) {
    this.db = db ?? new Database(getConfig().indexDbPath);
    this.ownsDb = db === undefined;
    const suffix = randomUUID().replaceAll('-', '');
    this.airspaceTable = `airspace_rtree_${suffix}`;
    this.navAidTable = `navaid_rtree_${suffix}`;

    this.db.exec(`
      CREATE VIRTUAL TABLE ${this.airspaceTable} USING rtree(id, min_lat, max_lat, min_lon, max_lon);
      CREATE VIRTUAL TABLE ${this.navAidTable} USING rtree(id, min_lat, max_lat, min_lon, max_lon);
    `);

    this.stmts = {
      clearAirspaces: this.db.prepare<[]>(`DELETE FROM ${this.airspaceTable}`),
      clearNavAids: this.db.prepare<[]>(`DELETE FROM ${this.navAidTable}`),
      insertAirspace: this.db.prepare<InsertParams>(
        `INSERT INTO ${this.airspaceTable} (id, min_lat, max_lat, min_lon, max_lon) VALUES (?, ?, ?, ?, ?)`
      ),
      insertNavAid: this.db.prepare<InsertParams>(
        `INSERT INTO ${this.navAidTable} (id, min_lat, max_lat, min_lon, max_lon) VALUES (?, ?, ?, ?, ?)`
      ),
      selectAirspaces: this.db.prepare<BoxParams, IdRow>(`
        SELECT id FROM ${this.airspaceTable}
        WHERE max_lat >= ? AND min_lat <= ?
          AND max_lon >= ? AND min_lon <= ?
      `),
      selectNavAids: this.db.prepare<BoxParams, IdRow>(`
        SELECT id FROM ${this.navAidTable}
        WHERE max_lat >= ? AND min_lat <= ?
          AND max_lon >= ? AND min_lon <= ?
      `)
    };
  }

  rebuild(airspaces: readonly Airspace[], navAids: readonly NavAid[]): void {
    this.airspaces = airspaces;
    this.navAids = navAids;

    let indexedAirspaces = 0;
    const load = this.db.transaction(() => {
      this.stmts.clearAirspaces.run();
      this.stmts.clearNavAids.run();

      airspaces.forEach((airspace, i) => {
        const envelope = airspaceEnvelope(airspace);
        if (!envelope) return;
        this.stmts.insertAirspace.run(
          i + 1,
          envelope.minLat,
          envelope.maxLat,
          envelope.minLon,
          envelope.maxLon
        );
        indexedAirspaces += 1;
      });

      navAids.forEach((navAid, i) => {
        const { latitude, longitude } = navAidCoordinate(navAid);
        this.stmts.insertNavAid.run(i + 1, latitude, latitude, longitude, longitude);
      });
    });
    load();

    log.debug(`spatial index rebuilt (${indexedAirspaces} airspaces, ${navAids.length} navaids)`);
  }

  /** Airspaces whose bounding box contains the point. A superset of the containing airspaces. */
  candidatesAt(point: Coordinate): Airspace[] {
    return this.candidatesIntersecting({
      minLat: point.latitude,
      maxLat: point.latitude,
      minLon: point.longitude,
      maxLon: point.longitude
    });
  }

  /** Airspaces whose bounding box overlaps the envelope. */
  candidatesIntersecting(envelope: Envelope): Airspace[] {
    const rows = this.stmts.selectAirspaces.all(
      envelope.minLat,
      envelope.maxLat,
      envelope.minLon,
      envelope.maxLon
    );
    return rows.map((row) => this.airspaces[row.id - 1]).filter(isPresent);
  }

  /**
   * Navaids within `radiusNm` geodesic distance of the center. The R-tree
   * query uses a degree box that encloses the whole circle, split in two
   * where it crosses the antimeridian; every candidate is then confirmed by
   * its exact distance.
   */
  withinRadius(center: Coordinate, radiusNm: number): NavAid[] {
    const radiusMeters = radiusNm * NM_TO_METERS;
    const latRadius = (radiusMeters / MIN_METERS_PER_DEGREE_LAT) * RADIUS_PADDING;
    const minLat = center.latitude - latRadius;
    const maxLat = center.latitude + latRadius;

    const rows: IdRow[] = [];
    for (const [minLon, maxLon] of longitudeRanges(center, latRadius)) {
      rows.push(...this.stmts.selectNavAids.all(minLat, maxLat, minLon, maxLon));
    }

    const results: NavAid[] = [];
    for (const row of rows) {
      const navAid = this.navAids[row.id - 1];
      if (!navAid) continue;
      if (geodesicDistanceMeters(center, navAidCoordinate(navAid)) <= radiusMeters) {
        results.push(navAid);
      }
    }
    return results;
  }

  close(): void {
    if (!this.db.open) return;
    this.db.exec(`
      DROP TABLE IF EXISTS ${this.airspaceTable};
      DROP TABLE IF EXISTS ${this.navAidTable};
    `);
    if (this.ownsDb) this.db.close();
  }
}

/**
 * Longitude ranges of the box around a circle of `latRadius` degrees. The
 * half-width is the spherical bound asin(sin r / cos lat); a circle reaching
 * a pole spans every longitude.
 */
function longitudeRanges(center: Coordinate, latRadius: number): LonRange[] {
  const cosLat = Math.cos(center.latitude * DEG_TO_RAD);
  const ratio = Math.sin(Math.min(latRadius, 90) * DEG_TO_RAD) / cosLat;
  if (center.latitude + latRadius >= 90 || center.latitude - latRadius <= -90 || ratio >= 1) {
    return [[-180, 180]];
  }

  const lonRadius = Math.asin(ratio) / DEG_TO_RAD;
  const minLon = center.longitude - lonRadius;
  const maxLon = center.longitude + lonRadius;
  if (minLon < -180) return [[minLon + 360, 180], [-180, maxLon]];
  if (maxLon > 180) return [[minLon, 180], [-180, maxLon - 360]];
  return [[minLon, maxLon]];
}

function isPresent<T>(value: T | undefined): value is T {
  return value !== undefined;
}
